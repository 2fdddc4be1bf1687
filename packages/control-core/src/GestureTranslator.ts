import { easeOutCubic } from "./easing";
import type { AngularVelocity } from "./InertiaIntegrator";
import { clampTilt, type OrientationState } from "./OrientationState";
import type { HapticCue, RenderHint, Vec2 } from "./types";

export interface GestureTranslatorOptions {
  maxTilt: number;
  rotationSpeed: number;
  verticalDamping: number;
  velocityScale: number;
  dragAnimationMs: number;
  friction: { threshold: number; floor: number };
  haptics: { rotationStep: number; minIntervalMs: number };
}

export interface GestureTranslatorDeps {
  now: () => number;
  haptic: (cue: HapticCue, intensity: number) => void;
  commit: (hint: RenderHint) => void;
}

interface GestureSession {
  originYaw: number;
  originPitch: number;
  hasBrokenFriction: boolean;
  lastHapticYaw: number;
  lastHapticAt: number;
}

/**
 * Rotation multiplier while the card still resists the drag: eases from
 * `floor` at rest to 1 at the threshold.
 */
export function frictionMultiplier(distance: number, threshold: number, floor: number): number {
  const progress = Math.min(Math.max(distance / threshold, 0), 1);
  return floor + (1 - floor) * easeOutCubic(progress);
}

export class GestureTranslator {
  private session: GestureSession | null = null;

  constructor(
    private readonly state: OrientationState,
    private readonly options: GestureTranslatorOptions,
    private readonly deps: GestureTranslatorDeps
  ) {}

  get isActive(): boolean {
    return this.session !== null;
  }

  get hasBrokenFriction(): boolean {
    return this.session?.hasBrokenFriction ?? false;
  }

  begin(): void {
    this.session = {
      originYaw: this.state.yaw,
      originPitch: this.state.pitch,
      hasBrokenFriction: false,
      lastHapticYaw: this.state.yaw,
      lastHapticAt: Number.NEGATIVE_INFINITY,
    };
    this.deps.haptic("gestureStart", 0.8);
  }

  /** Applies the cumulative translation; returns false when no drag is active. */
  change(translation: Vec2): boolean {
    const session = this.session;
    if (!session) return false;
    if (!Number.isFinite(translation.x) || !Number.isFinite(translation.y)) return false;

    const { rotationSpeed, verticalDamping, maxTilt, friction } = this.options;
    const distance = Math.hypot(translation.x, translation.y);

    let multiplier = 1;
    if (!session.hasBrokenFriction) {
      if (distance >= friction.threshold) {
        session.hasBrokenFriction = true;
        this.deps.haptic("frictionBreak", 0.8);
      } else {
        multiplier = frictionMultiplier(distance, friction.threshold, friction.floor);
      }
    }

    const yaw = session.originYaw + translation.x * rotationSpeed * multiplier;
    const pitch = clampTilt(
      session.originPitch - translation.y * rotationSpeed * verticalDamping * multiplier,
      maxTilt
    );
    this.state.setYaw(yaw);
    this.state.setPitch(pitch);

    this.maybeTick(session, yaw);
    this.deps.commit({ durationMs: this.options.dragAnimationMs, easing: "easeOut" });
    return true;
  }

  /** Ends the session and hands the release velocity over as angular velocity. */
  end(velocity: Vec2): AngularVelocity | null {
    if (!this.session) return null;
    this.session = null;

    const vx = Number.isFinite(velocity.x) ? velocity.x : 0;
    const vy = Number.isFinite(velocity.y) ? velocity.y : 0;
    const { velocityScale, verticalDamping } = this.options;
    return {
      yaw: vx * velocityScale,
      pitch: -vy * velocityScale * verticalDamping,
    };
  }

  cancelSession(): void {
    this.session = null;
  }

  private maybeTick(session: GestureSession, yaw: number): void {
    const { rotationStep, minIntervalMs } = this.options.haptics;
    if (Math.abs(yaw - session.lastHapticYaw) < rotationStep) return;
    const now = this.deps.now();
    if (now - session.lastHapticAt < minIntervalMs) return;
    session.lastHapticYaw = yaw;
    session.lastHapticAt = now;
    this.deps.haptic("rotationTick", 1);
  }
}
