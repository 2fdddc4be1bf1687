import type { OrientationState } from "./OrientationState";
import type { TaskHandle, TaskScheduler } from "./TaskScheduler";
import type { HapticCue, OrientationSource, RenderHint } from "./types";

const TWO_PI = Math.PI * 2;

export interface FlipControllerOptions {
  flip: { durationMs: number; settleCueDelayMs: number };
  autoReturn: { idleDelayMs: number; durationMs: number };
}

export interface FlipControllerDeps {
  scheduler: TaskScheduler;
  haptic: (cue: HapticCue, intensity: number) => void;
  commit: (source: OrientationSource, hint?: RenderHint) => void;
}

/** The angle congruent to `restYaw` (mod 2π) closest to `yaw`. */
export function nearestRestYaw(yaw: number, restYaw: number): number {
  return restYaw + TWO_PI * Math.round((yaw - restYaw) / TWO_PI);
}

/**
 * Front/back state machine plus the idle auto-return policy. Both write
 * their target pose at once and leave the motion to the renderer's hint.
 */
export class FlipController {
  private settleCue: TaskHandle | null = null;
  private autoReturnTimer: TaskHandle | null = null;
  private autoReturnSettle: TaskHandle | null = null;

  constructor(
    private readonly state: OrientationState,
    private readonly options: FlipControllerOptions,
    private readonly deps: FlipControllerDeps
  ) {}

  get isAutoReturnPending(): boolean {
    return this.autoReturnTimer !== null || this.autoReturnSettle !== null;
  }

  /** Toggles the face and returns the new target yaw (0 or π). */
  flip(): number {
    this.cancel();
    this.state.setShowingBack(!this.state.isShowingBack);
    const targetYaw = this.state.restYaw();
    this.state.setYaw(targetYaw);
    this.state.setPitch(0);

    this.deps.haptic("flip", 0.8);
    this.deps.commit("flip", { durationMs: this.options.flip.durationMs, easing: "flipOvershoot" });
    this.settleCue = this.deps.scheduler.after(this.options.flip.settleCueDelayMs, () => {
      this.settleCue = null;
      this.deps.haptic("settle", 0.6);
    });
    return targetYaw;
  }

  scheduleAutoReturn(): void {
    this.cancelAutoReturn();
    this.autoReturnTimer = this.deps.scheduler.after(this.options.autoReturn.idleDelayMs, () => {
      this.autoReturnTimer = null;
      this.returnToRest();
    });
  }

  /** Animates to the nearest rest angle of the current face, then re-normalises yaw. */
  returnToRest(): void {
    this.cancelAutoReturn();
    const rest = this.state.restYaw();
    this.state.setYaw(nearestRestYaw(this.state.yaw, rest));
    this.state.setPitch(0);
    this.deps.commit("autoReturn", { durationMs: this.options.autoReturn.durationMs, easing: "spring" });

    this.autoReturnSettle = this.deps.scheduler.after(this.options.autoReturn.durationMs, () => {
      this.autoReturnSettle = null;
      if (this.state.yaw !== rest) {
        this.state.setYaw(rest);
        this.deps.commit("autoReturn");
      }
      this.deps.haptic("settle", 0.6);
    });
  }

  cancelAutoReturn(): void {
    this.autoReturnTimer?.cancel();
    this.autoReturnTimer = null;
    this.autoReturnSettle?.cancel();
    this.autoReturnSettle = null;
  }

  cancel(): void {
    this.cancelAutoReturn();
    this.settleCue?.cancel();
    this.settleCue = null;
  }
}
