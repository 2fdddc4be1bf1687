import { cardDataEquals, styleEquals, visibilityEquals } from "@tiltcard/card-core";
import { clampTilt } from "./OrientationState";
import type { CardControllerError, CardHostConfig, CardPose, InteractionMode } from "./types";

export type RebuildReason = "initial" | "data" | "style" | "visibility";

export interface PoseTarget {
  yaw?: number;
  pitch?: number;
  scale?: number;
}

export type RebuildDecision =
  | { kind: "rebuild"; reasons: RebuildReason[] }
  | { kind: "repose"; target: PoseTarget; durationMs: number }
  | { kind: "noop"; reason: "unchanged" | "interaction-active" };

export interface ArbiterDecision {
  scene: RebuildDecision;
  modeChanged: boolean;
  external: ExternalValues;
  rejected: Extract<CardControllerError, { type: "value-rejected" }>[];
}

/** Host-supplied orientation values that survived validation. */
export interface ExternalValues {
  rotation?: number;
  tilt?: number;
  scale?: number;
  durationMs: number;
}

export interface RotationArbiterOptions {
  maxTilt: number;
  rotationEpsilon: number;
  scaleEpsilon: number;
  animationDurationMs: number;
}

export function interactionModeEquals(a?: InteractionMode, b?: InteractionMode): boolean {
  const left: InteractionMode = a ?? { kind: "freeRotation" };
  const right: InteractionMode = b ?? { kind: "freeRotation" };
  if (left.kind === "custom" && right.kind === "custom") {
    return left.handler === right.handler;
  }
  return left.kind === right.kind;
}

export function sanitizeExternal(
  host: CardHostConfig,
  options: RotationArbiterOptions
): Pick<ArbiterDecision, "external" | "rejected"> {
  const rejected: ArbiterDecision["rejected"] = [];
  const external: ExternalValues = { durationMs: options.animationDurationMs };

  if (host.rotation !== undefined) {
    if (Number.isFinite(host.rotation)) external.rotation = host.rotation;
    else rejected.push({ type: "value-rejected", field: "rotation", value: host.rotation });
  }
  if (host.tilt !== undefined) {
    if (Number.isFinite(host.tilt)) external.tilt = clampTilt(host.tilt, options.maxTilt);
    else rejected.push({ type: "value-rejected", field: "tilt", value: host.tilt });
  }
  if (host.scale !== undefined) {
    if (Number.isFinite(host.scale) && host.scale > 0) external.scale = host.scale;
    else rejected.push({ type: "value-rejected", field: "scale", value: host.scale });
  }
  if (host.animationDurationMs !== undefined) {
    if (Number.isFinite(host.animationDurationMs) && host.animationDurationMs >= 0) {
      external.durationMs = host.animationDurationMs;
    } else {
      rejected.push({ type: "value-rejected", field: "animationDurationMs", value: host.animationDurationMs });
    }
  }

  return { external, rejected };
}

/**
 * Merges host pushes with local state. Appearance changes rebuild the scene.
 * An external value re-poses the card only when the host changed it since its
 * previous push, so re-sending a stale value never undoes a flip or a drag.
 * While a drag or glide is running, local interaction wins.
 */
export class RotationArbiter {
  constructor(private readonly options: RotationArbiterOptions) {}

  decide(
    previous: CardHostConfig | undefined,
    next: CardHostConfig,
    current: CardPose,
    interactionActive: boolean,
    activeMode: InteractionMode = { kind: "freeRotation" }
  ): ArbiterDecision {
    const { external, rejected } = sanitizeExternal(next, this.options);
    const modeChanged = !interactionModeEquals(activeMode, next.interaction);

    const reasons = rebuildReasons(previous, next);
    if (reasons.length > 0) {
      return { scene: { kind: "rebuild", reasons }, modeChanged, external, rejected };
    }

    const pushed: ExternalValues = previous
      ? sanitizeExternal(previous, this.options).external
      : { durationMs: this.options.animationDurationMs };
    const target = this.diff(external, pushed, current);
    if (target === null) {
      return { scene: { kind: "noop", reason: "unchanged" }, modeChanged, external, rejected };
    }
    if (interactionActive) {
      return { scene: { kind: "noop", reason: "interaction-active" }, modeChanged, external, rejected };
    }
    return {
      scene: { kind: "repose", target, durationMs: external.durationMs },
      modeChanged,
      external,
      rejected,
    };
  }

  private diff(external: ExternalValues, pushed: ExternalValues, current: CardPose): PoseTarget | null {
    const { rotationEpsilon, scaleEpsilon } = this.options;
    const target: PoseTarget = {};
    let changed = false;

    if (moved(external.rotation, pushed.rotation, current.yaw, rotationEpsilon)) {
      target.yaw = external.rotation;
      changed = true;
    }
    if (moved(external.tilt, pushed.tilt, current.pitch, rotationEpsilon)) {
      target.pitch = external.tilt;
      changed = true;
    }
    if (moved(external.scale, pushed.scale, current.scale, scaleEpsilon)) {
      target.scale = external.scale;
      changed = true;
    }
    return changed ? target : null;
  }
}

/** True when the host changed `next` since its last push and it differs from the live value. */
function moved(next: number | undefined, pushed: number | undefined, live: number, epsilon: number): boolean {
  if (next === undefined) return false;
  if (pushed !== undefined && Math.abs(next - pushed) <= epsilon) return false;
  return Math.abs(next - live) > epsilon;
}

function rebuildReasons(previous: CardHostConfig | undefined, next: CardHostConfig): RebuildReason[] {
  if (!previous) return ["initial"];
  const reasons: RebuildReason[] = [];
  if (!cardDataEquals(previous.data, next.data)) reasons.push("data");
  if (!styleEquals(previous.style, next.style)) reasons.push("style");
  if (!visibilityEquals(previous.visibility, next.visibility)) reasons.push("visibility");
  return reasons;
}
