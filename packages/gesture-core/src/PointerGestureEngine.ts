import type { CardCommand, Vec2 } from "@tiltcard/control-core";
import type { GestureDebugState, GestureMode, PointerGestureOptions, PointerSample } from "./types";

const DEFAULTS: Required<PointerGestureOptions> = {
  tapSlop: 8,
  tapMaxDurationMs: 300,
  velocityWindowMs: 100,
  moveDeadzone: 0,
};

type TimedPoint = { x: number; y: number; timestamp: number };

type PressState = {
  pointerId: number;
  origin: TimedPoint;
  maxDistance: number;
  panning: boolean;
  history: TimedPoint[];
};

/**
 * Turns raw single-pointer samples into pan and tap commands. Any pointer
 * other than the first one down is ignored until it lifts.
 */
export class PointerGestureEngine {
  private readonly options: Required<PointerGestureOptions>;
  private press: PressState | null = null;

  constructor(opts?: PointerGestureOptions) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
    if (!(this.options.tapSlop >= 0)) throw new Error(`tapSlop must be non-negative, got ${this.options.tapSlop}`);
    if (!(this.options.velocityWindowMs > 0)) {
      throw new Error(`velocityWindowMs must be positive, got ${this.options.velocityWindowMs}`);
    }
  }

  update(sample: PointerSample): CardCommand[] {
    if (!Number.isFinite(sample.x) || !Number.isFinite(sample.y)) return [];

    if (sample.phase === "down") {
      if (this.press) return [];
      const point = { x: sample.x, y: sample.y, timestamp: sample.timestamp };
      this.press = { pointerId: sample.pointerId, origin: point, maxDistance: 0, panning: false, history: [point] };
      return [];
    }

    const press = this.press;
    if (!press || press.pointerId !== sample.pointerId) return [];

    const point = { x: sample.x, y: sample.y, timestamp: sample.timestamp };
    const translation = { x: point.x - press.origin.x, y: point.y - press.origin.y };
    const distance = Math.hypot(translation.x, translation.y);
    press.maxDistance = Math.max(press.maxDistance, distance);
    press.history.push(point);
    this.trimHistory(press, point.timestamp);

    switch (sample.phase) {
      case "move":
        return this.move(press, translation, distance);
      case "up":
        this.press = null;
        return this.release(press, translation, point.timestamp);
      case "cancel":
        this.press = null;
        return press.panning ? [{ type: "PAN_CANCEL", translation, velocity: estimateVelocity(press.history) }] : [];
    }
  }

  /** Drops any press in progress without emitting commands. */
  reset(): void {
    this.press = null;
  }

  getDebugState(): GestureDebugState {
    return { mode: this.mode(), pointerId: this.press?.pointerId };
  }

  private mode(): GestureMode {
    if (!this.press) return "IDLE";
    return this.press.panning ? "PANNING" : "PRESSED";
  }

  private move(press: PressState, translation: Vec2, distance: number): CardCommand[] {
    const commands: CardCommand[] = [];
    if (!press.panning) {
      if (distance <= this.options.moveDeadzone) return commands;
      press.panning = true;
      commands.push({ type: "PAN_BEGIN" });
    }
    commands.push({ type: "PAN_CHANGE", translation, velocity: estimateVelocity(press.history) });
    return commands;
  }

  private release(press: PressState, translation: Vec2, timestamp: number): CardCommand[] {
    const duration = timestamp - press.origin.timestamp;
    const isTap = press.maxDistance < this.options.tapSlop && duration <= this.options.tapMaxDurationMs;

    if (isTap) {
      const commands: CardCommand[] = [];
      if (press.panning) {
        commands.push({ type: "PAN_CANCEL", translation, velocity: { x: 0, y: 0 } });
      }
      commands.push({ type: "TAP" });
      return commands;
    }
    if (!press.panning) return [];
    return [{ type: "PAN_END", translation, velocity: estimateVelocity(press.history) }];
  }

  private trimHistory(press: PressState, now: number): void {
    const cutoff = now - this.options.velocityWindowMs;
    while (press.history.length > 2 && press.history[0].timestamp < cutoff) {
      press.history.shift();
    }
  }
}

export { DEFAULTS as defaultPointerGestureOptions };

/** Units per second between the oldest and newest retained samples. */
function estimateVelocity(history: TimedPoint[]): Vec2 {
  if (history.length < 2) return { x: 0, y: 0 };
  const first = history[0];
  const last = history[history.length - 1];
  const dt = last.timestamp - first.timestamp;
  if (dt <= 0) return { x: 0, y: 0 };
  return {
    x: ((last.x - first.x) / dt) * 1000,
    y: ((last.y - first.y) / dt) * 1000,
  };
}
