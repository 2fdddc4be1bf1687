export type PointerPhase = "down" | "move" | "up" | "cancel";

export interface PointerSample {
  pointerId: number;
  phase: PointerPhase;
  /** Screen-space position in CSS pixels. */
  x: number;
  y: number;
  /** Milliseconds, any monotonic origin. */
  timestamp: number;
}

export interface PointerGestureOptions {
  /** Maximum displacement for a press to still count as a tap. */
  tapSlop?: number;
  tapMaxDurationMs?: number;
  /** Samples older than this are ignored when estimating release velocity. */
  velocityWindowMs?: number;
  /** Displacement a move must exceed before the pan begins. */
  moveDeadzone?: number;
}

export type GestureMode = "IDLE" | "PRESSED" | "PANNING";

export interface GestureDebugState {
  mode: GestureMode;
  pointerId?: number;
}
