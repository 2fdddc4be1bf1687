import { describe, expect, it } from "vitest";
import { PointerGestureEngine } from "../src/PointerGestureEngine";
import type { PointerPhase, PointerSample } from "../src";

function sample(phase: PointerPhase, x: number, y: number, timestamp: number, pointerId = 1): PointerSample {
  return { pointerId, phase, x, y, timestamp };
}

describe("PointerGestureEngine", () => {
  it("begins a pan on the first move", () => {
    const engine = new PointerGestureEngine();
    expect(engine.update(sample("down", 0, 0, 0))).toEqual([]);
    expect(engine.update(sample("move", 10, 0, 16))).toEqual([
      { type: "PAN_BEGIN" },
      { type: "PAN_CHANGE", translation: { x: 10, y: 0 }, velocity: { x: 625, y: 0 } },
    ]);
    expect(engine.getDebugState()).toEqual({ mode: "PANNING", pointerId: 1 });
  });

  it("emits PAN_CHANGE with cumulative translation afterwards", () => {
    const engine = new PointerGestureEngine();
    engine.update(sample("down", 100, 100, 0));
    engine.update(sample("move", 110, 100, 20));
    const commands = engine.update(sample("move", 130, 90, 40));
    expect(commands).toHaveLength(1);
    expect(commands[0]).toMatchObject({ type: "PAN_CHANGE", translation: { x: 30, y: -10 } });
  });

  it("recognises a short still press as a tap", () => {
    const engine = new PointerGestureEngine();
    engine.update(sample("down", 0, 0, 0));
    expect(engine.getDebugState().mode).toBe("PRESSED");
    expect(engine.update(sample("up", 2, 1, 100))).toEqual([{ type: "TAP" }]);
    expect(engine.getDebugState()).toEqual({ mode: "IDLE", pointerId: undefined });
  });

  it("cancels a pan that stayed within the slop before tapping", () => {
    const engine = new PointerGestureEngine();
    engine.update(sample("down", 0, 0, 0));
    engine.update(sample("move", 3, 0, 20));
    expect(engine.update(sample("up", 3, 0, 120))).toEqual([
      { type: "PAN_CANCEL", translation: { x: 3, y: 0 }, velocity: { x: 0, y: 0 } },
      { type: "TAP" },
    ]);
  });

  it("does not tap after a long press", () => {
    const engine = new PointerGestureEngine();
    engine.update(sample("down", 0, 0, 0));
    expect(engine.update(sample("up", 0, 0, 400))).toEqual([]);
  });

  it("does not tap once the drag left the slop", () => {
    const engine = new PointerGestureEngine();
    engine.update(sample("down", 0, 0, 0));
    engine.update(sample("move", 20, 0, 30));
    engine.update(sample("move", 1, 0, 60));
    const commands = engine.update(sample("up", 1, 0, 90));
    expect(commands).toHaveLength(1);
    expect(commands[0]).toMatchObject({ type: "PAN_END", translation: { x: 1, y: 0 } });
  });

  it("estimates release velocity over the recent window", () => {
    const engine = new PointerGestureEngine();
    engine.update(sample("down", 0, 0, 0));
    engine.update(sample("move", 20, 0, 50));
    engine.update(sample("move", 60, 0, 100));
    engine.update(sample("move", 120, 0, 150));
    const [end] = engine.update(sample("up", 150, 0, 200));

    expect(end.type).toBe("PAN_END");
    if (end.type !== "PAN_END") return;
    expect(end.translation).toEqual({ x: 150, y: 0 });
    expect(end.velocity.x).toBeCloseTo(900);
    expect(end.velocity.y).toBe(0);
  });

  it("reports zero velocity when samples share a timestamp", () => {
    const engine = new PointerGestureEngine();
    engine.update(sample("down", 0, 0, 10));
    const [, change] = engine.update(sample("move", 40, 0, 10));
    expect(change).toEqual({ type: "PAN_CHANGE", translation: { x: 40, y: 0 }, velocity: { x: 0, y: 0 } });
  });

  it("cancels a running pan", () => {
    const engine = new PointerGestureEngine();
    engine.update(sample("down", 0, 0, 0));
    engine.update(sample("move", 0, 40, 100));
    expect(engine.update(sample("cancel", 0, 40, 100))).toEqual([
      { type: "PAN_CANCEL", translation: { x: 0, y: 40 }, velocity: { x: 0, y: 400 } },
    ]);
    expect(engine.getDebugState().mode).toBe("IDLE");
  });

  it("emits nothing when a press is cancelled before panning", () => {
    const engine = new PointerGestureEngine();
    engine.update(sample("down", 0, 0, 0));
    expect(engine.update(sample("cancel", 0, 0, 50))).toEqual([]);
  });

  it("tracks a single pointer", () => {
    const engine = new PointerGestureEngine();
    engine.update(sample("down", 0, 0, 0, 1));
    expect(engine.update(sample("down", 50, 50, 5, 2))).toEqual([]);
    expect(engine.update(sample("move", 80, 50, 10, 2))).toEqual([]);
    expect(engine.update(sample("up", 80, 50, 20, 2))).toEqual([]);
    expect(engine.getDebugState()).toEqual({ mode: "PRESSED", pointerId: 1 });
  });

  it("holds the pan back until the deadzone is exceeded", () => {
    const engine = new PointerGestureEngine({ moveDeadzone: 5 });
    engine.update(sample("down", 0, 0, 0));
    expect(engine.update(sample("move", 3, 0, 10))).toEqual([]);
    const commands = engine.update(sample("move", 6, 0, 20));
    expect(commands.map((c) => c.type)).toEqual(["PAN_BEGIN", "PAN_CHANGE"]);
  });

  it("ignores non-finite samples", () => {
    const engine = new PointerGestureEngine();
    engine.update(sample("down", 0, 0, 0));
    expect(engine.update(sample("move", Number.NaN, 0, 10))).toEqual([]);
    expect(engine.getDebugState().mode).toBe("PRESSED");
  });

  it("forgets the press on reset", () => {
    const engine = new PointerGestureEngine();
    engine.update(sample("down", 0, 0, 0));
    engine.reset();
    expect(engine.update(sample("up", 0, 0, 50))).toEqual([]);
  });

  it("rejects invalid options", () => {
    expect(() => new PointerGestureEngine({ velocityWindowMs: 0 })).toThrow("velocityWindowMs");
    expect(() => new PointerGestureEngine({ tapSlop: -1 })).toThrow("tapSlop");
  });
});
