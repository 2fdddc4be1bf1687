import { describe, expect, it } from "vitest";
import { GestureTranslator, OrientationState, defaultCardControllerConfig, frictionMultiplier } from "../src";
import type { HapticCue, RenderHint } from "../src";

function setup() {
  const state = new OrientationState(0.15);
  const cues: HapticCue[] = [];
  const hints: RenderHint[] = [];
  let now = 0;
  const translator = new GestureTranslator(state, defaultCardControllerConfig, {
    now: () => now,
    haptic: (cue) => cues.push(cue),
    commit: (hint) => hints.push(hint),
  });
  return { state, translator, cues, hints, setNow: (t: number) => (now = t) };
}

describe("frictionMultiplier", () => {
  it("eases from the floor to full sensitivity", () => {
    expect(frictionMultiplier(0, 8, 0.4)).toBe(0.4);
    expect(frictionMultiplier(4, 8, 0.4)).toBeCloseTo(0.925);
    expect(frictionMultiplier(8, 8, 0.4)).toBe(1);
    expect(frictionMultiplier(40, 8, 0.4)).toBe(1);
  });
});

describe("GestureTranslator", () => {
  it("rotates 200 units of drag to 2.4 rad", () => {
    const { state, translator, cues, hints } = setup();
    translator.begin();
    translator.change({ x: 200, y: 0 });

    expect(state.yaw).toBeCloseTo(2.4);
    expect(translator.hasBrokenFriction).toBe(true);
    expect(cues).toEqual(["gestureStart", "frictionBreak", "rotationTick"]);
    expect(hints).toEqual([{ durationMs: 80, easing: "easeOut" }]);
  });

  it("follows originYaw + dx * speed * multiplier for any drag", () => {
    for (const dx of [2, 5, 7.9, 8, 50, -120]) {
      const { state, translator } = setup();
      state.setYaw(0.3);
      translator.begin();
      translator.change({ x: dx, y: 0 });

      const d = Math.abs(dx);
      const m = d >= 8 ? 1 : frictionMultiplier(d, 8, 0.4);
      expect(state.yaw).toBeCloseTo(0.3 + dx * 0.012 * m, 12);
    }
  });

  it("resists the first units of drag", () => {
    const { state, translator, cues } = setup();
    translator.begin();
    translator.change({ x: 4, y: 0 });

    expect(state.yaw).toBeCloseTo(4 * 0.012 * 0.925);
    expect(translator.hasBrokenFriction).toBe(false);
    expect(cues).not.toContain("frictionBreak");
  });

  it("keeps friction broken for the rest of the session", () => {
    const { state, translator, cues } = setup();
    translator.begin();
    translator.change({ x: 10, y: 0 });
    translator.change({ x: 4, y: 0 });

    expect(state.yaw).toBeCloseTo(0.048);
    expect(cues.filter((c) => c === "frictionBreak")).toHaveLength(1);
  });

  it("clamps pitch whatever the vertical drag", () => {
    const { state, translator } = setup();
    translator.begin();
    translator.change({ x: 0, y: -1000 });
    expect(state.pitch).toBe(0.15);
    translator.change({ x: 0, y: 1000 });
    expect(state.pitch).toBe(-0.15);
  });

  it("tilts against the vertical drag with damping", () => {
    const { state, translator } = setup();
    translator.begin();
    translator.change({ x: 0, y: 20 });
    expect(state.pitch).toBeCloseTo(-20 * 0.012 * 0.4);
  });

  it("hands release velocity over as angular velocity", () => {
    const { translator } = setup();
    translator.begin();
    translator.change({ x: 30, y: 0 });
    const handoff = translator.end({ x: 1500, y: 500 });

    expect(handoff?.yaw).toBeCloseTo(0.03);
    expect(handoff?.pitch).toBeCloseTo(-0.004);
    expect(translator.isActive).toBe(false);
  });

  it("ignores changes and ends without a session", () => {
    const { state, translator } = setup();
    expect(translator.change({ x: 100, y: 0 })).toBe(false);
    expect(translator.end({ x: 100, y: 0 })).toBeNull();
    expect(state.yaw).toBe(0);
  });

  it("throttles rotation ticks by angle and time", () => {
    const { translator, cues, setNow } = setup();
    translator.begin();
    translator.change({ x: 10, y: 0 });
    translator.change({ x: 20, y: 0 });
    setNow(60);
    translator.change({ x: 30, y: 0 });
    translator.change({ x: 31, y: 0 });

    expect(cues.filter((c) => c === "rotationTick")).toHaveLength(2);
  });
});
