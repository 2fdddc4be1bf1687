import { describe, expect, it } from "vitest";
import { attachInteraction } from "../src";
import type { CardCommand, CardInteractionHandler, InteractionContext } from "../src";

function recordingContext() {
  const calls: string[] = [];
  const context: InteractionContext = {
    pose: () => ({ yaw: 0, pitch: 0, scale: 1, isShowingBack: false }),
    beginDrag: () => calls.push("beginDrag"),
    dragTo: (translation) => calls.push(`dragTo ${translation.x},${translation.y}`),
    endDrag: (velocity) => calls.push(`endDrag ${velocity.x},${velocity.y}`),
    flip: () => calls.push("flip"),
    cancelInteraction: () => calls.push("cancel"),
  };
  return { calls, context };
}

const drag: CardCommand[] = [
  { type: "PAN_BEGIN" },
  { type: "PAN_CHANGE", translation: { x: 12, y: -3 }, velocity: { x: 0, y: 0 } },
  { type: "PAN_END", translation: { x: 20, y: -3 }, velocity: { x: 400, y: 10 } },
  { type: "TAP" },
];

describe("attachInteraction", () => {
  it("maps gestures to drag and flip in free rotation", () => {
    const { calls, context } = recordingContext();
    const binding = attachInteraction({ kind: "freeRotation" }, context);
    drag.forEach((c) => binding.dispatch(c));
    binding.dispatch({ type: "PAN_CANCEL", translation: { x: 0, y: 0 }, velocity: { x: 0, y: 0 } });

    expect(calls).toEqual(["beginDrag", "dragTo 12,-3", "endDrag 400,10", "flip", "endDrag 0,0"]);
  });

  it("only flips in tap-only mode", () => {
    const { calls, context } = recordingContext();
    const binding = attachInteraction({ kind: "tapOnly" }, context);
    drag.forEach((c) => binding.dispatch(c));
    expect(calls).toEqual(["flip"]);
  });

  it("ignores everything when disabled", () => {
    const { calls, context } = recordingContext();
    const binding = attachInteraction({ kind: "disabled" }, context);
    drag.forEach((c) => binding.dispatch(c));
    binding.detach();
    expect(binding.kind).toBe("disabled");
    expect(calls).toEqual([]);
  });

  it("stops running sessions on detach", () => {
    const { calls, context } = recordingContext();
    attachInteraction({ kind: "freeRotation" }, context).detach();
    expect(calls).toEqual(["cancel"]);
  });

  it("hands commands and the context to a custom handler", () => {
    const { calls, context } = recordingContext();
    const seen: string[] = [];
    const handler: CardInteractionHandler = {
      attach: (ctx) => seen.push(ctx === context ? "attach" : "attach?"),
      handle: (command, ctx) => {
        seen.push(command.type);
        if (command.type === "TAP") ctx.flip();
      },
      detach: () => seen.push("detach"),
    };

    const binding = attachInteraction({ kind: "custom", handler }, context);
    binding.dispatch({ type: "PAN_BEGIN" });
    binding.dispatch({ type: "TAP" });
    binding.detach();

    expect(seen).toEqual(["attach", "PAN_BEGIN", "TAP", "detach"]);
    expect(calls).toEqual(["flip", "cancel"]);
  });
});
