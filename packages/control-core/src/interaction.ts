import type { CardCommand, InteractionContext, InteractionMode } from "./types";

export interface InteractionBinding {
  readonly kind: InteractionMode["kind"];
  dispatch(command: CardCommand): void;
  detach(): void;
}

function dispatchFreeRotation(command: CardCommand, context: InteractionContext): void {
  switch (command.type) {
    case "PAN_BEGIN":
      context.beginDrag();
      break;
    case "PAN_CHANGE":
      context.dragTo(command.translation, command.velocity);
      break;
    case "PAN_END":
    case "PAN_CANCEL":
      context.endDrag(command.velocity);
      break;
    case "TAP":
      context.flip();
      break;
    default:
      break;
  }
}

/** Wires one interaction mode to the controller; `detach` stops any session it started. */
export function attachInteraction(mode: InteractionMode, context: InteractionContext): InteractionBinding {
  switch (mode.kind) {
    case "freeRotation":
      return {
        kind: mode.kind,
        dispatch: (command) => dispatchFreeRotation(command, context),
        detach: () => context.cancelInteraction(),
      };
    case "tapOnly":
      return {
        kind: mode.kind,
        dispatch: (command) => {
          if (command.type === "TAP") context.flip();
        },
        detach: () => context.cancelInteraction(),
      };
    case "disabled":
      return {
        kind: mode.kind,
        dispatch: () => undefined,
        detach: () => undefined,
      };
    case "custom": {
      const { handler } = mode;
      handler.attach(context);
      return {
        kind: mode.kind,
        dispatch: (command) => handler.handle(command, context),
        detach: () => {
          handler.detach();
          context.cancelInteraction();
        },
      };
    }
  }
}
