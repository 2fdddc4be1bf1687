import { useEffect, useRef, useState } from "react";
import { CardOrientationController } from "@tiltcard/control-core";
import type {
  CardControllerConfig,
  CardControllerError,
  CardHostConfig,
  CardRenderer,
  HapticsSink,
  Logger,
  OrientationChange,
} from "@tiltcard/control-core";
import { PointerGestureEngine } from "@tiltcard/gesture-core";
import type { PointerGestureOptions, PointerPhase } from "@tiltcard/gesture-core";

export type UseCardControllerOptions<Handle> = {
  host: CardHostConfig;
  /** Attached as soon as it is non-null; swapping it rebuilds the scene. */
  renderer: CardRenderer<Handle> | null;
  /** Read once, when the controller is created. */
  config?: CardControllerConfig;
  haptics?: HapticsSink;
  logger?: Logger;
  gestureOptions?: PointerGestureOptions;
  onPoseChange?: (change: OrientationChange) => void;
  onError?: (error: CardControllerError) => void;
};

export function useCardController<Handle>(options: UseCardControllerOptions<Handle>) {
  const { host, renderer, gestureOptions } = options;
  const targetRef = useRef<HTMLDivElement>(null);
  const [controller, setController] = useState<CardOrientationController<Handle> | null>(null);

  const engineRef = useRef(new PointerGestureEngine(gestureOptions));
  useEffect(() => {
    engineRef.current = new PointerGestureEngine(gestureOptions);
  }, [gestureOptions]);

  const onPoseChangeRef = useRef(options.onPoseChange);
  useEffect(() => {
    onPoseChangeRef.current = options.onPoseChange;
  }, [options.onPoseChange]);

  const onErrorRef = useRef(options.onError);
  useEffect(() => {
    onErrorRef.current = options.onError;
  }, [options.onError]);

  const initRef = useRef({ config: options.config, haptics: options.haptics, logger: options.logger });

  useEffect(() => {
    const { config, haptics, logger } = initRef.current;
    const created = new CardOrientationController<Handle>({
      config,
      haptics,
      logger,
      onError: (error) => onErrorRef.current?.(error),
    });
    const unsubscribe = created.subscribe((change) => onPoseChangeRef.current?.(change));
    setController(created);
    return () => {
      unsubscribe();
      created.dispose();
      setController(null);
    };
  }, []);

  useEffect(() => {
    if (!controller || !renderer) return;
    controller.attachRenderer(renderer);
    return () => controller.detachRenderer();
  }, [controller, renderer]);

  useEffect(() => {
    controller?.update(host);
  }, [controller, host]);

  useEffect(() => {
    const el = targetRef.current;
    if (!el || !controller) return;

    const forward = (phase: PointerPhase) => (ev: PointerEvent) => {
      if (phase === "down") {
        if (ev.button !== 0) return;
        el.setPointerCapture(ev.pointerId);
      }
      const commands = engineRef.current.update({
        pointerId: ev.pointerId,
        phase,
        x: ev.clientX,
        y: ev.clientY,
        timestamp: ev.timeStamp,
      });
      for (const command of commands) {
        controller.handle(command);
      }
    };

    const onPointerDown = forward("down");
    const onPointerMove = forward("move");
    const onPointerUp = forward("up");
    const onPointerCancel = forward("cancel");

    el.addEventListener("pointerdown", onPointerDown);
    el.addEventListener("pointermove", onPointerMove);
    el.addEventListener("pointerup", onPointerUp);
    el.addEventListener("pointercancel", onPointerCancel);

    return () => {
      el.removeEventListener("pointerdown", onPointerDown);
      el.removeEventListener("pointermove", onPointerMove);
      el.removeEventListener("pointerup", onPointerUp);
      el.removeEventListener("pointercancel", onPointerCancel);
      engineRef.current.reset();
    };
  }, [controller]);

  return { targetRef, controller } as const;
}
