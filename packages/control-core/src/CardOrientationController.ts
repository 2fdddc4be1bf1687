import { mergeConfig } from "./config";
import { FlipController } from "./FlipController";
import { GestureTranslator } from "./GestureTranslator";
import { InertiaIntegrator } from "./InertiaIntegrator";
import { attachInteraction, type InteractionBinding } from "./interaction";
import { createLogger } from "./logger";
import { OrientationState } from "./OrientationState";
import { RotationArbiter, type ArbiterDecision } from "./RotationArbiter";
import { TaskScheduler, type FrameClock } from "./TaskScheduler";
import type {
  CardCommand,
  CardControllerConfig,
  CardControllerError,
  CardHostConfig,
  CardPose,
  CardRenderer,
  HapticCue,
  HapticsSink,
  InteractionContext,
  InteractionMode,
  Logger,
  OrientationListener,
  OrientationSource,
  RenderHint,
  ResolvedCardControllerConfig,
  Vec2,
} from "./types";

export interface CardOrientationControllerOptions {
  config?: CardControllerConfig;
  haptics?: HapticsSink;
  clock?: FrameClock;
  logger?: Logger;
  onError?: (error: CardControllerError) => void;
}

export interface CardControllerDebugState {
  mode: InteractionMode["kind"];
  dragging: boolean;
  gliding: boolean;
  autoReturnPending: boolean;
  pendingTasks: number;
  rendererAttached: boolean;
}

/**
 * Owns the orientation of one card. Gestures, inertia, flips and host pushes
 * all write through here; the renderer only ever receives committed poses.
 */
export class CardOrientationController<Handle = unknown> {
  private readonly config: ResolvedCardControllerConfig;
  private readonly state: OrientationState;
  private readonly scheduler: TaskScheduler;
  private readonly translator: GestureTranslator;
  private readonly inertia: InertiaIntegrator;
  private readonly flipper: FlipController;
  private readonly arbiter: RotationArbiter;
  private readonly logger: Logger;
  private readonly listeners = new Set<OrientationListener>();

  private renderer: CardRenderer<Handle> | null = null;
  private sceneHandle: Handle | null = null;
  private host: CardHostConfig | undefined;
  private pendingHost: CardHostConfig | undefined;
  private binding: InteractionBinding;
  private mode: InteractionMode = { kind: "freeRotation" };
  private disposed = false;

  private readonly context: InteractionContext = {
    pose: () => this.state.snapshot(),
    beginDrag: () => this.beginDrag(),
    dragTo: (translation: Vec2) => {
      this.translator.change(translation);
    },
    endDrag: (velocity: Vec2) => this.endDrag(velocity),
    flip: () => this.flip(),
    cancelInteraction: () => this.cancelInteraction(),
  };

  constructor(private readonly options: CardOrientationControllerOptions = {}) {
    this.config = mergeConfig(options.config);
    this.logger = options.logger ?? createLogger("controller", this.config.logLevel);
    this.state = new OrientationState(this.config.maxTilt);
    this.scheduler = new TaskScheduler(options.clock);

    this.translator = new GestureTranslator(this.state, this.config, {
      now: () => this.scheduler.now(),
      haptic: (cue, intensity) => this.haptic(cue, intensity),
      commit: (hint) => this.commit("gesture", hint),
    });

    this.inertia = new InertiaIntegrator(this.state, this.config.inertia, this.scheduler, {
      onTick: () => this.commit("inertia"),
      onComplete: () => {
        this.haptic("settle", 0.6);
        this.settle();
      },
    });

    this.flipper = new FlipController(this.state, this.config, {
      scheduler: this.scheduler,
      haptic: (cue, intensity) => this.haptic(cue, intensity),
      commit: (source, hint) => this.commit(source, hint),
    });

    this.arbiter = new RotationArbiter({
      maxTilt: this.config.maxTilt,
      ...this.config.external,
    });

    this.binding = attachInteraction(this.mode, this.context);
  }

  attachRenderer(renderer: CardRenderer<Handle>): void {
    if (this.disposed) return;
    this.renderer = renderer;
    this.sceneHandle = null;
    const host = this.pendingHost ?? this.host;
    this.pendingHost = undefined;
    // A fresh renderer has no scene yet, so the next host config always rebuilds.
    this.host = undefined;
    if (host) this.apply(host);
  }

  detachRenderer(): void {
    this.cancelInteraction();
    this.flipper.cancel();
    this.pendingHost = this.pendingHost ?? this.host;
    this.host = undefined;
    this.renderer = null;
    this.sceneHandle = null;
  }

  /** Pushes the host's desired configuration; applied once a renderer is attached. */
  update(host: CardHostConfig): void {
    if (this.disposed) return;
    if (!this.renderer) {
      this.pendingHost = host;
      return;
    }
    this.apply(host);
  }

  handle(command: CardCommand): void {
    if (this.disposed) {
      this.report({ type: "event-dropped", reason: "disposed", command });
      return;
    }
    if (!this.renderer) {
      this.logger.debug("dropping", command.type, "before a renderer is attached");
      this.report({ type: "event-dropped", reason: "no-renderer", command });
      return;
    }
    this.binding.dispatch(command);
  }

  /** Toggles the face. Ignored in `disabled` mode and while a drag has broken away from friction. */
  flip(): void {
    if (this.disposed || !this.renderer) return;
    if (this.mode.kind === "disabled") {
      this.logger.debug("flip ignored while interaction is disabled");
      return;
    }
    if (this.translator.isActive && this.translator.hasBrokenFriction) {
      this.logger.debug("tap ignored during drag");
      return;
    }
    this.cancelInteraction();
    this.flipper.flip();
  }

  subscribe(listener: OrientationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getPose(): CardPose {
    return this.state.snapshot();
  }

  getSceneHandle(): Handle | null {
    return this.sceneHandle;
  }

  isInteracting(): boolean {
    return this.translator.isActive || this.inertia.isActive;
  }

  getDebugState(): CardControllerDebugState {
    return {
      mode: this.mode.kind,
      dragging: this.translator.isActive,
      gliding: this.inertia.isActive,
      autoReturnPending: this.flipper.isAutoReturnPending,
      pendingTasks: this.scheduler.pendingCount,
      rendererAttached: this.renderer !== null,
    };
  }

  dispose(): void {
    if (this.disposed) return;
    this.binding.detach();
    this.scheduler.cancelAll();
    this.listeners.clear();
    this.renderer = null;
    this.sceneHandle = null;
    this.disposed = true;
  }

  private apply(host: CardHostConfig): void {
    const renderer = this.renderer;
    if (!renderer) return;

    const decision = this.arbiter.decide(this.host, host, this.state.snapshot(), this.isInteracting(), this.mode);
    for (const rejected of decision.rejected) {
      this.logger.debug("rejected host value", rejected.field, rejected.value);
      this.report(rejected);
    }
    if (decision.modeChanged) {
      this.rebind(host.interaction ?? { kind: "freeRotation" });
    }
    this.host = host;

    const { scene } = decision;
    switch (scene.kind) {
      case "rebuild":
        this.logger.debug("rebuilding scene:", scene.reasons.join(", "));
        this.rebuild(renderer, host, decision.external);
        break;
      case "repose":
        this.flipper.cancelAutoReturn();
        if (scene.target.yaw !== undefined) this.state.setYaw(scene.target.yaw);
        if (scene.target.pitch !== undefined) this.state.setPitch(scene.target.pitch);
        if (scene.target.scale !== undefined) this.state.setScale(scene.target.scale);
        this.commit("external", { durationMs: scene.durationMs, easing: "easeInOut" });
        break;
      case "noop":
        if (scene.reason === "interaction-active") {
          this.logger.debug("external rotation ignored while interacting");
        }
        break;
    }
  }

  private rebuild(renderer: CardRenderer<Handle>, host: CardHostConfig, external: ArbiterDecision["external"]): void {
    this.cancelInteraction();
    this.flipper.cancel();
    this.sceneHandle = renderer.rebuild({ data: host.data, style: host.style, visibility: host.visibility });
    this.state.reset({
      yaw: external.rotation ?? 0,
      pitch: external.tilt ?? 0,
      scale: external.scale,
      isShowingBack: false,
    });
    this.commit("rebuild");
  }

  private rebind(mode: InteractionMode): void {
    this.binding.detach();
    this.mode = mode;
    this.binding = attachInteraction(mode, this.context);
    this.logger.debug("interaction mode:", mode.kind);
  }

  private beginDrag(): void {
    this.cancelInteraction();
    this.translator.begin();
  }

  private endDrag(velocity: Vec2): void {
    const handoff = this.translator.end(velocity);
    if (!handoff) return;
    if (this.config.inertia.enabled && this.inertia.start(handoff)) return;
    this.settle();
  }

  private settle(): void {
    if (this.config.autoReturn.enabled) {
      this.flipper.scheduleAutoReturn();
    }
  }

  private cancelInteraction(): void {
    this.translator.cancelSession();
    this.inertia.cancel();
    this.flipper.cancelAutoReturn();
  }

  private commit(source: OrientationSource, hint?: RenderHint): void {
    const renderer = this.renderer;
    if (!renderer) return;
    const pose = this.state.snapshot();
    renderer.commit(pose, hint);
    for (const listener of this.listeners) {
      listener({ pose, source });
    }
  }

  private haptic(cue: HapticCue, intensity: number): void {
    const sink = this.options.haptics;
    if (!sink) return;
    try {
      sink.play(cue, intensity);
    } catch (error) {
      this.logger.warn("haptics failed for", cue, error);
      this.report({ type: "haptics-failed", cue, error });
    }
  }

  private report(error: CardControllerError): void {
    this.options.onError?.(error);
  }
}
