import type { CardData, CardSceneSpec, CardStyle, TextVisibility } from "@tiltcard/card-core";

export interface Vec2 {
  x: number;
  y: number;
}

export type CardCommand =
  | { type: "PAN_BEGIN" }
  | { type: "PAN_CHANGE"; translation: Vec2; velocity: Vec2 }
  | { type: "PAN_END"; translation: Vec2; velocity: Vec2 }
  | { type: "PAN_CANCEL"; translation: Vec2; velocity: Vec2 }
  | { type: "TAP" };

/** The single tuple the renderer consumes. */
export interface CardPose {
  readonly yaw: number;
  readonly pitch: number;
  readonly scale: number;
  readonly isShowingBack: boolean;
}

export type EasingName = "linear" | "easeOut" | "easeInOut" | "flipOvershoot" | "spring";

/** Interpolation hint for the renderer. Never awaited. */
export interface RenderHint {
  durationMs: number;
  easing: EasingName;
}

export interface CardRenderer<Handle = unknown> {
  rebuild(scene: CardSceneSpec): Handle;
  commit(pose: CardPose, hint?: RenderHint): void;
}

export type HapticCue = "gestureStart" | "frictionBreak" | "rotationTick" | "flip" | "settle";

export interface HapticsSink {
  play(cue: HapticCue, intensity: number): void;
}

export type OrientationSource = "gesture" | "inertia" | "flip" | "autoReturn" | "external" | "rebuild";

export interface OrientationChange {
  pose: CardPose;
  source: OrientationSource;
}

export type OrientationListener = (change: OrientationChange) => void;

/**
 * Capabilities an interaction handler may drive. Built-in modes use the same
 * surface as custom handlers.
 */
export interface InteractionContext {
  pose(): CardPose;
  beginDrag(): void;
  dragTo(translation: Vec2, velocity: Vec2): void;
  endDrag(velocity: Vec2): void;
  flip(): void;
  /** Cancels the drag, inertia and any pending auto-return. */
  cancelInteraction(): void;
}

export interface CardInteractionHandler {
  attach(context: InteractionContext): void;
  handle(command: CardCommand, context: InteractionContext): void;
  detach(): void;
}

export type InteractionMode =
  | { kind: "freeRotation" }
  | { kind: "tapOnly" }
  | { kind: "disabled" }
  | { kind: "custom"; handler: CardInteractionHandler };

/** What the hosting view pushes; any field may change at any time. */
export interface CardHostConfig {
  data: CardData;
  style: CardStyle;
  visibility: TextVisibility;
  /** Externally bound yaw, radians. */
  rotation?: number;
  /** Externally bound pitch, radians. */
  tilt?: number;
  scale?: number;
  animationDurationMs?: number;
  interaction?: InteractionMode;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export type CardControllerError =
  | { type: "haptics-failed"; cue: HapticCue; error: unknown }
  | { type: "event-dropped"; reason: "no-renderer" | "disposed"; command: CardCommand }
  | { type: "value-rejected"; field: "rotation" | "tilt" | "scale" | "animationDurationMs"; value: unknown };

export interface CardInertiaConfig {
  enabled?: boolean;
  decayRate?: number;
  minVelocity?: number;
}

export interface CardFrictionConfig {
  /** Drag distance before full sensitivity applies. */
  threshold?: number;
  /** Multiplier at zero distance. */
  floor?: number;
}

export interface CardFlipConfig {
  durationMs?: number;
  settleCueDelayMs?: number;
}

export interface CardAutoReturnConfig {
  enabled?: boolean;
  idleDelayMs?: number;
  durationMs?: number;
}

export interface CardExternalConfig {
  rotationEpsilon?: number;
  scaleEpsilon?: number;
  animationDurationMs?: number;
}

export interface CardHapticsConfig {
  rotationStep?: number;
  minIntervalMs?: number;
}

export interface CardControllerConfig {
  maxTilt?: number;
  rotationSpeed?: number;
  verticalDamping?: number;
  velocityScale?: number;
  dragAnimationMs?: number;
  friction?: CardFrictionConfig;
  inertia?: CardInertiaConfig;
  flip?: CardFlipConfig;
  autoReturn?: CardAutoReturnConfig;
  external?: CardExternalConfig;
  haptics?: CardHapticsConfig;
  logLevel?: LogLevel;
}

export interface ResolvedCardControllerConfig {
  maxTilt: number;
  rotationSpeed: number;
  verticalDamping: number;
  velocityScale: number;
  dragAnimationMs: number;
  friction: Required<CardFrictionConfig>;
  inertia: Required<CardInertiaConfig>;
  flip: Required<CardFlipConfig>;
  autoReturn: Required<CardAutoReturnConfig>;
  external: Required<CardExternalConfig>;
  haptics: Required<CardHapticsConfig>;
  logLevel?: LogLevel;
}
