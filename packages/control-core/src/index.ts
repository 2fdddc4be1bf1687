export * from "./types";
export { CardOrientationController } from "./CardOrientationController";
export type { CardOrientationControllerOptions, CardControllerDebugState } from "./CardOrientationController";
export { OrientationState, clampTilt } from "./OrientationState";
export { InertiaIntegrator } from "./InertiaIntegrator";
export type { AngularVelocity, InertiaCallbacks, InertiaOptions } from "./InertiaIntegrator";
export { GestureTranslator, frictionMultiplier } from "./GestureTranslator";
export type { GestureTranslatorDeps, GestureTranslatorOptions } from "./GestureTranslator";
export { FlipController, nearestRestYaw } from "./FlipController";
export type { FlipControllerDeps, FlipControllerOptions } from "./FlipController";
export { RotationArbiter, interactionModeEquals, sanitizeExternal } from "./RotationArbiter";
export type {
  ArbiterDecision,
  ExternalValues,
  PoseTarget,
  RebuildDecision,
  RebuildReason,
  RotationArbiterOptions,
} from "./RotationArbiter";
export { attachInteraction } from "./interaction";
export type { InteractionBinding } from "./interaction";
export { TaskScheduler, createDefaultFrameClock } from "./TaskScheduler";
export type { FrameClock, TaskHandle } from "./TaskScheduler";
export { createLogger, resolveLogLevel } from "./logger";
export {
  cubicBezier,
  easeInOutCubic,
  easeOutCubic,
  flipOvershoot,
  linear,
  resolveEasing,
  spring,
} from "./easing";
export type { EasingFn } from "./easing";
export { mergeConfig, defaultCardControllerConfig } from "./config";
