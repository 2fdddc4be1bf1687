import type { CardControllerConfig, ResolvedCardControllerConfig } from "./types";

const DEFAULT_CONFIG: ResolvedCardControllerConfig = {
  maxTilt: 0.15,
  rotationSpeed: 0.012,
  verticalDamping: 0.4,
  velocityScale: 0.00002,
  dragAnimationMs: 80,
  friction: { threshold: 8, floor: 0.4 },
  inertia: { enabled: true, decayRate: 0.95, minVelocity: 0.001 },
  flip: { durationMs: 500, settleCueDelayMs: 400 },
  autoReturn: { enabled: true, idleDelayMs: 2000, durationMs: 300 },
  external: { rotationEpsilon: 0.001, scaleEpsilon: 0.001, animationDurationMs: 150 },
  haptics: { rotationStep: 0.05, minIntervalMs: 50 },
};

export function mergeConfig(config?: CardControllerConfig): ResolvedCardControllerConfig {
  const merged: ResolvedCardControllerConfig = {
    ...DEFAULT_CONFIG,
    ...config,
    friction: { ...DEFAULT_CONFIG.friction, ...(config?.friction ?? {}) },
    inertia: { ...DEFAULT_CONFIG.inertia, ...(config?.inertia ?? {}) },
    flip: { ...DEFAULT_CONFIG.flip, ...(config?.flip ?? {}) },
    autoReturn: { ...DEFAULT_CONFIG.autoReturn, ...(config?.autoReturn ?? {}) },
    external: { ...DEFAULT_CONFIG.external, ...(config?.external ?? {}) },
    haptics: { ...DEFAULT_CONFIG.haptics, ...(config?.haptics ?? {}) },
  };
  validateConfig(merged);
  return merged;
}

function validateConfig(config: ResolvedCardControllerConfig): void {
  requirePositive("maxTilt", config.maxTilt);
  requirePositive("rotationSpeed", config.rotationSpeed);
  requireNonNegative("verticalDamping", config.verticalDamping);
  requireNonNegative("velocityScale", config.velocityScale);
  requireNonNegative("dragAnimationMs", config.dragAnimationMs);
  requirePositive("friction.threshold", config.friction.threshold);
  if (!(config.friction.floor > 0 && config.friction.floor <= 1)) {
    throw new Error(`friction.floor must be in (0, 1], got ${config.friction.floor}`);
  }
  if (!(config.inertia.decayRate > 0 && config.inertia.decayRate < 1)) {
    throw new Error(`inertia.decayRate must be in (0, 1), got ${config.inertia.decayRate}`);
  }
  requirePositive("inertia.minVelocity", config.inertia.minVelocity);
  requireNonNegative("flip.durationMs", config.flip.durationMs);
  requireNonNegative("flip.settleCueDelayMs", config.flip.settleCueDelayMs);
  requireNonNegative("autoReturn.idleDelayMs", config.autoReturn.idleDelayMs);
  requireNonNegative("autoReturn.durationMs", config.autoReturn.durationMs);
  requireNonNegative("external.rotationEpsilon", config.external.rotationEpsilon);
  requireNonNegative("external.scaleEpsilon", config.external.scaleEpsilon);
  requireNonNegative("external.animationDurationMs", config.external.animationDurationMs);
  requireNonNegative("haptics.rotationStep", config.haptics.rotationStep);
  requireNonNegative("haptics.minIntervalMs", config.haptics.minIntervalMs);
}

function requirePositive(field: string, value: number): void {
  if (!(Number.isFinite(value) && value > 0)) {
    throw new Error(`${field} must be a positive number, got ${value}`);
  }
}

function requireNonNegative(field: string, value: number): void {
  if (!(Number.isFinite(value) && value >= 0)) {
    throw new Error(`${field} must be a non-negative number, got ${value}`);
  }
}

export { DEFAULT_CONFIG as defaultCardControllerConfig };
