import type { EasingName } from "./types";

export type EasingFn = (t: number) => number;

export const linear: EasingFn = (t) => t;

export const easeOutCubic: EasingFn = (t) => 1 - Math.pow(1 - t, 3);

export const easeInOutCubic: EasingFn = (t) => (t < 0.5 ? 4 * t * t * t : 1 - Math.pow(-2 * t + 2, 3) / 2);

/**
 * CSS-style cubic-bezier timing function with endpoints (0,0) and (1,1).
 * Solves x(s) = t by Newton iteration, falling back to bisection.
 */
export function cubicBezier(x1: number, y1: number, x2: number, y2: number): EasingFn {
  const bx = (s: number) => 3 * x1 * s * (1 - s) * (1 - s) + 3 * x2 * s * s * (1 - s) + s * s * s;
  const by = (s: number) => 3 * y1 * s * (1 - s) * (1 - s) + 3 * y2 * s * s * (1 - s) + s * s * s;
  const dx = (s: number) =>
    3 * x1 * (1 - s) * (1 - s) + 6 * (x2 - x1) * s * (1 - s) + 3 * (1 - x2) * s * s;

  return (t) => {
    if (t <= 0) return 0;
    if (t >= 1) return 1;

    let s = t;
    for (let i = 0; i < 8; i++) {
      const err = bx(s) - t;
      if (Math.abs(err) < 1e-7) return by(s);
      const d = dx(s);
      if (Math.abs(d) < 1e-6) break;
      s -= err / d;
    }

    let lo = 0;
    let hi = 1;
    s = t;
    for (let i = 0; i < 40; i++) {
      const x = bx(s);
      if (Math.abs(x - t) < 1e-7) break;
      if (x < t) lo = s;
      else hi = s;
      s = (lo + hi) / 2;
    }
    return by(s);
  };
}

/** Overshoots past the target before settling, reads as a physical snap. */
export const flipOvershoot: EasingFn = cubicBezier(0.34, 1.35, 0.64, 1.0);

/** Under-damped spring normalised to land exactly on 1 at t = 1. */
export const spring: EasingFn = (t) => {
  if (t <= 0) return 0;
  if (t >= 1) return 1;
  const damping = 6;
  const frequency = 2.2 * Math.PI;
  return 1 - Math.exp(-damping * t) * Math.cos(frequency * t) * (1 - t);
};

const EASINGS: Record<EasingName, EasingFn> = {
  linear,
  easeOut: easeOutCubic,
  easeInOut: easeInOutCubic,
  flipOvershoot,
  spring,
};

export function resolveEasing(name: EasingName): EasingFn {
  return EASINGS[name];
}
