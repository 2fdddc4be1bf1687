import type { CardPose } from "./types";

export function clampTilt(pitch: number, maxTilt: number): number {
  return Math.min(Math.max(pitch, -maxTilt), maxTilt);
}

/**
 * Authoritative orientation of one card. Yaw is left unwrapped so momentum can
 * carry it past a full turn; pitch is always within ±maxTilt.
 */
export class OrientationState {
  private yawValue = 0;
  private pitchValue = 0;
  private scaleValue = 1;
  private showingBack = false;

  constructor(readonly maxTilt: number) {}

  get yaw(): number {
    return this.yawValue;
  }

  get pitch(): number {
    return this.pitchValue;
  }

  get scale(): number {
    return this.scaleValue;
  }

  get isShowingBack(): boolean {
    return this.showingBack;
  }

  /** Returns false and keeps the prior value for non-finite input. */
  setYaw(yaw: number): boolean {
    if (!Number.isFinite(yaw)) return false;
    this.yawValue = yaw;
    return true;
  }

  setPitch(pitch: number): boolean {
    if (!Number.isFinite(pitch)) return false;
    this.pitchValue = clampTilt(pitch, this.maxTilt);
    return true;
  }

  setScale(scale: number): boolean {
    if (!Number.isFinite(scale) || scale <= 0) return false;
    this.scaleValue = scale;
    return true;
  }

  setShowingBack(showingBack: boolean): void {
    this.showingBack = showingBack;
  }

  /** Rest yaw for the current face. */
  restYaw(): number {
    return this.showingBack ? Math.PI : 0;
  }

  reset(seed: Partial<CardPose> = {}): void {
    this.yawValue = 0;
    this.pitchValue = 0;
    this.showingBack = seed.isShowingBack ?? false;
    if (seed.yaw !== undefined) this.setYaw(seed.yaw);
    if (seed.pitch !== undefined) this.setPitch(seed.pitch);
    if (seed.scale !== undefined) this.setScale(seed.scale);
  }

  snapshot(): CardPose {
    return Object.freeze({
      yaw: this.yawValue,
      pitch: this.pitchValue,
      scale: this.scaleValue,
      isShowingBack: this.showingBack,
    });
  }
}
