import type { OrientationState } from "./OrientationState";
import type { TaskHandle, TaskScheduler } from "./TaskScheduler";

export interface AngularVelocity {
  yaw: number;
  pitch: number;
}

export interface InertiaOptions {
  decayRate: number;
  minVelocity: number;
}

export interface InertiaCallbacks {
  onTick: () => void;
  onComplete: () => void;
}

/**
 * Post-release glide. Each frame applies the angular velocity to the state,
 * then decays it geometrically, until both components drop below minVelocity.
 */
export class InertiaIntegrator {
  private velocity: AngularVelocity = { yaw: 0, pitch: 0 };
  private handle: TaskHandle | null = null;

  constructor(
    private readonly state: OrientationState,
    private readonly options: InertiaOptions,
    private readonly scheduler: TaskScheduler,
    private readonly callbacks: InertiaCallbacks
  ) {}

  get isActive(): boolean {
    return this.handle !== null;
  }

  getVelocity(): AngularVelocity {
    return { ...this.velocity };
  }

  isNegligible(velocity: AngularVelocity): boolean {
    const { minVelocity } = this.options;
    return Math.abs(velocity.yaw) < minVelocity && Math.abs(velocity.pitch) < minVelocity;
  }

  /** Returns false, leaving nothing running, when the velocity is already negligible. */
  start(velocity: AngularVelocity): boolean {
    this.cancel();
    if (!Number.isFinite(velocity.yaw) || !Number.isFinite(velocity.pitch)) return false;
    if (this.isNegligible(velocity)) return false;

    this.velocity = { ...velocity };
    this.handle = this.scheduler.loop(() => this.step());
    return true;
  }

  /** One integration tick; returns whether the glide continues. */
  step(): boolean {
    if (!this.handle) return false;

    this.state.setYaw(this.state.yaw + this.velocity.yaw);
    this.state.setPitch(this.state.pitch + this.velocity.pitch);
    this.velocity.yaw *= this.options.decayRate;
    this.velocity.pitch *= this.options.decayRate;
    this.callbacks.onTick();

    // onTick listeners may have cancelled the glide.
    if (!this.handle) return false;
    if (!this.isNegligible(this.velocity)) return true;

    this.velocity = { yaw: 0, pitch: 0 };
    const handle = this.handle;
    this.handle = null;
    handle.cancel();
    this.callbacks.onComplete();
    return false;
  }

  cancel(): void {
    this.velocity = { yaw: 0, pitch: 0 };
    if (!this.handle) return;
    const handle = this.handle;
    this.handle = null;
    handle.cancel();
  }
}
