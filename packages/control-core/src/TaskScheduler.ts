/**
 * Platform timing primitives. Every scheduling call returns a canceller so the
 * scheduler never needs to know the platform's handle type.
 */
export interface FrameClock {
  now(): number;
  requestFrame(callback: () => void): () => void;
  setTimer(callback: () => void, delayMs: number): () => void;
}

export interface TaskHandle {
  readonly active: boolean;
  cancel(): void;
}

const FALLBACK_FRAME_MS = 16;

export function createDefaultFrameClock(): FrameClock {
  const now = () => (typeof performance !== "undefined" ? performance.now() : Date.now());

  const setTimer = (callback: () => void, delayMs: number) => {
    const id = setTimeout(callback, delayMs);
    return () => clearTimeout(id);
  };

  const requestFrame =
    typeof requestAnimationFrame === "function"
      ? (callback: () => void) => {
          const id = requestAnimationFrame(() => callback());
          return () => cancelAnimationFrame(id);
        }
      : (callback: () => void) => setTimer(callback, FALLBACK_FRAME_MS);

  return { now, requestFrame, setTimer };
}

class Task implements TaskHandle {
  private cancelPlatform: (() => void) | null = null;
  private isActive = true;

  constructor(private readonly onFinish: (task: Task) => void) {}

  get active(): boolean {
    return this.isActive;
  }

  bind(cancelPlatform: () => void): void {
    this.cancelPlatform = cancelPlatform;
  }

  finish(): void {
    if (!this.isActive) return;
    this.isActive = false;
    this.cancelPlatform = null;
    this.onFinish(this);
  }

  cancel(): void {
    if (!this.isActive) return;
    this.cancelPlatform?.();
    this.finish();
  }
}

/**
 * Owns every deferred callback of one controller: frame loops and one-shot
 * timers. Cancelling a handle guarantees its callback never runs again.
 */
export class TaskScheduler {
  private readonly tasks = new Set<Task>();

  constructor(private readonly clock: FrameClock = createDefaultFrameClock()) {}

  now(): number {
    return this.clock.now();
  }

  /** Calls `step` once per frame until it returns false or the handle is cancelled. */
  loop(step: () => boolean): TaskHandle {
    const task = this.track();
    const schedule = () => {
      task.bind(
        this.clock.requestFrame(() => {
          if (!task.active) return;
          if (step() && task.active) {
            schedule();
          } else {
            task.finish();
          }
        })
      );
    };
    schedule();
    return task;
  }

  after(delayMs: number, callback: () => void): TaskHandle {
    const task = this.track();
    task.bind(
      this.clock.setTimer(() => {
        if (!task.active) return;
        task.finish();
        callback();
      }, Math.max(0, delayMs))
    );
    return task;
  }

  cancelAll(): void {
    for (const task of [...this.tasks]) {
      task.cancel();
    }
  }

  get pendingCount(): number {
    return this.tasks.size;
  }

  private track(): Task {
    const task = new Task((t) => this.tasks.delete(t));
    this.tasks.add(task);
    return task;
  }
}
