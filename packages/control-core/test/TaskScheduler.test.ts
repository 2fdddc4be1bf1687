import { afterEach, describe, expect, it, vi } from "vitest";
import { TaskScheduler, createDefaultFrameClock } from "../src";
import { ManualFrameClock } from "./helpers/fakes";

describe("TaskScheduler", () => {
  it("loops until the step returns false", () => {
    const clock = new ManualFrameClock();
    const scheduler = new TaskScheduler(clock);
    let count = 0;
    const handle = scheduler.loop(() => ++count < 3);

    expect(scheduler.pendingCount).toBe(1);
    expect(clock.runFrames()).toBe(3);
    expect(count).toBe(3);
    expect(handle.active).toBe(false);
    expect(scheduler.pendingCount).toBe(0);
  });

  it("never runs a cancelled loop again", () => {
    const clock = new ManualFrameClock();
    const scheduler = new TaskScheduler(clock);
    let count = 0;
    const handle = scheduler.loop(() => {
      count++;
      return true;
    });
    clock.runFramesExactly(2);
    handle.cancel();

    expect(clock.runFrames()).toBe(0);
    expect(count).toBe(2);
  });

  it("stops a loop that cancels itself from inside the step", () => {
    const clock = new ManualFrameClock();
    const scheduler = new TaskScheduler(clock);
    let count = 0;
    const handle = scheduler.loop(() => {
      count++;
      handle.cancel();
      return true;
    });

    expect(clock.runFrames()).toBe(1);
    expect(count).toBe(1);
  });

  it("fires one-shot timers after their delay", () => {
    const clock = new ManualFrameClock();
    const scheduler = new TaskScheduler(clock);
    const fired: string[] = [];
    scheduler.after(100, () => fired.push("a"));
    scheduler.after(50, () => fired.push("b"));

    clock.advance(60);
    expect(fired).toEqual(["b"]);
    clock.advance(40);
    expect(fired).toEqual(["b", "a"]);
    expect(scheduler.pendingCount).toBe(0);
  });

  it("cancels everything at once", () => {
    const clock = new ManualFrameClock();
    const scheduler = new TaskScheduler(clock);
    let fired = 0;
    scheduler.after(10, () => fired++);
    scheduler.loop(() => {
      fired++;
      return true;
    });

    scheduler.cancelAll();
    clock.advance(100);
    clock.runFrames();
    expect(fired).toBe(0);
    expect(scheduler.pendingCount).toBe(0);
    expect(clock.pendingTimers).toBe(0);
  });
});

describe("createDefaultFrameClock", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("falls back to timers outside the browser", () => {
    vi.useFakeTimers();
    const scheduler = new TaskScheduler(createDefaultFrameClock());
    let frames = 0;
    scheduler.loop(() => ++frames < 10);
    let fired = false;
    scheduler.after(100, () => {
      fired = true;
    });

    vi.advanceTimersByTime(48);
    expect(frames).toBe(3);
    expect(fired).toBe(false);
    vi.advanceTimersByTime(52);
    expect(fired).toBe(true);
    scheduler.cancelAll();
  });
});
