import { afterEach, describe, expect, it, vi } from "vitest";
import type { ScreenReading } from "../../shared/types/signals";
import type { SkippedTick, TickReport } from "../../shared/types/timer";
import { ActivityTracker } from "../sources/activity-tracker";
import {
  type FocusSource,
  type ScreenSource,
  SignalUnavailableError,
} from "../sources/types";
import { ProductivityTimer } from "../timer/productivity-timer";
import { TickDriver } from "./tick-driver";

vi.mock("../../shared/logger", () => ({
  getLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    flush: vi.fn(),
  }),
  toErrorPayload: (error: unknown) => ({ error: String(error) }),
}));

const reading = (
  classification: ScreenReading["classification"],
): ScreenReading => ({
  classification,
  windowTitle: `${classification.toLowerCase()} window`,
  appName: "Test App",
});

class FakeScreen implements ScreenSource {
  current: ScreenReading = reading("PRODUCTIVE");

  failure: Error | null = null;

  async readScreen(): Promise<ScreenReading> {
    if (this.failure) {
      throw this.failure;
    }
    return this.current;
  }
}

class FakeFocus implements FocusSource {
  focused = false;

  unavailable = false;

  hang = false;

  readonly calls: number[] = [];

  readFocus(now: number): Promise<boolean> {
    this.calls.push(now);
    if (this.hang) {
      return new Promise<boolean>(() => undefined);
    }
    if (this.unavailable) {
      return Promise.reject(
        new SignalUnavailableError("focus", "No presence sample received yet"),
      );
    }
    return Promise.resolve(this.focused);
  }
}

const setup = (options: { intervalMs?: number; signalTimeoutMs?: number } = {}) => {
  let now = 10_000;
  const clock = {
    now: () => now,
    set: (value: number) => {
      now = value;
    },
  };
  const timer = new ProductivityTimer({
    gracePeriodMs: 5_000,
    startedAt: now,
    clock: clock.now,
  });
  const screen = new FakeScreen();
  const focus = new FakeFocus();
  const activity = new ActivityTracker();
  const driver = new TickDriver({
    timer,
    screen,
    focus,
    activity,
    clock: clock.now,
    intervalMs: options.intervalMs ?? 500,
    signalTimeoutMs: options.signalTimeoutMs ?? 100,
  });
  return { clock, timer, screen, focus, activity, driver };
};

describe("TickDriver", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("fuses the signals and updates the timer with the driver clock", async () => {
    const { clock, timer, activity, driver } = setup();
    activity.record({ source: "keyboard" }, 9_900);
    clock.set(12_000);

    const outcome = await driver.runTick();

    expect(outcome.kind).toBe("tick");
    expect(timer.getState()).toBe("RUNNING");
    expect(timer.getSnapshot(12_000).lastTransitionAt).toBe(12_000);
    expect(driver.getLastReport()).toEqual({
      sequence: 1,
      timestamp: 12_000,
      signals: {
        classification: "PRODUCTIVE",
        windowTitle: "productive window",
        appName: "Test App",
        activity: true,
        focused: false,
      },
      verdict: true,
      timer: timer.getSnapshot(12_000),
    });
  });

  it("consumes the activity flag on a completed tick", async () => {
    const { activity, driver } = setup();
    activity.record({}, 9_000);

    await driver.runTick();

    expect(activity.peek()).toBe(false);
  });

  it("passes the tick instant to the focus source", async () => {
    const { clock, focus, driver } = setup();
    clock.set(15_500);

    await driver.runTick();

    expect(focus.calls).toEqual([15_500]);
  });

  it("skips the tick and keeps activity pending when focus is unavailable", async () => {
    const { timer, focus, activity, driver } = setup();
    focus.unavailable = true;
    activity.record({}, 9_000);
    const skippedListener = vi.fn<(skipped: SkippedTick) => void>();
    const failureListener = vi.fn();
    driver.on("skipped", skippedListener);
    driver.on("failure", failureListener);

    const outcome = await driver.runTick();

    expect(outcome).toEqual({
      kind: "skipped",
      skipped: {
        sequence: 1,
        timestamp: 10_000,
        reason: "No presence sample received yet",
      },
    });
    expect(skippedListener).toHaveBeenCalledTimes(1);
    expect(failureListener).not.toHaveBeenCalled();
    expect(activity.peek()).toBe(true);
    expect(timer.getState()).toBe("PAUSED");
    expect(driver.getLastReport()).toBeNull();
  });

  it("reports unexpected source errors as failures", async () => {
    const { screen, driver } = setup();
    const boom = new Error("window server crashed");
    screen.failure = boom;
    const failureListener = vi.fn<(error: unknown, skipped: SkippedTick) => void>();
    driver.on("failure", failureListener);

    const outcome = await driver.runTick();

    expect(outcome.kind).toBe("skipped");
    expect(failureListener).toHaveBeenCalledWith(boom, {
      sequence: 1,
      timestamp: 10_000,
      reason: "window server crashed",
    });
  });

  it("skips a tick whose focus read exceeds the signal timeout", async () => {
    vi.useFakeTimers();
    const { timer, focus, driver } = setup({ signalTimeoutMs: 100 });
    focus.hang = true;

    const pending = driver.runTick();
    await vi.advanceTimersByTimeAsync(100);
    const outcome = await pending;

    expect(outcome).toEqual({
      kind: "skipped",
      skipped: {
        sequence: 1,
        timestamp: 10_000,
        reason: "focus signal did not respond within 100ms",
      },
    });
    expect(timer.getState()).toBe("PAUSED");
  });

  it("runs a grace period end to end", async () => {
    const { clock, timer, screen, focus, driver } = setup();
    focus.focused = true;

    await driver.runTick();
    clock.set(20_000);
    screen.current = reading("UNPRODUCTIVE");
    await driver.runTick();

    expect(timer.getState()).toBe("IN_GRACE_PERIOD");
    expect(timer.getElapsedProductiveSeconds(20_000)).toBe(10);

    clock.set(23_000);
    screen.current = reading("NEUTRAL");
    const outcome = await driver.runTick();

    expect(outcome.kind).toBe("tick");
    expect(timer.getState()).toBe("RUNNING");
    expect(timer.getElapsedProductiveSeconds(25_000)).toBe(12);
  });

  it("shares one in-flight tick between concurrent callers", async () => {
    const { driver } = setup();

    const first = driver.runTick();
    const second = driver.runTick();

    expect(second).toBe(first);
    await first;
  });

  it("ticks on its interval and stops cooperatively", async () => {
    vi.useFakeTimers();
    const { driver } = setup({ intervalMs: 500 });
    const reports: TickReport[] = [];
    driver.on("tick", (report) => reports.push(report));

    driver.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(reports).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(1_000);
    expect(reports).toHaveLength(3);

    await driver.stop();
    await vi.advanceTimersByTimeAsync(5_000);

    expect(reports).toHaveLength(3);
    expect(driver.isRunning()).toBe(false);
  });

  it("ignores a second start", async () => {
    vi.useFakeTimers();
    const { driver } = setup({ intervalMs: 500 });
    const listener = vi.fn();
    driver.on("tick", listener);

    driver.start();
    driver.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(listener).toHaveBeenCalledTimes(1);
    await driver.stop();
  });
});
