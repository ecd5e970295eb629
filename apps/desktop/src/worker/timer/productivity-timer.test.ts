import { describe, expect, it, vi } from "vitest";
import type { TimerTransitionEvent } from "../../shared/types/timer";
import { DEFAULT_GRACE_PERIOD_MS, ProductivityTimer } from "./productivity-timer";

const s = (seconds: number) => seconds * 1000;

const createTimer = (gracePeriodMs = s(5)) =>
  new ProductivityTimer({ gracePeriodMs, startedAt: 0, clock: () => 0 });

describe("ProductivityTimer", () => {
  it("starts paused with nothing accumulated", () => {
    const timer = createTimer();

    expect(timer.getState()).toBe("PAUSED");
    expect(timer.getElapsedProductiveSeconds(s(100))).toBe(0);
    expect(timer.getRemainingGraceSeconds(s(100))).toBe(0);
  });

  it("defaults the grace period to fifteen seconds", () => {
    const timer = new ProductivityTimer();

    expect(timer.gracePeriodMs).toBe(DEFAULT_GRACE_PERIOD_MS);
    expect(DEFAULT_GRACE_PERIOD_MS).toBe(15_000);
  });

  it("stays paused on unproductive verdicts without moving the transition time", () => {
    const timer = createTimer();

    timer.update(false, s(3));
    timer.update(false, s(7));

    const snapshot = timer.getSnapshot(s(8));
    expect(snapshot.state).toBe("PAUSED");
    expect(snapshot.lastTransitionAt).toBe(0);
    expect(snapshot.elapsedProductiveSeconds).toBe(0);
  });

  it("enters RUNNING on a productive verdict and grows elapsed time live", () => {
    const timer = createTimer();

    timer.update(true, s(2));

    expect(timer.getState()).toBe("RUNNING");
    expect(timer.getElapsedProductiveSeconds(s(2))).toBe(0);
    expect(timer.getElapsedProductiveSeconds(s(3))).toBe(1);
    expect(timer.getElapsedProductiveSeconds(s(6.5))).toBe(4.5);
  });

  it("keeps RUNNING untouched on repeated productive verdicts", () => {
    const timer = createTimer();

    timer.update(true, 0);
    timer.update(true, s(4));
    timer.update(true, s(9));

    const snapshot = timer.getSnapshot(s(10));
    expect(snapshot.lastTransitionAt).toBe(0);
    expect(snapshot.accumulatedProductiveSeconds).toBe(0);
    expect(snapshot.elapsedProductiveSeconds).toBe(10);
  });

  it("forgives a lapse that recovers inside the grace window", () => {
    const timer = createTimer();
    timer.update(true, 0);

    timer.update(false, s(10));
    const graceSnapshot = timer.getSnapshot(s(10));
    expect(graceSnapshot.state).toBe("IN_GRACE_PERIOD");
    expect(graceSnapshot.accumulatedProductiveSeconds).toBe(10);
    expect(graceSnapshot.graceDeadline).toBe(s(15));

    timer.update(true, s(12));
    expect(timer.getState()).toBe("RUNNING");
    expect(timer.getSnapshot(s(12)).accumulatedProductiveSeconds).toBe(10);

    expect(timer.getElapsedProductiveSeconds(s(20))).toBe(18);
  });

  it("pauses once an unproductive verdict arrives after the deadline", () => {
    const timer = createTimer();
    timer.update(true, 0);
    timer.update(false, s(10));

    timer.update(false, s(13));
    expect(timer.getState()).toBe("IN_GRACE_PERIOD");

    timer.update(false, s(15));
    expect(timer.getState()).toBe("IN_GRACE_PERIOD");

    timer.update(false, s(16));
    expect(timer.getState()).toBe("PAUSED");
    expect(timer.getSnapshot(s(16)).lastTransitionAt).toBe(s(16));
    expect(timer.getElapsedProductiveSeconds(s(16))).toBe(10);
    expect(timer.getElapsedProductiveSeconds(s(3600))).toBe(10);
  });

  it("is continuous across the RUNNING to grace boundary", () => {
    const timer = createTimer();
    timer.update(true, s(1));

    const before = timer.getElapsedProductiveSeconds(s(7.25));
    timer.update(false, s(7.25));
    const after = timer.getElapsedProductiveSeconds(s(7.25));

    expect(before).toBe(6.25);
    expect(after).toBe(6.25);
  });

  it("restarts the lapse clock on every oscillation inside grace", () => {
    const timer = createTimer();
    timer.update(true, 0);

    timer.update(false, s(10));
    timer.update(true, s(11));
    timer.update(false, s(12));
    timer.update(true, s(13));
    timer.update(false, s(14));

    const snapshot = timer.getSnapshot(s(14));
    expect(snapshot.state).toBe("IN_GRACE_PERIOD");
    // 10s first run + 1s (11-12) + 1s (13-14); the gaps are never credited.
    expect(snapshot.accumulatedProductiveSeconds).toBe(12);
    expect(snapshot.graceDeadline).toBe(s(19));
  });

  it("counts the remaining grace down to zero", () => {
    const timer = createTimer();
    timer.update(true, 0);
    timer.update(false, s(10));

    expect(timer.getRemainingGraceSeconds(s(10))).toBe(5);
    expect(timer.getRemainingGraceSeconds(s(11.5))).toBe(3);
    expect(timer.getRemainingGraceSeconds(s(14.9))).toBe(0);
    expect(timer.getRemainingGraceSeconds(s(15))).toBe(0);
    expect(timer.getRemainingGraceSeconds(s(40))).toBe(0);
  });

  it("does not change on repeated queries", () => {
    const timer = createTimer();
    timer.update(true, 0);
    timer.update(false, s(4));

    const first = timer.getSnapshot(s(6));
    const second = timer.getSnapshot(s(6));

    expect(second).toEqual(first);
    expect(timer.getState()).toBe("IN_GRACE_PERIOD");
  });

  it("never credits a negative run when the clock steps backwards", () => {
    const timer = createTimer();
    timer.update(true, s(10));

    expect(timer.getElapsedProductiveSeconds(s(8))).toBe(0);

    timer.update(false, s(9));
    expect(timer.getSnapshot(s(9)).accumulatedProductiveSeconds).toBe(0);
  });

  it("falls back to the default grace period for invalid values", () => {
    const timer = new ProductivityTimer({ gracePeriodMs: -1 });

    expect(timer.gracePeriodMs).toBe(DEFAULT_GRACE_PERIOD_MS);
  });

  it("uses the injected clock when no instant is passed to queries", () => {
    let now = 0;
    const timer = new ProductivityTimer({ clock: () => now, startedAt: 0 });

    timer.update(true, 0);
    now = s(42);

    expect(timer.getElapsedProductiveSeconds()).toBe(42);
  });

  it("reports transitions with a snapshot taken at the transition instant", () => {
    const onTransition = vi.fn<(event: TimerTransitionEvent) => void>();
    const timer = new ProductivityTimer({
      gracePeriodMs: s(5),
      startedAt: 0,
      onTransition,
    });

    timer.update(true, s(1));
    timer.update(true, s(2));
    timer.update(false, s(3));

    expect(onTransition).toHaveBeenCalledTimes(2);
    expect(onTransition.mock.calls[0]?.[0]).toMatchObject({
      from: "PAUSED",
      to: "RUNNING",
      timestamp: s(1),
    });
    expect(onTransition.mock.calls[1]?.[0]).toMatchObject({
      from: "RUNNING",
      to: "IN_GRACE_PERIOD",
      timestamp: s(3),
      snapshot: {
        accumulatedProductiveSeconds: 2,
        remainingGraceSeconds: 5,
        graceDeadline: s(8),
      },
    });
  });

  it("clears everything on reset", () => {
    const timer = createTimer();
    timer.update(true, 0);
    timer.update(false, s(10));

    timer.reset(s(11));

    const snapshot = timer.getSnapshot(s(12));
    expect(snapshot.state).toBe("PAUSED");
    expect(snapshot.elapsedProductiveSeconds).toBe(0);
    expect(snapshot.graceDeadline).toBeNull();
    expect(snapshot.lastTransitionAt).toBe(s(11));
  });
});
