import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ScreenReading } from "../../shared/types/signals";
import type { TickReport } from "../../shared/types/timer";
import { ProductivityTimer } from "../../worker/timer/productivity-timer";
import { listActivityForSession } from "../database/activityLogRepository";
import { listAppUsageForSession } from "../database/appUsageRepository";
import { closeDatabase, initializeDatabase } from "../database/client";
import * as sessionRepository from "../database/sessionRepository";
import { SessionRecorder } from "../sessionRecorder";

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

const s = (seconds: number) => seconds * 1000;

const buildReport = (
  timer: ProductivityTimer,
  timestamp: number,
  screen: ScreenReading,
  verdict: boolean,
): TickReport => {
  timer.update(verdict, timestamp);
  return {
    sequence: 1,
    timestamp,
    signals: { ...screen, activity: verdict, focused: verdict },
    verdict,
    timer: timer.getSnapshot(timestamp),
  };
};

const editor: ScreenReading = {
  classification: "PRODUCTIVE",
  windowTitle: "main.ts - Visual Studio Code",
  appName: "Code",
};

const video: ScreenReading = {
  classification: "UNPRODUCTIVE",
  windowTitle: "YouTube - Firefox",
  appName: "Firefox",
};

describe("SessionRecorder", () => {
  let sessionId: number;
  let timer: ProductivityTimer;

  beforeEach(() => {
    initializeDatabase(":memory:");
    sessionId = sessionRepository.startSession(0).id;
    timer = new ProductivityTimer({ gracePeriodMs: s(5), startedAt: 0 });
  });

  afterEach(() => {
    closeDatabase();
  });

  const createRecorder = (activityLogEnabled = false, onPersistError = vi.fn()) =>
    new SessionRecorder({
      sessionId,
      startedAt: 0,
      timer,
      persistIntervalMs: s(10),
      activityLogEnabled,
      clock: () => 0,
      onPersistError,
    });

  it("derives totals from the timer and the wall clock", () => {
    const recorder = createRecorder();
    timer.update(true, s(2));

    expect(recorder.computeTotals(s(12.5))).toEqual({
      productiveSec: 10,
      unproductiveSec: 2,
    });
  });

  it("persists only the difference since the last flush", () => {
    const recorder = createRecorder();
    timer.update(true, 0);

    recorder.flush(s(10));
    timer.update(false, s(30));
    timer.update(false, s(40));
    recorder.flush(s(40));

    expect(sessionRepository.getSession(sessionId)).toMatchObject({
      totalProductiveSec: 30,
      totalUnproductiveSec: 10,
    });
    expect(recorder.getPersistedTotals()).toEqual({
      productiveSec: 30,
      unproductiveSec: 10,
    });
  });

  it("retries a failed flush in full", () => {
    const onPersistError = vi.fn();
    const recorder = createRecorder(false, onPersistError);
    timer.update(true, 0);
    const failure = new Error("database is locked");
    const spy = vi
      .spyOn(sessionRepository, "addSessionProductivity")
      .mockImplementationOnce(() => {
        throw failure;
      });

    recorder.flush(s(5));
    expect(onPersistError).toHaveBeenCalledWith(failure);
    expect(recorder.getPersistedTotals()).toEqual({
      productiveSec: 0,
      unproductiveSec: 0,
    });

    recorder.flush(s(8));
    expect(spy).toHaveBeenLastCalledWith(sessionId, 8, 0);
    expect(recorder.getPersistedTotals()).toEqual({
      productiveSec: 8,
      unproductiveSec: 0,
    });
  });

  it("opens and closes app usage rows as the window changes", () => {
    const recorder = createRecorder();

    recorder.handleTick(buildReport(timer, s(1), editor, true));
    recorder.handleTick(buildReport(timer, s(2), editor, true));
    recorder.handleTick(buildReport(timer, s(31), video, false));

    const rows = listAppUsageForSession(sessionId);
    expect(rows).toHaveLength(2);
    expect(rows[0]).toMatchObject({
      appName: "Code",
      category: "PRODUCTIVE",
      productive: true,
      startTime: s(1),
      endTime: s(31),
      durationSec: 30,
    });
    expect(rows[1]).toMatchObject({
      appName: "Firefox",
      category: "UNPRODUCTIVE",
      productive: false,
      startTime: s(31),
      endTime: null,
    });
  });

  it("closes the open usage row and flushes on stop", () => {
    const recorder = createRecorder();
    recorder.handleTick(buildReport(timer, 0, editor, true));

    const totals = recorder.stop(s(20));

    expect(totals).toEqual({ productiveSec: 20, unproductiveSec: 0 });
    expect(listAppUsageForSession(sessionId)[0]).toMatchObject({
      endTime: s(20),
      durationSec: 20,
    });
  });

  it("writes the activity log only when enabled", () => {
    const silent = createRecorder(false);
    silent.handleTick(buildReport(timer, s(1), editor, true));
    expect(listActivityForSession(sessionId)).toEqual([]);

    const verbose = createRecorder(true);
    verbose.handleTick(buildReport(timer, s(2), editor, true));

    expect(listActivityForSession(sessionId)).toEqual([
      {
        id: 1,
        sessionId,
        timestamp: s(2),
        facePresent: true,
        inputActive: true,
        screenCategory: "PRODUCTIVE",
        productive: true,
        timerState: "RUNNING",
        elapsedProductiveSec: 1,
      },
    ]);
  });
});
