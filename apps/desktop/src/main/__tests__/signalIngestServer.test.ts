import { beforeEach, describe, expect, it, vi } from "vitest";
import { initializeI18n } from "../../shared/i18n/config";
import type { TickReport } from "../../shared/types/timer";
import { ActivityTracker } from "../../worker/sources/activity-tracker";
import { FocusDetector } from "../../worker/sources/focus-detector";
import { ProductivityTimer } from "../../worker/timer/productivity-timer";
import {
  type SignalIngestDependencies,
  routeIngestRequest,
} from "../signalIngestServer";

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

describe("routeIngestRequest", () => {
  let activity: ActivityTracker;
  let focus: FocusDetector;
  let timer: ProductivityTimer;
  let lastReport: TickReport | null;
  let deps: SignalIngestDependencies;

  beforeEach(() => {
    initializeI18n("en-US");
    activity = new ActivityTracker();
    focus = new FocusDetector({ clock: () => 5_000 });
    timer = new ProductivityTimer({ gracePeriodMs: 15_000, startedAt: 0 });
    lastReport = null;
    deps = {
      activity,
      focus,
      getSnapshot: () => timer.getSnapshot(65_000),
      getLastReport: () => lastReport,
      sessionId: 7,
      clock: () => 5_000,
    };
  });

  it("answers health checks", () => {
    expect(
      routeIngestRequest({ method: "GET", pathname: "/api/health", body: undefined }, deps),
    ).toEqual({ status: 200, body: { ok: true } });
  });

  it("rejects unknown paths and wrong methods", () => {
    expect(
      routeIngestRequest({ method: "GET", pathname: "/nope", body: undefined }, deps)
        .status,
    ).toBe(404);
    expect(
      routeIngestRequest(
        { method: "GET", pathname: "/api/signals/activity", body: undefined },
        deps,
      ).status,
    ).toBe(405);
  });

  it("records an activity ping, including one without a body", () => {
    const withBody = routeIngestRequest(
      { method: "POST", pathname: "/api/signals/activity", body: { source: "mouse" } },
      deps,
    );
    const withoutBody = routeIngestRequest(
      { method: "POST", pathname: "/api/signals/activity", body: undefined },
      deps,
    );

    expect(withBody).toEqual({ status: 202, body: { accepted: true } });
    expect(withoutBody.status).toBe(202);
    expect(activity.getPingCount()).toBe(2);
    expect(activity.getLastActivityAt()).toBe(5_000);
  });

  it("rejects malformed activity pings", () => {
    const response = routeIngestRequest(
      { method: "POST", pathname: "/api/signals/activity", body: { source: "pedal" } },
      deps,
    );

    expect(response).toEqual({ status: 400, body: { error: "Invalid activity ping" } });
    expect(activity.peek()).toBe(false);
  });

  it("stores presence samples with the arrival time", () => {
    const response = routeIngestRequest(
      {
        method: "POST",
        pathname: "/api/signals/presence",
        body: { faceDetected: true, yawDeg: 4, pitchDeg: -2 },
      },
      deps,
    );

    expect(response).toEqual({
      status: 202,
      body: {
        accepted: true,
        sample: { timestamp: 5_000, faceDetected: true, yawDeg: 4, pitchDeg: -2 },
      },
    });
    expect(focus.getLatestSample()?.yawDeg).toBe(4);
  });

  it("rejects presence samples without a face flag", () => {
    const response = routeIngestRequest(
      { method: "POST", pathname: "/api/signals/presence", body: { yawDeg: 4 } },
      deps,
    );

    expect(response.status).toBe(400);
    expect(focus.getLatestSample()).toBeNull();
  });

  it("refuses presence samples while focus tracking is disabled", () => {
    const response = routeIngestRequest(
      {
        method: "POST",
        pathname: "/api/signals/presence",
        body: { faceDetected: true },
      },
      { ...deps, focus: null },
    );

    expect(response).toEqual({
      status: 409,
      body: { error: "Focus tracking is disabled" },
    });
  });

  it("serves the live timer status", () => {
    timer.update(true, 0);
    lastReport = {
      sequence: 3,
      timestamp: 60_000,
      signals: {
        classification: "PRODUCTIVE",
        windowTitle: "notes.md - Obsidian",
        appName: "Obsidian",
        activity: true,
        focused: false,
      },
      verdict: true,
      timer: timer.getSnapshot(60_000),
    };

    const response = routeIngestRequest(
      { method: "GET", pathname: "/api/status", body: undefined },
      deps,
    );

    expect(response).toEqual({
      status: 200,
      body: {
        state: "RUNNING",
        label: "PRODUCTIVE",
        elapsed: "00:01:05",
        elapsedProductiveSeconds: 65,
        remainingGraceSeconds: 0,
        sessionId: 7,
        lastTick: {
          sequence: 3,
          timestamp: 60_000,
          classification: "PRODUCTIVE",
          windowTitle: "notes.md - Obsidian",
          activity: true,
          focused: false,
          verdict: true,
        },
      },
    });
  });
});
