import { getLogger, toErrorPayload } from "../shared/logger";
import { type Clock, systemClock } from "../shared/time";
import type { TickReport } from "../shared/types/timer";
import { logActivity } from "./database/activityLogRepository";
import { logAppEnd, logAppStart } from "./database/appUsageRepository";
import { addSessionProductivity } from "./database/sessionRepository";

const logger = getLogger("session-recorder", "main");

type IntervalHandle = ReturnType<typeof setInterval>;

/** The slice of the timer the recorder reads; it never mutates it. */
export type ElapsedTimeSource = {
  getElapsedProductiveSeconds(now: number): number;
};

export type SessionRecorderOptions = {
  sessionId: number;
  startedAt: number;
  timer: ElapsedTimeSource;
  persistIntervalMs: number;
  activityLogEnabled: boolean;
  clock?: Clock;
  onPersistError?: (error: unknown) => void;
};

export type SessionTotals = {
  productiveSec: number;
  unproductiveSec: number;
};

type OpenUsage = {
  id: number;
  key: string;
};

const usageKey = (report: TickReport): string | null => {
  const { windowTitle, appName } = report.signals;
  if (windowTitle === null) {
    return null;
  }
  return `${appName ?? ""}\u0000${windowTitle}`;
};

/**
 * Mirrors a running session into SQLite. Productive time is always read from
 * the timer; only the difference from what was last written is persisted, so
 * a failed flush is retried in full by the next one.
 */
export class SessionRecorder {
  private readonly sessionId: number;

  private readonly startedAt: number;

  private readonly timer: ElapsedTimeSource;

  private readonly persistIntervalMs: number;

  private readonly activityLogEnabled: boolean;

  private readonly clock: Clock;

  private readonly onPersistError?: (error: unknown) => void;

  private persisted: SessionTotals = { productiveSec: 0, unproductiveSec: 0 };

  private openUsage: OpenUsage | null = null;

  private interval: IntervalHandle | null = null;

  constructor(options: SessionRecorderOptions) {
    this.sessionId = options.sessionId;
    this.startedAt = options.startedAt;
    this.timer = options.timer;
    this.persistIntervalMs = options.persistIntervalMs;
    this.activityLogEnabled = options.activityLogEnabled;
    this.clock = options.clock ?? systemClock;
    this.onPersistError = options.onPersistError;
  }

  start(): void {
    if (this.interval) {
      logger.warn("Session recorder already started", {
        sessionId: this.sessionId,
      });
      return;
    }

    this.interval = setInterval(() => {
      this.flush();
    }, this.persistIntervalMs);
    this.interval.unref();

    logger.info("Session recorder started", {
      sessionId: this.sessionId,
      persistIntervalMs: this.persistIntervalMs,
    });
  }

  handleTick(report: TickReport): void {
    this.trackWindow(report);

    if (this.activityLogEnabled) {
      this.persist("activity log", () => {
        logActivity(this.sessionId, report);
      });
    }
  }

  computeTotals(now: number = this.clock()): SessionTotals {
    const productive = Math.max(0, this.timer.getElapsedProductiveSeconds(now));
    const wall = Math.max(0, (now - this.startedAt) / 1000);
    return {
      productiveSec: Math.floor(productive),
      unproductiveSec: Math.max(0, Math.floor(wall - productive)),
    };
  }

  getPersistedTotals(): SessionTotals {
    return { ...this.persisted };
  }

  flush(now: number = this.clock()): void {
    const totals = this.computeTotals(now);
    const productiveDelta = Math.max(
      0,
      totals.productiveSec - this.persisted.productiveSec,
    );
    const unproductiveDelta = Math.max(
      0,
      totals.unproductiveSec - this.persisted.unproductiveSec,
    );

    if (productiveDelta === 0 && unproductiveDelta === 0) {
      return;
    }

    const saved = this.persist("session totals", () => {
      addSessionProductivity(this.sessionId, productiveDelta, unproductiveDelta);
    });

    if (saved) {
      this.persisted = {
        productiveSec: this.persisted.productiveSec + productiveDelta,
        unproductiveSec: this.persisted.unproductiveSec + unproductiveDelta,
      };
      logger.debug("Session totals flushed", {
        sessionId: this.sessionId,
        productiveDelta,
        unproductiveDelta,
      });
    }
  }

  /** Final flush and close of the open app usage row. */
  stop(now: number = this.clock()): SessionTotals {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }

    this.flush(now);
    this.closeUsage(now);

    logger.info("Session recorder stopped", {
      sessionId: this.sessionId,
      ...this.persisted,
    });
    return this.getPersistedTotals();
  }

  private trackWindow(report: TickReport): void {
    const key = usageKey(report);
    if (key === this.openUsage?.key) {
      return;
    }

    this.closeUsage(report.timestamp);

    if (key === null) {
      return;
    }

    const { appName, windowTitle, classification } = report.signals;
    this.persist("app usage start", () => {
      const id = logAppStart({
        sessionId: this.sessionId,
        appName: appName ?? "unknown",
        windowTitle: windowTitle ?? "",
        category: classification,
        productive: classification === "PRODUCTIVE",
        startedAt: report.timestamp,
      });
      this.openUsage = { id, key };
    });
  }

  private closeUsage(now: number): void {
    const current = this.openUsage;
    if (!current) {
      return;
    }
    this.openUsage = null;
    this.persist("app usage end", () => {
      logAppEnd(current.id, now);
    });
  }

  private persist(operation: string, write: () => void): boolean {
    try {
      write();
      return true;
    } catch (error) {
      logger.error(`Failed to persist ${operation}`, {
        ...toErrorPayload(error),
        sessionId: this.sessionId,
      });
      this.onPersistError?.(error);
      return false;
    }
  }
}
