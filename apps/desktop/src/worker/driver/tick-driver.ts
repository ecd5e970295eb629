import { EventEmitter } from "node:events";
import { getLogger, toErrorPayload } from "../../shared/logger";
import { type Clock, systemClock } from "../../shared/time";
import type { ScreenReading } from "../../shared/types/signals";
import type { SkippedTick, TickReport } from "../../shared/types/timer";
import { type FusionInput, fuseSignals } from "../fusion";
import {
  type ActivitySource,
  type FocusSource,
  type ScreenSource,
  SignalUnavailableError,
} from "../sources/types";
import type { ProductivityTimer } from "../timer/productivity-timer";

const DEFAULT_INTERVAL_MS = 500;
const DEFAULT_SIGNAL_TIMEOUT_MS = 2_000;

type TimeoutHandle = ReturnType<typeof setTimeout>;

export type TickDriverEvents = {
  tick: [report: TickReport];
  skipped: [skipped: SkippedTick];
  failure: [error: unknown, skipped: SkippedTick];
};

export type TickDriverOptions = {
  timer: ProductivityTimer;
  screen: ScreenSource;
  focus: FocusSource;
  activity: ActivitySource;
  intervalMs?: number;
  signalTimeoutMs?: number;
  clock?: Clock;
  fuse?: (input: FusionInput) => boolean;
};

export type TickOutcome =
  | { kind: "tick"; report: TickReport }
  | { kind: "skipped"; skipped: SkippedTick };

const logger = getLogger("tick-driver", "monitor");

export class SignalTimeoutError extends Error {
  constructor(signal: string, timeoutMs: number) {
    super(`${signal} signal did not respond within ${timeoutMs}ms`);
    this.name = "SignalTimeoutError";
  }
}

const withTimeout = async <T>(
  signal: string,
  promise: Promise<T>,
  timeoutMs: number,
): Promise<T> => {
  let handle: TimeoutHandle | undefined;
  const timeout = new Promise<never>((_, reject) => {
    handle = setTimeout(() => {
      reject(new SignalTimeoutError(signal, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(handle);
  }
};

const isExpectedSkip = (error: unknown): boolean => {
  return (
    error instanceof SignalUnavailableError || error instanceof SignalTimeoutError
  );
};

/**
 * Polls the signal sources on a fixed cadence, fuses them into a verdict and
 * feeds the timer. The next tick is only scheduled once the current one has
 * settled, so ticks never overlap.
 */
export class TickDriver extends EventEmitter<TickDriverEvents> {
  private readonly timer: ProductivityTimer;

  private readonly screen: ScreenSource;

  private readonly focus: FocusSource;

  private readonly activity: ActivitySource;

  private readonly intervalMs: number;

  private readonly signalTimeoutMs: number;

  private readonly clock: Clock;

  private readonly fuse: (input: FusionInput) => boolean;

  private handle: TimeoutHandle | null = null;

  private inFlight: Promise<TickOutcome> | null = null;

  private running = false;

  private sequence = 0;

  private lastReport: TickReport | null = null;

  constructor({
    timer,
    screen,
    focus,
    activity,
    intervalMs = DEFAULT_INTERVAL_MS,
    signalTimeoutMs = DEFAULT_SIGNAL_TIMEOUT_MS,
    clock = systemClock,
    fuse = fuseSignals,
  }: TickDriverOptions) {
    super();
    this.timer = timer;
    this.screen = screen;
    this.focus = focus;
    this.activity = activity;
    this.intervalMs = Math.max(1, intervalMs);
    this.signalTimeoutMs = Math.max(1, signalTimeoutMs);
    this.clock = clock;
    this.fuse = fuse;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    logger.info("Tick driver started", {
      intervalMs: this.intervalMs,
      signalTimeoutMs: this.signalTimeoutMs,
    });
    this.scheduleNextTick(0);
  }

  async stop(): Promise<void> {
    if (!this.running) {
      await this.inFlight;
      return;
    }
    this.running = false;
    if (this.handle) {
      clearTimeout(this.handle);
      this.handle = null;
    }
    await this.inFlight;
    logger.info("Tick driver stopped", { ticks: this.sequence });
  }

  isRunning(): boolean {
    return this.running;
  }

  getLastReport(): TickReport | null {
    return this.lastReport;
  }

  /** Runs exactly one tick. Concurrent callers share the in-flight tick. */
  runTick(): Promise<TickOutcome> {
    if (this.inFlight) {
      return this.inFlight;
    }

    const pending = this.evaluateTick().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = pending;
    return pending;
  }

  private scheduleNextTick(delayMs: number): void {
    if (!this.running) {
      return;
    }
    this.handle = setTimeout(() => {
      this.handle = null;
      this.runTick()
        .catch((error: unknown) => {
          logger.error("Tick loop failed", toErrorPayload(error));
        })
        .finally(() => {
          this.scheduleNextTick(this.intervalMs);
        });
    }, delayMs);
  }

  private async evaluateTick(): Promise<TickOutcome> {
    this.sequence += 1;
    const sequence = this.sequence;
    const now = this.clock();

    let screen: ScreenReading;
    let focused: boolean;
    try {
      [screen, focused] = await Promise.all([
        withTimeout("screen", this.screen.readScreen(), this.signalTimeoutMs),
        withTimeout("focus", this.focus.readFocus(now), this.signalTimeoutMs),
      ]);
    } catch (error) {
      const skipped: SkippedTick = {
        sequence,
        timestamp: now,
        reason: error instanceof Error ? error.message : String(error),
      };

      if (isExpectedSkip(error)) {
        logger.debug("Tick skipped", { ...skipped });
      } else {
        logger.error("Tick failed while reading signals", {
          ...toErrorPayload(error),
          sequence,
        });
        this.emit("failure", error, skipped);
      }

      this.emit("skipped", skipped);
      return { kind: "skipped", skipped };
    }

    // Only consumed once the tick is known to count.
    const activity = this.activity.consumeActivity();
    const verdict = this.fuse({
      classification: screen.classification,
      activity,
      focused,
    });
    this.timer.update(verdict, now);

    const report: TickReport = {
      sequence,
      timestamp: now,
      signals: { ...screen, activity, focused },
      verdict,
      timer: this.timer.getSnapshot(now),
    };
    this.lastReport = report;
    this.emit("tick", report);
    return { kind: "tick", report };
  }
}
