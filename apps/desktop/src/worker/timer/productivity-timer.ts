import { type Clock, systemClock } from "../../shared/time";
import type {
  TimerSnapshot,
  TimerState,
  TimerTransitionEvent,
} from "../../shared/types/timer";

export const DEFAULT_GRACE_PERIOD_MS = 15_000;

export type ProductivityTimerOptions = {
  gracePeriodMs?: number;
  /** Used only for queries that are not given an explicit `now`. */
  clock?: Clock;
  /** Timestamp of the initial PAUSED state. Defaults to `clock()`. */
  startedAt?: number;
  onTransition?: (event: TimerTransitionEvent) => void;
};

const resolveGracePeriod = (value: number | undefined): number => {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    return DEFAULT_GRACE_PERIOD_MS;
  }
  return value;
};

/**
 * Accumulates productive time from a stream of per-tick verdicts.
 *
 * PAUSED -> RUNNING on a productive verdict. RUNNING -> IN_GRACE_PERIOD on the
 * first unproductive verdict, at which point the finished run is folded into
 * the accumulator. A productive verdict inside the grace window returns to
 * RUNNING without crediting the lapse; an unproductive verdict after the
 * deadline settles into PAUSED.
 */
export class ProductivityTimer {
  readonly gracePeriodMs: number;

  private readonly clock: Clock;

  private readonly onTransition?: (event: TimerTransitionEvent) => void;

  private state: TimerState = "PAUSED";

  private accumulatedMs = 0;

  private lastTransitionAt: number;

  private graceDeadline = 0;

  constructor(options: ProductivityTimerOptions = {}) {
    this.gracePeriodMs = resolveGracePeriod(options.gracePeriodMs);
    this.clock = options.clock ?? systemClock;
    this.onTransition = options.onTransition;
    this.lastTransitionAt = options.startedAt ?? this.clock();
  }

  update(verdict: boolean, now: number): TimerState {
    switch (this.state) {
      case "PAUSED":
        if (verdict) {
          this.transitionTo("RUNNING", now);
        }
        break;
      case "RUNNING":
        if (!verdict) {
          this.accumulatedMs += this.liveRunMs(now);
          this.graceDeadline = now + this.gracePeriodMs;
          this.transitionTo("IN_GRACE_PERIOD", now);
        }
        break;
      case "IN_GRACE_PERIOD":
        if (verdict) {
          this.transitionTo("RUNNING", now);
        } else if (now > this.graceDeadline) {
          this.transitionTo("PAUSED", now);
        }
        break;
      default: {
        const exhaustive: never = this.state;
        throw new Error(`Unknown timer state: ${String(exhaustive)}`);
      }
    }

    return this.state;
  }

  getState(): TimerState {
    return this.state;
  }

  getElapsedProductiveMs(now: number = this.clock()): number {
    if (this.state === "RUNNING") {
      return this.accumulatedMs + this.liveRunMs(now);
    }
    return this.accumulatedMs;
  }

  getElapsedProductiveSeconds(now: number = this.clock()): number {
    return this.getElapsedProductiveMs(now) / 1000;
  }

  getRemainingGraceSeconds(now: number = this.clock()): number {
    if (this.state !== "IN_GRACE_PERIOD") {
      return 0;
    }
    return Math.max(0, Math.floor((this.graceDeadline - now) / 1000));
  }

  getSnapshot(now: number = this.clock()): TimerSnapshot {
    return {
      state: this.state,
      elapsedProductiveSeconds: this.getElapsedProductiveSeconds(now),
      accumulatedProductiveSeconds: this.accumulatedMs / 1000,
      remainingGraceSeconds: this.getRemainingGraceSeconds(now),
      lastTransitionAt: this.lastTransitionAt,
      graceDeadline:
        this.state === "IN_GRACE_PERIOD" ? this.graceDeadline : null,
      capturedAt: now,
    };
  }

  reset(now: number = this.clock()): void {
    this.state = "PAUSED";
    this.accumulatedMs = 0;
    this.graceDeadline = 0;
    this.lastTransitionAt = now;
  }

  // A clock that steps backwards credits nothing rather than a negative run.
  private liveRunMs(now: number): number {
    return Math.max(0, now - this.lastTransitionAt);
  }

  private transitionTo(next: TimerState, timestamp: number): void {
    const previous = this.state;
    this.state = next;
    this.lastTransitionAt = timestamp;

    this.onTransition?.({
      from: previous,
      to: next,
      timestamp,
      snapshot: this.getSnapshot(timestamp),
    });
  }
}
