import type { SignalSnapshot } from "./signals";

export type TimerState = "RUNNING" | "PAUSED" | "IN_GRACE_PERIOD";

export type TimerSnapshot = {
  state: TimerState;
  elapsedProductiveSeconds: number;
  accumulatedProductiveSeconds: number;
  remainingGraceSeconds: number;
  lastTransitionAt: number;
  graceDeadline: number | null;
  capturedAt: number;
};

export type TimerTransitionEvent = {
  from: TimerState;
  to: TimerState;
  timestamp: number;
  snapshot: TimerSnapshot;
};

export type TickReport = {
  sequence: number;
  timestamp: number;
  signals: SignalSnapshot;
  verdict: boolean;
  timer: TimerSnapshot;
};

export type SkippedTick = {
  sequence: number;
  timestamp: number;
  reason: string;
};
