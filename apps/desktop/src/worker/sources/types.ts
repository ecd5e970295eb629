import type { ScreenReading } from "../../shared/types/signals";

/** Thrown by a source that has no trustworthy reading for the current tick. */
export class SignalUnavailableError extends Error {
  readonly signal: "screen" | "focus" | "activity";

  constructor(signal: SignalUnavailableError["signal"], message: string) {
    super(message);
    this.name = "SignalUnavailableError";
    this.signal = signal;
  }
}

export interface ScreenSource {
  readScreen(): Promise<ScreenReading>;
}

export interface FocusSource {
  readFocus(now: number): Promise<boolean>;
}

/** Reports whether input happened since the previous call, then clears. */
export interface ActivitySource {
  consumeActivity(): boolean;
}
