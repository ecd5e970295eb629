import type { FocusConfig } from "../../shared/config/tracker";
import { type Clock, resolveTimestamp, systemClock } from "../../shared/time";
import type {
  PresenceSample,
  PresenceSampleInput,
} from "../../shared/types/signals";
import { rotationMatrixToHeadPose } from "../cv/euler-angles";
import { type FocusSource, SignalUnavailableError } from "./types";

type FocusThresholds = Pick<
  FocusConfig,
  "yawToleranceDeg" | "pitchToleranceDeg" | "staleAfterMs"
>;

export type FocusDetectorOptions = Partial<FocusThresholds> & {
  clock?: Clock;
};

const DEFAULT_THRESHOLDS: FocusThresholds = {
  yawToleranceDeg: 30,
  pitchToleranceDeg: 25,
  staleAfterMs: 5_000,
};

const withinTolerance = (angle: number | null, tolerance: number): boolean => {
  // A face without pose estimates still counts as facing the screen.
  return angle === null || Math.abs(angle) <= tolerance;
};

/**
 * Holds the latest presence sample pushed by the capture client and answers
 * "is the user looking at the screen" for the tick driver.
 */
export class FocusDetector implements FocusSource {
  private readonly thresholds: FocusThresholds;

  private readonly clock: Clock;

  private latest: PresenceSample | null = null;

  private latestReceivedAt = 0;

  constructor({ clock, ...thresholds }: FocusDetectorOptions = {}) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...thresholds };
    this.clock = clock ?? systemClock;
  }

  ingest(input: PresenceSampleInput, receivedAt: number = this.clock()): PresenceSample {
    let yawDeg = input.yawDeg ?? null;
    let pitchDeg = input.pitchDeg ?? null;

    if (input.rotationMatrix) {
      const pose = rotationMatrixToHeadPose(input.rotationMatrix);
      if (pose) {
        yawDeg = pose.yawDeg;
        pitchDeg = pose.pitchDeg;
      }
    }

    const sample: PresenceSample = {
      timestamp: resolveTimestamp(input.timestamp, () => receivedAt),
      faceDetected: input.faceDetected,
      yawDeg: input.faceDetected ? yawDeg : null,
      pitchDeg: input.faceDetected ? pitchDeg : null,
    };

    this.latest = sample;
    this.latestReceivedAt = receivedAt;
    return sample;
  }

  getLatestSample(): PresenceSample | null {
    return this.latest;
  }

  isFocused(sample: PresenceSample): boolean {
    if (!sample.faceDetected) {
      return false;
    }
    return (
      withinTolerance(sample.yawDeg, this.thresholds.yawToleranceDeg) &&
      withinTolerance(sample.pitchDeg, this.thresholds.pitchToleranceDeg)
    );
  }

  async readFocus(now: number = this.clock()): Promise<boolean> {
    const sample = this.latest;
    if (!sample) {
      throw new SignalUnavailableError("focus", "No presence sample received yet");
    }

    const age = now - this.latestReceivedAt;
    if (age > this.thresholds.staleAfterMs) {
      throw new SignalUnavailableError(
        "focus",
        `Presence feed is stale (last sample ${age}ms ago)`,
      );
    }

    return this.isFocused(sample);
  }

  reset(): void {
    this.latest = null;
    this.latestReceivedAt = 0;
  }
}

/** Used when focus tracking is switched off: the user is never "focused". */
export class DisabledFocusSource implements FocusSource {
  async readFocus(): Promise<boolean> {
    return false;
  }
}
