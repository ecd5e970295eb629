import type { ScreenClassification } from "../../shared/types/signals";

export type FusionInput = {
  classification: ScreenClassification;
  activity: boolean;
  focused: boolean;
};

/**
 * Collapses the three per-tick signals into a single productive verdict.
 *
 * Unproductive windows never count. Productive windows count on either focus
 * or input. Neutral windows count only while the user faces the screen.
 */
export const fuseSignals = ({
  classification,
  activity,
  focused,
}: FusionInput): boolean => {
  switch (classification) {
    case "UNPRODUCTIVE":
      return false;
    case "PRODUCTIVE":
      return focused || activity;
    case "NEUTRAL":
      return focused;
    default: {
      const exhaustive: never = classification;
      return exhaustive;
    }
  }
};
