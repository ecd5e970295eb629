import { type Translate, translate } from "../i18n/config";
import { formatDuration } from "../time";
import type { TimerSnapshot, TimerState } from "../types/timer";

export type StatusView = {
  state: TimerState;
  label: string;
  elapsed: string;
  elapsedProductiveSeconds: number;
  remainingGraceSeconds: number;
};

export const formatStatusLabel = (
  state: TimerState,
  remainingGraceSeconds: number,
  t: Translate = translate,
): string => {
  switch (state) {
    case "RUNNING":
      return t("status.RUNNING");
    case "PAUSED":
      return t("status.PAUSED");
    case "IN_GRACE_PERIOD":
      return t("status.IN_GRACE_PERIOD", { seconds: remainingGraceSeconds });
    default: {
      const exhaustive: never = state;
      return String(exhaustive);
    }
  }
};

export const buildStatusView = (
  snapshot: TimerSnapshot,
  t: Translate = translate,
): StatusView => ({
  state: snapshot.state,
  label: formatStatusLabel(snapshot.state, snapshot.remainingGraceSeconds, t),
  elapsed: formatDuration(snapshot.elapsedProductiveSeconds),
  elapsedProductiveSeconds: snapshot.elapsedProductiveSeconds,
  remainingGraceSeconds: snapshot.remainingGraceSeconds,
});

export const formatStatusLine = (
  snapshot: TimerSnapshot,
  t: Translate = translate,
): string => {
  const view = buildStatusView(snapshot, t);
  return t("status.line", { label: view.label, elapsed: view.elapsed });
};
