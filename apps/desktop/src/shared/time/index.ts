export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export const resolveTimestamp = (value?: number, clock: Clock = systemClock): number => {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  return clock();
};

const pad = (value: number): string => String(value).padStart(2, "0");

/**
 * Formats a duration as `HH:MM:SS`. Hours keep growing past 99 rather than wrapping.
 */
export const formatDuration = (totalSeconds: number): string => {
  const safeSeconds =
    Number.isFinite(totalSeconds) && totalSeconds > 0 ? totalSeconds : 0;
  const hours = Math.floor(safeSeconds / 3600);
  const minutes = Math.floor((safeSeconds % 3600) / 60);
  const seconds = Math.floor(safeSeconds % 60);
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
};
