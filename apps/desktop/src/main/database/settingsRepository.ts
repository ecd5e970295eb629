import { asc, eq } from "drizzle-orm";
import type { TrackerConfigOverrides } from "../../shared/config/tracker";
import { parseNumericEnv, parseOptionalBoolean } from "../../shared/env";
import { getDatabase } from "./client";
import { type SettingRow, settings } from "./schema";

/** Persisted preferences that override the tracker defaults and environment. */
export const TRACKER_SETTING_KEYS = [
  "grace-period-sec",
  "focus-enabled",
  "activity-log",
] as const;

export type TrackerSettingKey = (typeof TRACKER_SETTING_KEYS)[number];

export const isTrackerSettingKey = (key: string): key is TrackerSettingKey => {
  return TRACKER_SETTING_KEYS.some((candidate) => candidate === key);
};

export const getSetting = (key: string): string | null => {
  const db = getDatabase();
  const result = db.select().from(settings).where(eq(settings.key, key)).get();
  return result?.value ?? null;
};

export const setSetting = (key: string, value: string): void => {
  const db = getDatabase();
  db.insert(settings)
    .values({ key, value })
    .onConflictDoUpdate({
      target: settings.key,
      set: { value },
    })
    .run();
};

export const deleteSetting = (key: string): void => {
  const db = getDatabase();
  db.delete(settings).where(eq(settings.key, key)).run();
};

export const listSettings = (): SettingRow[] => {
  const db = getDatabase();
  return db.select().from(settings).orderBy(asc(settings.key)).all();
};

/**
 * Validates a value for a tracker setting. Returns the normalised string to
 * store, or null when the value is not acceptable for that key.
 */
export const normaliseTrackerSetting = (
  key: TrackerSettingKey,
  value: string,
): string | null => {
  switch (key) {
    case "grace-period-sec": {
      const seconds = parseNumericEnv(value, { min: 0, max: 3600 });
      return seconds === null ? null : String(seconds);
    }
    case "focus-enabled":
    case "activity-log": {
      const flag = parseOptionalBoolean(value);
      return flag === null ? null : String(flag);
    }
    default: {
      const exhaustive: never = key;
      return exhaustive;
    }
  }
};

export const readTrackerSettingOverrides = (): TrackerConfigOverrides => {
  const overrides: TrackerConfigOverrides = {};

  const graceSeconds = parseNumericEnv(getSetting("grace-period-sec"), {
    min: 0,
    max: 3600,
  });
  if (graceSeconds !== null) {
    overrides.gracePeriodMs = graceSeconds * 1000;
  }

  const focusEnabled = parseOptionalBoolean(getSetting("focus-enabled"));
  if (focusEnabled !== null) {
    overrides.focus = { enabled: focusEnabled };
  }

  const activityLog = parseOptionalBoolean(getSetting("activity-log"));
  if (activityLog !== null) {
    overrides.activityLogEnabled = activityLog;
  }

  return overrides;
};
