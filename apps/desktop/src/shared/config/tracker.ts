import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  type RuntimeEnv,
  getEnvVar,
  parseNumericEnv,
  parseOptionalBoolean,
  parseStringEnv,
} from "../env";

export type FocusConfig = {
  /** When false, focus is always reported as false and the webcam feed is not required. */
  enabled: boolean;
  /** Maximum absolute head yaw (degrees) still counted as facing the screen. */
  yawToleranceDeg: number;
  /** Maximum absolute head pitch (degrees) still counted as facing the screen. */
  pitchToleranceDeg: number;
  /** A presence feed silent for longer than this is treated as unavailable. */
  staleAfterMs: number;
};

export type IngestConfig = {
  enabled: boolean;
  host: string;
  port: number;
};

export type TrackerConfig = {
  gracePeriodMs: number;
  tickIntervalMs: number;
  signalTimeoutMs: number;
  persistIntervalMs: number;
  activityLogEnabled: boolean;
  keywordsPath: string;
  databasePath: string;
  focus: FocusConfig;
  ingest: IngestConfig;
};

export type TrackerConfigOverrides = Partial<
  Omit<TrackerConfig, "focus" | "ingest">
> & {
  focus?: Partial<FocusConfig>;
  ingest?: Partial<IngestConfig>;
};

export const DEFAULT_KEYWORDS_PATH = fileURLToPath(
  new URL("../../../config/keywords.json", import.meta.url),
);

export const DEFAULT_DATABASE_PATH = path.join(
  os.homedir(),
  ".worktally",
  "worktally.sqlite",
);

export const DEFAULT_TRACKER_CONFIG: TrackerConfig = {
  gracePeriodMs: 15_000,
  tickIntervalMs: 500,
  signalTimeoutMs: 2_000,
  persistIntervalMs: 10_000,
  activityLogEnabled: false,
  keywordsPath: DEFAULT_KEYWORDS_PATH,
  databasePath: DEFAULT_DATABASE_PATH,
  focus: {
    enabled: true,
    yawToleranceDeg: 30,
    pitchToleranceDeg: 25,
    staleAfterMs: 5_000,
  },
  ingest: {
    enabled: true,
    host: "127.0.0.1",
    port: 47615,
  },
};

export const cloneTrackerConfig = (config: TrackerConfig): TrackerConfig => {
  return {
    ...config,
    focus: { ...config.focus },
    ingest: { ...config.ingest },
  };
};

export const mergeTrackerConfig = (
  current: TrackerConfig,
  overrides?: TrackerConfigOverrides,
): TrackerConfig => {
  if (!overrides) {
    return cloneTrackerConfig(current);
  }

  const { focus, ingest, ...shallow } = overrides;

  return {
    ...current,
    ...shallow,
    focus: { ...current.focus, ...(focus ?? {}) },
    ingest: { ...current.ingest, ...(ingest ?? {}) },
  };
};

const assignIfPresent = <T extends object, K extends keyof T>(
  target: T,
  key: K,
  value: T[K] | null,
): void => {
  if (value !== null) {
    target[key] = value;
  }
};

export const createTrackerEnvOverrides = (
  env: RuntimeEnv = process.env,
): TrackerConfigOverrides => {
  const read = (key: string) => getEnvVar(key, env);
  const overrides: TrackerConfigOverrides = {};
  const focus: Partial<FocusConfig> = {};
  const ingest: Partial<IngestConfig> = {};

  const graceSeconds = parseNumericEnv(read("WORKTALLY_GRACE_PERIOD_SEC"), {
    min: 0,
    max: 3600,
  });
  assignIfPresent(
    overrides,
    "gracePeriodMs",
    graceSeconds === null ? null : graceSeconds * 1000,
  );
  assignIfPresent(
    overrides,
    "tickIntervalMs",
    parseNumericEnv(read("WORKTALLY_TICK_INTERVAL_MS"), {
      min: 50,
      max: 60_000,
      integer: true,
    }),
  );
  assignIfPresent(
    overrides,
    "signalTimeoutMs",
    parseNumericEnv(read("WORKTALLY_SIGNAL_TIMEOUT_MS"), {
      min: 100,
      max: 60_000,
      integer: true,
    }),
  );
  assignIfPresent(
    overrides,
    "persistIntervalMs",
    parseNumericEnv(read("WORKTALLY_PERSIST_INTERVAL_MS"), {
      min: 1_000,
      max: 600_000,
      integer: true,
    }),
  );
  assignIfPresent(
    overrides,
    "activityLogEnabled",
    parseOptionalBoolean(read("WORKTALLY_ACTIVITY_LOG")),
  );
  assignIfPresent(
    overrides,
    "keywordsPath",
    parseStringEnv(read("WORKTALLY_KEYWORDS_PATH")),
  );
  assignIfPresent(
    overrides,
    "databasePath",
    parseStringEnv(read("WORKTALLY_DB_PATH")),
  );

  assignIfPresent(
    focus,
    "enabled",
    parseOptionalBoolean(read("WORKTALLY_FOCUS_ENABLED")),
  );
  assignIfPresent(
    focus,
    "yawToleranceDeg",
    parseNumericEnv(read("WORKTALLY_FOCUS_YAW_DEG"), { min: 1, max: 90 }),
  );
  assignIfPresent(
    focus,
    "pitchToleranceDeg",
    parseNumericEnv(read("WORKTALLY_FOCUS_PITCH_DEG"), { min: 1, max: 90 }),
  );
  assignIfPresent(
    focus,
    "staleAfterMs",
    parseNumericEnv(read("WORKTALLY_PRESENCE_STALE_MS"), {
      min: 250,
      max: 600_000,
      integer: true,
    }),
  );

  assignIfPresent(
    ingest,
    "enabled",
    parseOptionalBoolean(read("WORKTALLY_INGEST_ENABLED")),
  );
  assignIfPresent(ingest, "host", parseStringEnv(read("WORKTALLY_INGEST_HOST")));
  assignIfPresent(
    ingest,
    "port",
    parseNumericEnv(read("WORKTALLY_INGEST_PORT"), {
      min: 1,
      max: 65_535,
      integer: true,
    }),
  );

  if (Object.keys(focus).length > 0) {
    overrides.focus = focus;
  }
  if (Object.keys(ingest).length > 0) {
    overrides.ingest = ingest;
  }

  return overrides;
};

/**
 * Presence samples only arrive through the ingest server, so focus tracking is
 * switched off whenever the server is.
 */
export const reconcileTrackerConfig = (config: TrackerConfig): TrackerConfig => {
  if (config.ingest.enabled || !config.focus.enabled) {
    return config;
  }
  return {
    ...config,
    focus: { ...config.focus, enabled: false },
  };
};

/**
 * Defaults, then environment, then explicit overrides (CLI flags).
 */
export const resolveTrackerConfig = (
  overrides?: TrackerConfigOverrides,
  env: RuntimeEnv = process.env,
): TrackerConfig => {
  const fromEnv = mergeTrackerConfig(
    DEFAULT_TRACKER_CONFIG,
    createTrackerEnvOverrides(env),
  );
  return mergeTrackerConfig(fromEnv, overrides);
};
