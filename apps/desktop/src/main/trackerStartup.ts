import {
  type TrackerConfig,
  type TrackerConfigOverrides,
  mergeTrackerConfig,
  reconcileTrackerConfig,
  resolveTrackerConfig,
} from "../shared/config/tracker";
import type { RuntimeEnv } from "../shared/env";
import { getLogger, toErrorPayload } from "../shared/logger";
import { ActivityTracker } from "../worker/sources/activity-tracker";
import {
  DisabledFocusSource,
  FocusDetector,
} from "../worker/sources/focus-detector";
import type { FocusSource } from "../worker/sources/types";
import {
  type WorkSessionSummary,
  endSession,
  startSession,
} from "./database/sessionRepository";
import { readTrackerSettingOverrides } from "./database/settingsRepository";

const logger = getLogger("tracker-startup", "main");

/** Defaults, environment, stored preferences, then command-line flags. */
export const resolveStartConfig = (
  flags: TrackerConfigOverrides,
  env: RuntimeEnv = process.env,
): TrackerConfig => {
  const withStored = mergeTrackerConfig(
    resolveTrackerConfig(undefined, env),
    readTrackerSettingOverrides(),
  );
  const requested = mergeTrackerConfig(withStored, flags);
  const config = reconcileTrackerConfig(requested);

  if (requested.focus.enabled && !config.focus.enabled) {
    logger.warn("Focus tracking disabled because the ingest server is off");
  }

  return config;
};

export type SignalSources = {
  activity: ActivityTracker;
  /** The detector fed by the ingest server; null when focus is disabled. */
  focusDetector: FocusDetector | null;
  focus: FocusSource;
};

export const createSignalSources = (config: TrackerConfig): SignalSources => {
  const activity = new ActivityTracker();

  if (!config.focus.enabled) {
    return { activity, focusDetector: null, focus: new DisabledFocusSource() };
  }

  const focusDetector = new FocusDetector(config.focus);
  return { activity, focusDetector, focus: focusDetector };
};

export type PunchIn<T> = {
  session: WorkSessionSummary;
  value: T;
};

/**
 * Opens a session and runs `setup` against it. When setup fails the session
 * is punched out at the same instant and the error is rethrown.
 */
export const punchIn = async <T>(
  now: number,
  setup: (session: WorkSessionSummary) => Promise<T>,
): Promise<PunchIn<T>> => {
  const session = startSession(now);

  try {
    const value = await setup(session);
    return { session, value };
  } catch (error) {
    logger.error("Session setup failed; punching out", {
      ...toErrorPayload(error),
      sessionId: session.id,
    });
    endSession(session.id, now);
    throw error;
  }
};
