/**
 * Command-line entry point. `start` punches in and runs the monitor until
 * SIGINT/SIGTERM, `report` prints recent sessions and `config` manages the
 * persisted tracker preferences.
 */
import "./loadEnv";
import {
  type TrackerConfigOverrides,
  resolveTrackerConfig,
} from "../shared/config/tracker";
import { initializeI18n, translate as t } from "../shared/i18n/config";
import { getLogger, toErrorPayload } from "../shared/logger";
import { formatStatusLine } from "../shared/status/format";
import { formatDuration } from "../shared/time";
import { createScreenClassifierFromFile } from "../worker/classification/screen-classifier";
import { TickDriver } from "../worker/driver/tick-driver";
import { WindowTitleSource } from "../worker/sources/window-title-source";
import { ProductivityTimer } from "../worker/timer/productivity-timer";
import { type CliCommand, CliUsageError, parseCommandLine } from "./cli";
import { closeDatabase, initializeDatabase } from "./database/client";
import { endSession, listRecentSessions } from "./database/sessionRepository";
import {
  TRACKER_SETTING_KEYS,
  deleteSetting,
  isTrackerSettingKey,
  listSettings,
  normaliseTrackerSetting,
  setSetting,
} from "./database/settingsRepository";
import {
  addBreadcrumb,
  captureException,
  flushSentry,
  initSentry,
  registerProcessHandlers,
} from "./sentry";
import { SessionRecorder } from "./sessionRecorder";
import {
  type SignalIngestServer,
  startSignalIngestServer,
} from "./signalIngestServer";
import {
  createSignalSources,
  punchIn,
  resolveStartConfig,
} from "./trackerStartup";

const logger = getLogger("main", "main");

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;

const print = (line: string): void => {
  process.stdout.write(`${line}\n`);
};

const openDatabase = (databasePath: string | null): void => {
  const resolved = resolveTrackerConfig(
    databasePath ? { databasePath } : undefined,
  ).databasePath;
  initializeDatabase(resolved);
};

const waitForShutdownSignal = (): Promise<NodeJS.Signals> => {
  return new Promise((resolve) => {
    const handler = (signal: NodeJS.Signals) => {
      process.off("SIGINT", handler);
      process.off("SIGTERM", handler);
      resolve(signal);
    };
    process.on("SIGINT", handler);
    process.on("SIGTERM", handler);
  });
};

const runStart = async (
  flags: TrackerConfigOverrides,
  quiet: boolean,
): Promise<number> => {
  openDatabase(flags.databasePath ?? null);
  const config = resolveStartConfig(flags);

  const classifier = await createScreenClassifierFromFile(config.keywordsPath);
  const startedAt = Date.now();

  const timer = new ProductivityTimer({
    gracePeriodMs: config.gracePeriodMs,
    startedAt,
    onTransition: ({ from, to, timestamp }) => {
      logger.debug("Timer transition", { from, to, timestamp });
      addBreadcrumb(`Timer ${from} -> ${to}`, { timestamp });
    },
  });
  const { activity, focusDetector, focus } = createSignalSources(config);

  const driver = new TickDriver({
    timer,
    screen: new WindowTitleSource(classifier),
    focus,
    activity,
    intervalMs: config.tickIntervalMs,
    signalTimeoutMs: config.signalTimeoutMs,
  });

  const { session, value: ingest } = await punchIn(
    startedAt,
    async (opened): Promise<SignalIngestServer | null> => {
      if (!config.ingest.enabled) {
        return null;
      }
      return startSignalIngestServer(config.ingest, {
        activity,
        focus: focusDetector,
        sessionId: opened.id,
        getSnapshot: () => timer.getSnapshot(),
        getLastReport: () => driver.getLastReport(),
      });
    },
  );

  const recorder = new SessionRecorder({
    sessionId: session.id,
    startedAt,
    timer,
    persistIntervalMs: config.persistIntervalMs,
    activityLogEnabled: config.activityLogEnabled,
    onPersistError: (error) => {
      captureException(error, { sessionId: session.id });
    },
  });

  const interactive = !quiet && process.stdout.isTTY === true;

  driver.on("tick", (report) => {
    recorder.handleTick(report);
    if (interactive) {
      process.stdout.write(`\r${formatStatusLine(report.timer)}\u001b[K`);
    }
  });
  driver.on("failure", (error, skipped) => {
    captureException(error, { sequence: skipped.sequence });
  });

  if (ingest) {
    print(t("cli.ingestListening", { origin: ingest.origin }));
  }

  print(t("cli.punchedIn", { sessionId: session.id }));
  if (!config.focus.enabled) {
    print(t("cli.focusDisabled"));
  }
  logger.info("Session started", {
    sessionId: session.id,
    gracePeriodMs: config.gracePeriodMs,
    tickIntervalMs: config.tickIntervalMs,
    focusEnabled: config.focus.enabled,
  });

  recorder.start();
  driver.start();

  const signal = await waitForShutdownSignal();
  logger.info("Shutdown requested", { signal });

  await driver.stop();
  const punchOut = Date.now();
  const totals = recorder.stop(punchOut);
  endSession(session.id, punchOut);

  if (ingest) {
    await ingest.close();
  }

  if (interactive) {
    process.stdout.write("\n");
  }
  print(
    t("cli.punchedOut", {
      sessionId: session.id,
      productive: formatDuration(totals.productiveSec),
      unproductive: formatDuration(totals.unproductiveSec),
    }),
  );
  return EXIT_OK;
};

const formatInstant = (epochMs: number): string => {
  return new Date(epochMs).toLocaleString();
};

const runReport = (limit: number, databasePath: string | null): number => {
  openDatabase(databasePath);
  const sessions = listRecentSessions(limit);
  if (sessions.length === 0) {
    print(t("cli.noSessions"));
    return EXIT_OK;
  }

  print(t("cli.reportHeader"));
  sessions.forEach((session) => {
    print(
      t("cli.reportRow", {
        id: session.id,
        punchIn: formatInstant(session.punchIn),
        punchOut:
          session.punchOut === null ? t("cli.active") : formatInstant(session.punchOut),
        productive: formatDuration(session.totalProductiveSec),
        unproductive: formatDuration(session.totalUnproductiveSec),
      }),
    );
  });
  return EXIT_OK;
};

const runConfig = (command: Extract<CliCommand, { kind: "config" }>): number => {
  openDatabase(command.databasePath);

  if (command.action === "list") {
    const rows = listSettings();
    if (rows.length === 0) {
      print(t("cli.noSettings"));
    }
    rows.forEach((row) => {
      print(t("cli.settingSaved", { key: row.key, value: row.value }));
    });
    return EXIT_OK;
  }

  if (!isTrackerSettingKey(command.key)) {
    print(
      t("cli.settingUnknown", {
        key: command.key,
        keys: TRACKER_SETTING_KEYS.join(", "),
      }),
    );
    return EXIT_USAGE;
  }

  if (command.action === "unset") {
    deleteSetting(command.key);
    return EXIT_OK;
  }

  const value = normaliseTrackerSetting(command.key, command.value);
  if (value === null) {
    print(t("cli.settingInvalid", { key: command.key, value: command.value }));
    return EXIT_USAGE;
  }
  setSetting(command.key, value);
  print(t("cli.settingSaved", { key: command.key, value }));
  return EXIT_OK;
};

const run = async (command: CliCommand): Promise<number> => {
  switch (command.kind) {
    case "start":
      return runStart(command.overrides, command.quiet);
    case "report":
      return runReport(command.limit, command.databasePath);
    case "config":
      return runConfig(command);
    case "help":
      print(t("cli.usage"));
      return EXIT_OK;
    default: {
      const exhaustive: never = command;
      throw new Error(`Unhandled command: ${JSON.stringify(exhaustive)}`);
    }
  }
};

const main = async (argv: readonly string[]): Promise<number> => {
  initializeI18n();

  let command: CliCommand;
  try {
    command = parseCommandLine(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`${error.message}\n${t("cli.usage")}\n`);
      return EXIT_USAGE;
    }
    throw error;
  }

  initSentry(command.kind);
  registerProcessHandlers();

  try {
    return await run(command);
  } catch (error) {
    logger.fatal("Command failed", { ...toErrorPayload(error), command: command.kind });
    captureException(error, { command: command.kind });
    return EXIT_FAILURE;
  } finally {
    closeDatabase();
    await Promise.all([logger.flush(), flushSentry()]);
  }
};

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.stack : String(error)}\n`);
    process.exitCode = EXIT_FAILURE;
  });
