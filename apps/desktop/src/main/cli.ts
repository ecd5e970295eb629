import { parseArgs } from "node:util";
import type { TrackerConfigOverrides } from "../shared/config/tracker";

export type StartCommand = {
  kind: "start";
  overrides: TrackerConfigOverrides;
  quiet: boolean;
};

export type ReportCommand = {
  kind: "report";
  limit: number;
  databasePath: string | null;
};

export type ConfigCommand =
  | { kind: "config"; action: "list"; databasePath: string | null }
  | {
      kind: "config";
      action: "set";
      key: string;
      value: string;
      databasePath: string | null;
    }
  | { kind: "config"; action: "unset"; key: string; databasePath: string | null };

export type CliCommand =
  | StartCommand
  | ReportCommand
  | ConfigCommand
  | { kind: "help" };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const DEFAULT_REPORT_LIMIT = 10;

const NUMERIC_FLAG = /^-?\d+(\.\d+)?$/;

const readNumber = (
  flag: string,
  raw: string | undefined,
  options: { min: number; max: number; integer?: boolean },
): number | null => {
  if (raw === undefined) {
    return null;
  }
  const trimmed = raw.trim();
  if (!NUMERIC_FLAG.test(trimmed)) {
    throw new CliUsageError(`--${flag} expects a number, received "${raw}"`);
  }
  const value = Number(trimmed);
  if (options.integer && !Number.isInteger(value)) {
    throw new CliUsageError(`--${flag} expects a whole number, received "${raw}"`);
  }
  if (value < options.min || value > options.max) {
    throw new CliUsageError(
      `--${flag} must be between ${options.min} and ${options.max}, received "${raw}"`,
    );
  }
  return value;
};

const parseStart = (args: string[]): StartCommand => {
  const { values } = parseArgs({
    args,
    strict: true,
    options: {
      grace: { type: "string" },
      interval: { type: "string" },
      "signal-timeout": { type: "string" },
      "persist-interval": { type: "string" },
      keywords: { type: "string" },
      db: { type: "string" },
      port: { type: "string" },
      "no-focus": { type: "boolean" },
      "no-ingest": { type: "boolean" },
      "activity-log": { type: "boolean" },
      quiet: { type: "boolean", short: "q" },
    },
  });

  const overrides: TrackerConfigOverrides = {};

  const grace = readNumber("grace", values.grace, { min: 0, max: 3600 });
  if (grace !== null) {
    overrides.gracePeriodMs = grace * 1000;
  }
  const interval = readNumber("interval", values.interval, {
    min: 50,
    max: 60_000,
    integer: true,
  });
  if (interval !== null) {
    overrides.tickIntervalMs = interval;
  }
  const signalTimeout = readNumber("signal-timeout", values["signal-timeout"], {
    min: 100,
    max: 60_000,
    integer: true,
  });
  if (signalTimeout !== null) {
    overrides.signalTimeoutMs = signalTimeout;
  }
  const persistInterval = readNumber(
    "persist-interval",
    values["persist-interval"],
    { min: 1_000, max: 600_000, integer: true },
  );
  if (persistInterval !== null) {
    overrides.persistIntervalMs = persistInterval;
  }
  if (values.keywords) {
    overrides.keywordsPath = values.keywords;
  }
  if (values.db) {
    overrides.databasePath = values.db;
  }
  if (values["activity-log"]) {
    overrides.activityLogEnabled = true;
  }
  if (values["no-focus"]) {
    overrides.focus = { enabled: false };
  }

  const port = readNumber("port", values.port, { min: 1, max: 65_535, integer: true });
  if (port !== null || values["no-ingest"]) {
    overrides.ingest = {
      ...(port !== null ? { port } : {}),
      ...(values["no-ingest"] ? { enabled: false } : {}),
    };
  }

  return { kind: "start", overrides, quiet: values.quiet ?? false };
};

const parseReport = (args: string[]): ReportCommand => {
  const { values } = parseArgs({
    args,
    strict: true,
    options: {
      limit: { type: "string", short: "n" },
      db: { type: "string" },
    },
  });

  return {
    kind: "report",
    limit:
      readNumber("limit", values.limit, { min: 1, max: 1000, integer: true }) ??
      DEFAULT_REPORT_LIMIT,
    databasePath: values.db ?? null,
  };
};

const parseConfig = (args: string[]): ConfigCommand => {
  const { values, positionals } = parseArgs({
    args,
    strict: true,
    allowPositionals: true,
    options: {
      db: { type: "string" },
    },
  });
  const databasePath = values.db ?? null;
  const [action = "list", key, value] = positionals;

  switch (action) {
    case "list":
      return { kind: "config", action: "list", databasePath };
    case "set":
      if (!key || value === undefined) {
        throw new CliUsageError("config set expects <key> <value>");
      }
      return { kind: "config", action: "set", key, value, databasePath };
    case "unset":
      if (!key) {
        throw new CliUsageError("config unset expects <key>");
      }
      return { kind: "config", action: "unset", key, databasePath };
    default:
      throw new CliUsageError(`Unknown config action "${action}"`);
  }
};

const isParseArgsError = (error: unknown): error is Error =>
  error instanceof TypeError &&
  "code" in error &&
  typeof error.code === "string" &&
  error.code.startsWith("ERR_PARSE_ARGS");

export const parseCommandLine = (argv: readonly string[]): CliCommand => {
  try {
    return parseCommand(argv);
  } catch (error) {
    if (isParseArgsError(error)) {
      throw new CliUsageError(error.message);
    }
    throw error;
  }
};

const parseCommand = (argv: readonly string[]): CliCommand => {
  const [command, ...rest] = argv;

  switch (command) {
    case "start":
      return parseStart(rest);
    case "report":
      return parseReport(rest);
    case "config":
      return parseConfig(rest);
    case undefined:
    case "help":
    case "--help":
    case "-h":
      return { kind: "help" };
    default:
      throw new CliUsageError(`Unknown command "${command}"`);
  }
};
