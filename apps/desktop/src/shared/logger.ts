/* eslint-disable no-console */
// Console output mirrors the structured logs locally while they are shipped to Better Stack.
import { monitoringConfig } from "./config/monitoring";

export type LoggerProcessType = "main" | "monitor" | "ingest";

export type LoggerMetadata = Record<string, unknown>;

type LoggerOptions = {
  module: string;
  processType: LoggerProcessType;
};

type LogtailAdapter = {
  log: (level: string, message: string, metadata: LoggerMetadata) => Promise<void>;
  flush: () => Promise<void>;
};

// The client is driven through Reflect so metadata is not narrowed to Logtail's context type.
const createLogtailAdapter = (client: unknown): LogtailAdapter => {
  const logtailClient = client as { log?: unknown; flush?: unknown };

  return {
    log: async (level, message, metadata) => {
      if (typeof logtailClient.log !== "function") {
        return;
      }
      await Reflect.apply(logtailClient.log, logtailClient, [
        message,
        level,
        metadata,
      ]);
    },
    flush: async () => {
      if (typeof logtailClient.flush !== "function") {
        return;
      }
      await Reflect.apply(logtailClient.flush, logtailClient, []);
    },
  };
};

const consoleWriters = {
  debug: console.debug.bind(console),
  info: console.info.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
  fatal: console.error.bind(console),
} as const;

type LogLevel = keyof typeof consoleWriters;

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

let logtailInstance: Promise<LogtailAdapter | null> | null = null;

const loadLogtail = async (): Promise<LogtailAdapter | null> => {
  if (!monitoringConfig.logtail.enabled) {
    return null;
  }

  if (!logtailInstance) {
    logtailInstance = (async () => {
      try {
        const { Logtail } = await import("@logtail/node");
        return createLogtailAdapter(new Logtail(monitoringConfig.logtail.token));
      } catch (error) {
        console.error("Failed to initialise Better Stack Logtail client", error);
        return null;
      }
    })();
  }

  return logtailInstance;
};

const emitLogtail = async (
  level: LogLevel,
  message: string,
  metadata: LoggerMetadata,
) => {
  try {
    const instance = await loadLogtail();
    await instance?.log(level === "fatal" ? "error" : level, message, metadata);
  } catch (error) {
    console.error("Failed to send log to Better Stack", error);
  }
};

const formatConsoleMessage = (level: LogLevel, message: string) => {
  return `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}`;
};

const createEmitter =
  ({ module, processType }: LoggerOptions, level: LogLevel) =>
  (message: string, metadata: LoggerMetadata = {}) => {
    if (levelRank[level] < levelRank[monitoringConfig.logLevel]) {
      return;
    }

    const enrichedMetadata = {
      ...metadata,
      module,
      processType,
      environment: monitoringConfig.environment,
      level,
    };

    consoleWriters[level](formatConsoleMessage(level, message), enrichedMetadata);

    if (monitoringConfig.logtail.enabled) {
      emitLogtail(level, message, enrichedMetadata).catch(() => undefined);
    }
  };

export const createLogger = (options: LoggerOptions) => {
  const flush = async () => {
    const instance = await loadLogtail();
    await instance?.flush();
  };

  return {
    debug: createEmitter(options, "debug"),
    info: createEmitter(options, "info"),
    warn: createEmitter(options, "warn"),
    error: createEmitter(options, "error"),
    fatal: createEmitter(options, "fatal"),
    flush,
  };
};

export type Logger = ReturnType<typeof createLogger>;

const loggerCache = new Map<string, Logger>();

export const getLogger = (
  module: string,
  processType: LoggerProcessType,
): Logger => {
  const cacheKey = `${processType}:${module}`;

  const cached = loggerCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  const logger = createLogger({ module, processType });
  loggerCache.set(cacheKey, logger);
  return logger;
};

export const toErrorPayload = (error: unknown): LoggerMetadata => {
  if (error instanceof Error) {
    return {
      error: error.message,
      name: error.name,
      stack: error.stack,
    };
  }

  return { error: String(error) };
};
