import * as Sentry from "@sentry/node";
import type { Breadcrumb, NodeOptions } from "@sentry/node";
import { monitoringConfig } from "../shared/config/monitoring";
import { getLogger } from "../shared/logger";

const logger = getLogger("sentry-main", "main");

let isInitialised = false;
let handlersRegistered = false;

const buildDefaultBreadcrumb = (message: string): Breadcrumb => ({
  timestamp: Date.now() / 1000,
  level: "info",
  category: "application",
  message,
});

export const captureException = (
  error: unknown,
  context?: Record<string, unknown>,
) => {
  if (!isInitialised || !monitoringConfig.sentry.enabled) {
    return;
  }

  Sentry.captureException(error, {
    contexts: context ? { metadata: context } : undefined,
  });
};

export const addBreadcrumb = (message: string, data?: Record<string, unknown>) => {
  if (!isInitialised) {
    return;
  }
  Sentry.addBreadcrumb({ ...buildDefaultBreadcrumb(message), data });
};

const resolveReasonMessage = (reason: unknown): string => {
  if (reason instanceof Error) {
    return reason.message;
  }

  if (typeof reason === "string") {
    return reason;
  }

  try {
    return JSON.stringify(reason);
  } catch {
    return "unknown";
  }
};

export const registerProcessHandlers = () => {
  if (handlersRegistered) {
    return;
  }
  handlersRegistered = true;

  process.on("uncaughtException", (error) => {
    logger.fatal("Uncaught exception", {
      error: error.message,
      stack: error.stack,
    });
    captureException(error);
  });

  process.on("unhandledRejection", (reason) => {
    const error =
      reason instanceof Error ? reason : new Error(resolveReasonMessage(reason));
    logger.fatal("Unhandled promise rejection", {
      error: error.message,
      stack: error.stack,
    });
    captureException(error);
  });
};

export const initSentry = (command: string) => {
  if (!monitoringConfig.sentry.enabled || isInitialised) {
    if (!monitoringConfig.sentry.enabled) {
      logger.debug("Skipping Sentry initialisation: disabled by configuration");
    }
    return;
  }

  Sentry.init({
    dsn: monitoringConfig.sentry.dsn,
    environment: monitoringConfig.environment,
    release: monitoringConfig.release,
    beforeSend: monitoringConfig.sentry.beforeSend as NonNullable<
      NodeOptions["beforeSend"]
    >,
    tracesSampleRate: monitoringConfig.sentry.tracesSampleRate,
  });

  Sentry.setTag("command", command);
  Sentry.setContext("runtime", {
    node: process.versions.node,
    platform: process.platform,
  });
  Sentry.addBreadcrumb(buildDefaultBreadcrumb(`Sentry initialised for ${command}`));

  isInitialised = true;
};

export const flushSentry = async (timeoutMs = 2_000): Promise<void> => {
  if (!isInitialised) {
    return;
  }
  await Sentry.flush(timeoutMs);
};
