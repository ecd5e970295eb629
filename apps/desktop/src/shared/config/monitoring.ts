import type { RuntimeEnv } from "../env";
import { parseBooleanFlag, parseNumericEnv } from "../env";

type Environment = string;

export type SanitizableSentryEvent = Record<string, unknown>;

const resolveEnvironment = (env: RuntimeEnv): Environment => {
  const explicitEnv = env.WORKTALLY_ENV ?? env.APP_ENV;

  if (explicitEnv && explicitEnv.trim().length > 0) {
    return explicitEnv;
  }

  const nodeEnv = env.NODE_ENV ?? "development";
  if (nodeEnv.trim().length > 0) {
    return nodeEnv;
  }

  return "development";
};

// Window titles routinely carry document names and e-mail subjects.
const SENSITIVE_KEYS = [
  "password",
  "token",
  "secret",
  "authorization",
  "auth",
  "email",
  "phone",
  "windowtitle",
  "title",
];

const isPlainRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

const stringifyUserId = (value: unknown): string => {
  if (typeof value === "string") {
    return value;
  }

  if (
    typeof value === "number" ||
    typeof value === "boolean" ||
    typeof value === "bigint"
  ) {
    return String(value);
  }

  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable-user-id]";
  }
};

const scrubValue = (value: unknown): unknown => {
  if (value == null) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => scrubValue(item));
  }

  if (isPlainRecord(value)) {
    const result: Record<string, unknown> = {};

    Object.entries(value).forEach(([key, nestedValue]) => {
      const lowerKey = key.toLowerCase();
      if (
        SENSITIVE_KEYS.some((sensitiveKey) => lowerKey.includes(sensitiveKey))
      ) {
        result[key] = "[redacted]";
        return;
      }

      result[key] = scrubValue(nestedValue);
    });

    return result;
  }

  return value;
};

const sanitizeSentryEvent = (event: unknown): unknown => {
  if (!isPlainRecord(event)) {
    return event;
  }

  const eventRecord: SanitizableSentryEvent = { ...event };

  const rawBreadcrumbs = eventRecord.breadcrumbs;
  if (Array.isArray(rawBreadcrumbs)) {
    eventRecord.breadcrumbs = rawBreadcrumbs
      .filter(isPlainRecord)
      .map((breadcrumb) => {
        const breadcrumbRecord = { ...breadcrumb };
        if ("data" in breadcrumbRecord) {
          breadcrumbRecord.data = scrubValue(breadcrumbRecord.data);
        }
        return breadcrumbRecord;
      });
  }

  eventRecord.request = undefined;

  if (isPlainRecord(eventRecord.extra)) {
    eventRecord.extra = scrubValue(eventRecord.extra);
  }

  if (isPlainRecord(eventRecord.contexts)) {
    eventRecord.contexts = scrubValue(eventRecord.contexts);
  }

  const rawUser = eventRecord.user;
  if (isPlainRecord(rawUser)) {
    const userId = rawUser.id;
    eventRecord.user =
      userId != null ? { id: stringifyUserId(userId) } : undefined;
  }

  return eventRecord;
};

export type MonitoringConfig = {
  environment: Environment;
  release?: string;
  sentry: {
    dsn: string;
    enabled: boolean;
    enableInDevelopment: boolean;
    tracesSampleRate: number;
    beforeSend: typeof sanitizeSentryEvent;
  };
  logtail: {
    token: string;
    enabled: boolean;
    consoleOnly: boolean;
  };
  logLevel: "debug" | "info" | "warn" | "error";
};

const resolveLogLevel = (raw: string | undefined): MonitoringConfig["logLevel"] => {
  switch (raw?.trim().toLowerCase()) {
    case "debug":
      return "debug";
    case "warn":
      return "warn";
    case "error":
      return "error";
    default:
      return "info";
  }
};

export const createMonitoringConfig = (
  runtimeEnv: RuntimeEnv,
): MonitoringConfig => {
  const environment = resolveEnvironment(runtimeEnv);
  const isProductionLike =
    environment === "production" || environment === "staging";

  const sentryDsn = runtimeEnv.SENTRY_DSN ?? "";
  const enableSentryInDev = parseBooleanFlag(
    runtimeEnv.ENABLE_SENTRY_IN_DEV,
    false,
  );
  const logtailToken = runtimeEnv.BETTER_STACK_TOKEN ?? "";
  const logtailEnabled =
    Boolean(logtailToken) &&
    (isProductionLike ||
      parseBooleanFlag(runtimeEnv.ENABLE_BETTER_STACK_IN_DEV, false));

  return {
    environment,
    release: runtimeEnv.npm_package_version,
    sentry: {
      dsn: sentryDsn,
      enabled: Boolean(sentryDsn) && (isProductionLike || enableSentryInDev),
      enableInDevelopment: enableSentryInDev,
      tracesSampleRate:
        parseNumericEnv(runtimeEnv.SENTRY_TRACES_SAMPLE_RATE, {
          min: 0,
          max: 1,
        }) ?? 0.1,
      beforeSend: sanitizeSentryEvent,
    },
    logtail: {
      token: logtailToken,
      enabled: logtailEnabled,
      consoleOnly: !logtailEnabled,
    },
    logLevel: resolveLogLevel(runtimeEnv.WORKTALLY_LOG_LEVEL),
  };
};

export const monitoringConfig: MonitoringConfig = createMonitoringConfig(
  process.env,
);
