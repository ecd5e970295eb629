import http from "node:http";
import { URL } from "node:url";
import type { IngestConfig } from "../shared/config/tracker";
import { getLogger, toErrorPayload } from "../shared/logger";
import { type StatusView, buildStatusView } from "../shared/status/format";
import type { PresenceSample } from "../shared/types/signals";
import type { TickReport, TimerSnapshot } from "../shared/types/timer";
import {
  isActivityPing,
  isPresenceSampleInput,
} from "../shared/validation/signalPayloads";
import type { ActivityTracker } from "../worker/sources/activity-tracker";
import type { FocusDetector } from "../worker/sources/focus-detector";

const logger = getLogger("signal-ingest", "ingest");

const MAX_BODY_BYTES = 64 * 1024;

export type SignalIngestDependencies = {
  activity: ActivityTracker;
  /** Null when focus tracking is disabled. */
  focus: FocusDetector | null;
  getSnapshot: () => TimerSnapshot;
  getLastReport: () => TickReport | null;
  sessionId: number;
  clock?: () => number;
};

export type IngestRequest = {
  method: string;
  pathname: string;
  body: unknown;
};

export type IngestResponse = {
  status: number;
  body?: unknown;
};

export type StatusPayload = StatusView & {
  sessionId: number;
  lastTick: {
    sequence: number;
    timestamp: number;
    classification: TickReport["signals"]["classification"];
    windowTitle: string | null;
    activity: boolean;
    focused: boolean;
    verdict: boolean;
  } | null;
};

const ROUTES: Record<string, readonly string[]> = {
  "/api/status": ["GET"],
  "/api/health": ["GET"],
  "/api/signals/presence": ["POST"],
  "/api/signals/activity": ["POST"],
};

const buildStatusPayload = (deps: SignalIngestDependencies): StatusPayload => {
  const report = deps.getLastReport();
  return {
    ...buildStatusView(deps.getSnapshot()),
    sessionId: deps.sessionId,
    lastTick: report
      ? {
          sequence: report.sequence,
          timestamp: report.timestamp,
          classification: report.signals.classification,
          windowTitle: report.signals.windowTitle,
          activity: report.signals.activity,
          focused: report.signals.focused,
          verdict: report.verdict,
        }
      : null,
  };
};

/**
 * Pure request router; the HTTP layer only parses bodies and writes the
 * result.
 */
export const routeIngestRequest = (
  request: IngestRequest,
  deps: SignalIngestDependencies,
): IngestResponse => {
  const allowed = ROUTES[request.pathname];
  if (!allowed) {
    return { status: 404, body: { error: "Not found" } };
  }
  if (!allowed.includes(request.method)) {
    return { status: 405, body: { error: "Method not allowed" } };
  }

  const now = (deps.clock ?? Date.now)();

  switch (request.pathname) {
    case "/api/health":
      return { status: 200, body: { ok: true } };
    case "/api/status":
      return { status: 200, body: buildStatusPayload(deps) };
    case "/api/signals/presence": {
      if (!deps.focus) {
        return { status: 409, body: { error: "Focus tracking is disabled" } };
      }
      if (!isPresenceSampleInput(request.body)) {
        return { status: 400, body: { error: "Invalid presence sample" } };
      }
      const sample: PresenceSample = deps.focus.ingest(request.body, now);
      return { status: 202, body: { accepted: true, sample } };
    }
    case "/api/signals/activity": {
      const payload = request.body ?? {};
      if (!isActivityPing(payload)) {
        return { status: 400, body: { error: "Invalid activity ping" } };
      }
      deps.activity.record(payload, now);
      return { status: 202, body: { accepted: true } };
    }
    default:
      return { status: 404, body: { error: "Not found" } };
  }
};

const writeJson = (
  res: http.ServerResponse,
  status: number,
  body?: unknown,
): void => {
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Access-Control-Allow-Origin": "*",
    "Access-Control-Allow-Methods": "GET,POST,OPTIONS",
    "Access-Control-Allow-Headers": "Content-Type",
  });
  res.end(body === undefined ? undefined : JSON.stringify(body));
};

class PayloadError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "PayloadError";
    this.status = status;
  }
}

const readJsonBody = async (req: http.IncomingMessage): Promise<unknown> => {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new PayloadError(413, "Payload too large");
    }
    chunks.push(buffer);
  }

  const text = Buffer.concat(chunks).toString("utf8").trim();
  if (text.length === 0) {
    return undefined;
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new PayloadError(400, "Body is not valid JSON");
  }
};

const handleRequest = async (
  req: http.IncomingMessage,
  res: http.ServerResponse,
  deps: SignalIngestDependencies,
): Promise<void> => {
  if (req.method === "OPTIONS") {
    writeJson(res, 204);
    return;
  }

  let pathname: string;
  try {
    pathname = new URL(req.url ?? "/", "http://localhost").pathname;
  } catch (error) {
    logger.warn("Invalid request URL received", {
      url: req.url,
      error: toErrorPayload(error),
    });
    writeJson(res, 400, { error: "Invalid request URL" });
    return;
  }

  let body: unknown;
  try {
    body = req.method === "POST" ? await readJsonBody(req) : undefined;
  } catch (error) {
    const status = error instanceof PayloadError ? error.status : 400;
    writeJson(res, status, {
      error: error instanceof Error ? error.message : "Bad request",
    });
    return;
  }

  const result = routeIngestRequest(
    { method: req.method ?? "GET", pathname, body },
    deps,
  );
  if (result.status >= 400) {
    logger.debug("Rejected ingest request", {
      method: req.method,
      pathname,
      status: result.status,
    });
  }
  writeJson(res, result.status, result.body);
};

export type SignalIngestServer = {
  origin: string;
  close: () => Promise<void>;
};

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

export const startSignalIngestServer = (
  config: Pick<IngestConfig, "host" | "port">,
  deps: SignalIngestDependencies,
): Promise<SignalIngestServer> => {
  const server = http.createServer((req, res) => {
    handleRequest(req, res, deps).catch((error: unknown) => {
      logger.error("Ingest request failed", toErrorPayload(error));
      if (!res.headersSent) {
        writeJson(res, 500, { error: "Internal error" });
      } else {
        res.end();
      }
    });
  });

  return new Promise((resolve, reject) => {
    const onStartupError = (error: unknown) => {
      if (isErrnoException(error) && error.code === "EADDRINUSE") {
        logger.error("Signal ingest port already in use", {
          host: config.host,
          port: config.port,
        });
      }
      reject(error);
    };

    server.once("error", onStartupError);
    server.listen(config.port, config.host, () => {
      server.off("error", onStartupError);
      server.on("error", (error) => {
        logger.error("Signal ingest server error", toErrorPayload(error));
      });

      const address = server.address();
      const port =
        typeof address === "object" && address !== null ? address.port : config.port;
      const origin = `http://${config.host}:${port}`;
      logger.info("Signal ingest server listening", { origin });

      resolve({
        origin,
        close: () =>
          new Promise<void>((resolveClose, rejectClose) => {
            server.close((error) => {
              if (error) {
                rejectClose(error);
                return;
              }
              logger.info("Signal ingest server stopped");
              resolveClose();
            });
          }),
      });
    });
  });
};
