// backend/services/shared/middleware/httpLogger.ts

/**
 * Per-request structured logging (pino-http).
 *
 * Notes:
 * - Reuses an inbound correlation header when present; mints a UUID otherwise.
 *   The id is echoed back as `x-request-id`.
 * - Severity: 5xx/error=error, everything else=info. A 4xx is caller input,
 *   not a service failure.
 * - Health checks are not logged.
 */

import pinoHttp from "pino-http";
import { randomUUID } from "crypto";
import type { IncomingMessage, ServerResponse } from "http";
import type { LevelWithSilent, Logger } from "pino";
import { logger as rootLogger } from "../utils/logger";

const QUIET_URLS = new Set([
  "/health",
  "/health/live",
  "/health/ready",
  "/healthz",
  "/readyz",
  "/live",
  "/ready",
  "/favicon.ico",
]);

export function pickRequestId(req: IncomingMessage): string | undefined {
  const hdr =
    req.headers["x-request-id"] ||
    req.headers["x-correlation-id"] ||
    req.headers["x-amzn-trace-id"];
  const id = Array.isArray(hdr) ? hdr[0] : hdr;
  return id && id.trim() ? id.trim() : undefined;
}

export function levelForStatus(status: number, err?: Error): LevelWithSilent {
  if (err) return "error";
  if (status >= 500) return "error";
  return "info";
}

export function makeHttpLogger(
  serviceName: string,
  base: Logger = rootLogger
) {
  const logger = base.child({ service: serviceName });

  return pinoHttp({
    logger,

    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      const id = pickRequestId(req) ?? randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => levelForStatus(res.statusCode, err),

    customProps: (req: IncomingMessage) => ({
      service: serviceName,
      reqId: req.id,
    }),

    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_URLS.has(req.url ?? ""),
    },

    serializers: {
      req(req: { id?: unknown; method?: string; url?: string }) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: { statusCode?: number }) {
        return { statusCode: res.statusCode };
      },
      err(err: Error) {
        return { type: err.name, msg: err.message };
      },
    },
  });
}
