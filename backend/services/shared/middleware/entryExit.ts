// backend/services/shared/middleware/entryExit.ts
import type { RequestHandler } from "express";

/**
 * One "request entry" and one "request exit" line per request, written
 * through `req.log` so both carry the pino-http request id. Mount after
 * makeHttpLogger().
 */
export function entryExit(): RequestHandler {
  return (req, res, next) => {
    const startedAt = process.hrtime.bigint();

    req.log.info(
      { event: "handler:start", method: req.method, url: req.originalUrl },
      "request entry"
    );

    res.once("finish", () => {
      const elapsedNs = process.hrtime.bigint() - startedAt;
      req.log.info(
        {
          event: "handler:finish",
          statusCode: res.statusCode,
          durationMs: Math.round(Number(elapsedNs) / 1e6),
        },
        "request exit"
      );
    });

    next();
  };
}
