// backend/services/shared/health.ts
import { Router, type Request, type Response } from "express";

/** Readiness check: resolve with the details to report, throw when not ready. */
export type ReadinessCheck<T extends object> = () => T | Promise<T>;

export type HealthRouterOptions<T extends object> = {
  service: string;
  env?: string;
  readiness?: ReadinessCheck<T>;
};

const LIVE_PATHS = ["/health", "/health/live", "/healthz", "/live"];
const READY_PATHS = ["/health/ready", "/readyz", "/ready"];

function instanceOf(req: Request): string | undefined {
  return typeof req.id === "string" ? req.id : undefined;
}

/**
 * Liveness answers 200 while the process serves requests. Readiness merges
 * the check's details into the body, or answers 503 with its error.
 */
export function createHealthRouter<T extends object>(
  opts: HealthRouterOptions<T>
): Router {
  const router = Router();
  const base = { service: opts.service, env: opts.env ?? process.env.NODE_ENV };

  const live = (req: Request, res: Response) => {
    res.json({ ...base, ok: true, instance: instanceOf(req) });
  };

  const ready = async (req: Request, res: Response) => {
    try {
      const details = opts.readiness ? await opts.readiness() : undefined;
      res.json({ ...base, ok: true, instance: instanceOf(req), ...details });
    } catch (err) {
      res.status(503).json({
        ...base,
        ok: false,
        instance: instanceOf(req),
        error: err instanceof Error ? err.message : String(err),
      });
    }
  };

  for (const p of LIVE_PATHS) router.get(p, live);
  for (const p of READY_PATHS) router.get(p, ready);

  return router;
}
