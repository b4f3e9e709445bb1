// backend/services/order/src/app.ts
import express, { type Express } from "express";
import type { Logger } from "pino";
import { jsonBody } from "../../shared/middleware/jsonBody";
import { makeHttpLogger } from "../../shared/middleware/httpLogger";
import { entryExit } from "../../shared/middleware/entryExit";
import {
  notFoundProblemJson,
  errorProblemJson,
} from "../../shared/middleware/problemJson";
import { createHealthRouter, type ReadinessCheck } from "../../shared/health";

import { makeOrderRouter } from "./routes/orderRoutes";
import type { OrderService } from "./services/orderService";
import type { DbReadiness } from "./db";

export type AppDeps = {
  service: OrderService;
  serviceName: string;
  readiness?: ReadinessCheck<DbReadiness>;
  /** Base for request logging; defaults to the shared root logger. */
  logger?: Logger;
};

/**
 * Builds the Express app. Collaborators are passed in by the caller
 * (start.ts in production, tests otherwise).
 */
export function createApp(deps: AppDeps): Express {
  const app = express();
  app.disable("x-powered-by");

  // Logging first so parser errors still carry a request id
  app.use(makeHttpLogger(deps.serviceName, deps.logger));
  app.use(entryExit());
  app.use(jsonBody());

  // Health
  app.use(
    createHealthRouter({
      service: deps.serviceName,
      readiness: deps.readiness,
    })
  );

  // Routes
  app.use("/api/orders", makeOrderRouter(deps.service));

  // 404 + error handlers
  app.use(notFoundProblemJson(["/api", "/health"]));
  app.use(errorProblemJson());

  return app;
}
