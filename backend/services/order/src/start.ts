// backend/services/order/src/start.ts
import { loadEnvFile } from "./bootstrap";
import { loadConfig } from "./config";
import { connectDb, disconnectDb, dbReadiness } from "./db";
import { createApp } from "./app";
import { MongoOrderRepository } from "./repo/orderRepo";
import { OrderService } from "./services/orderService";
import { logger } from "../../shared/utils/logger";
import {
  startHttpService,
  type StartedService,
} from "../../shared/bootstrap/startHttpService";

/**
 * Env → config → Mongo → explicit wiring (repository → service → app) → listen.
 * Every failure, config errors included, surfaces as a rejection.
 */
export async function start(
  env: NodeJS.ProcessEnv = process.env
): Promise<StartedService> {
  loadEnvFile(env);
  const config = loadConfig(env);
  logger.level = config.logLevel;
  const log = logger.child({ service: config.serviceName });

  await connectDb(config.mongoUri);

  const repo = new MongoOrderRepository();
  const service = new OrderService(repo, { logger: log });
  const app = createApp({
    service,
    serviceName: config.serviceName,
    readiness: dbReadiness,
  });

  return startHttpService({
    app,
    port: config.port,
    serviceName: config.serviceName,
    logger: log,
    onShutdown: disconnectDb,
  });
}
