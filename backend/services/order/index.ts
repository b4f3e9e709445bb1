// backend/services/order/index.ts
import { start } from "./src/start";
import { DEFAULT_SERVICE_NAME } from "./src/config";
import { logger } from "../shared/utils/logger";

const SERVICE_NAME = process.env.SERVICE_NAME?.trim() || DEFAULT_SERVICE_NAME;

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, `[${SERVICE_NAME}] Uncaught Exception`);
});

start().catch((err: unknown) => {
  logger.error({ err }, `failed to start ${SERVICE_NAME} service`);
  process.exit(1);
});
