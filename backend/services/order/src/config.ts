// backend/services/order/src/config.ts
/**
 * - No dotenv loading here (bootstrap.ts loads env).
 * - Required vars have no defaults; fail fast if missing/invalid.
 */
import {
  optionalEnv,
  requireEnv,
  requireNumber,
} from "../../shared/config/env";
import type { LevelWithSilent } from "pino";
import { resolveLogLevel } from "../../shared/utils/logger";

export const DEFAULT_SERVICE_NAME = "order";

export type OrderServiceConfig = {
  env: string;
  serviceName: string;
  port: number;
  mongoUri: string;
  logLevel: LevelWithSilent;
};

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): OrderServiceConfig {
  return {
    env: optionalEnv("NODE_ENV", "development", env),
    serviceName: optionalEnv("SERVICE_NAME", DEFAULT_SERVICE_NAME, env),
    port: requireNumber("ORDER_PORT", env),
    mongoUri: requireEnv("ORDER_MONGO_URI", env),
    logLevel: resolveLogLevel(env.LOG_LEVEL),
  };
}
