// backend/services/shared/utils/logger.ts
import pino, { type LevelWithSilent, type Logger } from "pino";

const LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export function resolveLogLevel(raw: string | undefined): LevelWithSilent {
  const v = (raw ?? "").trim().toLowerCase();
  const hit = LEVELS.find((l) => l === v);
  return hit ?? "info";
}

const NODE_ENV = (process.env.NODE_ENV || "development").trim();

// Root logger. Services bind `service` and other context via logger.child().
export const logger: Logger = pino({
  level: resolveLogLevel(process.env.LOG_LEVEL),
  base: { env: NODE_ENV },
  timestamp: pino.stdTimeFunctions.isoTime,
});
