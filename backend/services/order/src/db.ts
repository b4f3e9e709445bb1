// backend/services/order/src/db.ts
import mongoose from "mongoose";
import { logger } from "../../shared/utils/logger";

export function redactMongoUri(uri: string): string {
  try {
    const u = new URL(uri);
    if (u.password) u.password = "***";
    if (u.username) u.username = "***";
    return u.toString();
  } catch {
    return uri.replace(/\/\/([^@]+)@/, "//***:***@");
  }
}

export async function connectDb(uri: string): Promise<void> {
  if (mongoose.connection.readyState === 1) return;

  // Disable buffering so errors surface immediately
  mongoose.set("bufferCommands", false);
  mongoose.set("strictQuery", true);

  logger.info({ uri: redactMongoUri(uri) }, "[order] connecting to Mongo");

  await mongoose.connect(uri).catch((err: unknown) => {
    logger.error({ err }, "[order] mongoose.connect failed");
    throw err;
  });

  if (mongoose.connection.readyState !== 1) {
    await mongoose.connection.asPromise();
  }
  logger.info("[order] Mongo connected");
}

export async function disconnectDb(): Promise<void> {
  if (mongoose.connection.readyState !== 0) {
    await mongoose.disconnect();
    logger.info("[order] Mongo disconnected");
  }
}

export type DbReadiness = { db: { ok: boolean } };

/** Readiness check for the health router; throws when not connected. */
export function dbReadiness(): DbReadiness {
  if (mongoose.connection.readyState !== 1) {
    throw new Error("database not connected");
  }
  return { db: { ok: true } };
}
