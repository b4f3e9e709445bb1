// backend/services/order/src/bootstrap.ts
import fs from "fs";
import path from "path";
import { loadEnvFromFileOrThrow } from "../../shared/config/env";

export const DEFAULT_ENV_FILE = ".env.dev";

/**
 * Loads env from `ENV_FILE` (must exist) or, when unset, from `.env.dev`
 * in the working directory if one is there. Values land on `env`; keys it
 * already holds are kept.
 */
export function loadEnvFile(env: NodeJS.ProcessEnv = process.env): void {
  const explicit = env.ENV_FILE?.trim();
  if (explicit) {
    loadEnvFromFileOrThrow(explicit, env);
    return;
  }
  if (fs.existsSync(path.resolve(process.cwd(), DEFAULT_ENV_FILE))) {
    loadEnvFromFileOrThrow(DEFAULT_ENV_FILE, env);
  }
}
