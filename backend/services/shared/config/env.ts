// backend/services/shared/config/env.ts

import path from "path";
import fs from "fs";
import * as dotenv from "dotenv";
import { expand } from "dotenv-expand";

/**
 * Load a specific env file into `target` (process.env by default).
 * Throws if the file is missing or invalid.
 */
export function loadEnvFromFileOrThrow(
  envFilePath: string,
  target: NodeJS.ProcessEnv = process.env
): void {
  if (!envFilePath || envFilePath.trim() === "") {
    throw new Error("ENV_FILE is required but was not provided.");
  }
  const resolved = path.resolve(process.cwd(), envFilePath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`ENV_FILE not found at: ${resolved}`);
  }

  const loaded: Record<string, string> = {};
  const parsed = dotenv.config({ path: resolved, processEnv: loaded });
  if (parsed.error) {
    throw new Error(
      `Failed to load ENV_FILE: ${resolved} — ${String(parsed.error)}`
    );
  }
  expand({ parsed: parsed.parsed, processEnv: loaded });

  // existing values win, as with dotenv's default
  for (const [key, value] of Object.entries(loaded)) {
    if (target[key] === undefined) target[key] = value;
  }
}

/** Require a non-empty env var; returns trimmed string. */
export function requireEnv(
  name: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  const v = env[name];
  if (!v || !v.trim()) throw new Error(`Missing required env var: ${name}`);
  return v.trim();
}

/** Require an env var that parses to a finite number. */
export function requireNumber(
  name: string,
  env: NodeJS.ProcessEnv = process.env
): number {
  const raw = requireEnv(name, env);
  const n = Number(raw);
  if (!Number.isFinite(n))
    throw new Error(`Invalid number for ${name}: "${raw}"`);
  return n;
}

/** Optional env var with a fallback; blank counts as unset. */
export function optionalEnv(
  name: string,
  fallback: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  const v = env[name];
  return v && v.trim() ? v.trim() : fallback;
}
