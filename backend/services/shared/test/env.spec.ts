// backend/services/shared/test/env.spec.ts
import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  loadEnvFromFileOrThrow,
  requireEnv,
  requireNumber,
  optionalEnv,
} from "../config/env";

describe("loadEnvFromFileOrThrow", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const d of dirs.splice(0)) fs.rmSync(d, { recursive: true, force: true });
    delete process.env.ORDER_ENV_SPEC_VALUE;
  });

  it("loads variables from the given file", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "order-env-"));
    dirs.push(dir);
    const file = path.join(dir, ".env.test");
    fs.writeFileSync(file, "ORDER_ENV_SPEC_VALUE=hello\n");

    loadEnvFromFileOrThrow(file);
    expect(process.env.ORDER_ENV_SPEC_VALUE).toBe("hello");
  });

  it("throws when the file does not exist", () => {
    const missing = path.join(os.tmpdir(), "order-env-missing", ".env.nope");
    expect(() => loadEnvFromFileOrThrow(missing)).toThrow(
      `ENV_FILE not found at: ${missing}`
    );
  });

  it("throws when no path is given", () => {
    expect(() => loadEnvFromFileOrThrow(" ")).toThrow(
      "ENV_FILE is required but was not provided."
    );
  });
});

describe("env readers", () => {
  it("requireEnv trims", () => {
    expect(requireEnv("X", { X: "  v  " })).toBe("v");
  });

  it("requireNumber parses finite numbers only", () => {
    expect(requireNumber("P", { P: "0" })).toBe(0);
    expect(() => requireNumber("P", { P: "Infinity" })).toThrow(
      'Invalid number for P: "Infinity"'
    );
  });

  it("optionalEnv falls back on blank", () => {
    expect(optionalEnv("Y", "dflt", {})).toBe("dflt");
    expect(optionalEnv("Y", "dflt", { Y: "" })).toBe("dflt");
    expect(optionalEnv("Y", "dflt", { Y: "set" })).toBe("set");
  });
});
