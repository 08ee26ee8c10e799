import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createLogger, logger, resolveLogLevel } from "./logging.js";

let savedLevel: string | undefined;

beforeEach(() => {
  savedLevel = process.env.LOG_LEVEL;
  delete process.env.LOG_LEVEL;
});

afterEach(() => {
  if (savedLevel === undefined) {
    delete process.env.LOG_LEVEL;
  } else {
    process.env.LOG_LEVEL = savedLevel;
  }
});

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

describe("createLogger", () => {
  it("creates logger with the given name", () => {
    const log = createLogger("session");
    expect(log.settings.name).toBe("session");
  });

  it("uses default minLevel of 3 (info)", () => {
    const log = createLogger("default-level");
    expect(log.settings.minLevel).toBe(3);
  });

  it("maps explicit minLevel", () => {
    expect(createLogger("a", "debug").settings.minLevel).toBe(2);
    expect(createLogger("b", "error").settings.minLevel).toBe(5);
    expect(createLogger("c", "silly").settings.minLevel).toBe(0);
  });

  it("reads LOG_LEVEL from the environment", () => {
    process.env.LOG_LEVEL = "warn";
    expect(createLogger("env-level").settings.minLevel).toBe(4);
  });
});

// ---------------------------------------------------------------------------
// resolveLogLevel
// ---------------------------------------------------------------------------

describe("resolveLogLevel", () => {
  it("is case-insensitive", () => {
    expect(resolveLogLevel("DEBUG")).toBe(2);
    expect(resolveLogLevel(" Fatal ")).toBe(6);
  });

  it("falls back to info for unknown or missing levels", () => {
    expect(resolveLogLevel("verbose")).toBe(3);
    expect(resolveLogLevel(undefined)).toBe(3);
    expect(resolveLogLevel("")).toBe(3);
  });
});

// ---------------------------------------------------------------------------
// logger (singleton)
// ---------------------------------------------------------------------------

describe("logger", () => {
  it("is named toolloop", () => {
    expect(logger.settings.name).toBe("toolloop");
  });
});
