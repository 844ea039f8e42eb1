/**
 * Tests for config.ts and logger.ts.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "../src/config.js";
import { createLogger, silentLogger } from "../src/logger.js";

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      EXCHANGE_RATE_PRECISION: 18,
      SHARE_DECIMALS: 18,
    });
  });

  it("coerces numeric settings", () => {
    const config = loadConfig({ EXCHANGE_RATE_PRECISION: "6", SHARE_DECIMALS: "8", NODE_ENV: "test" });
    expect(config.EXCHANGE_RATE_PRECISION).toBe(6);
    expect(config.SHARE_DECIMALS).toBe(8);
    expect(config.NODE_ENV).toBe("test");
  });

  it("ignores unrelated variables", () => {
    expect(loadConfig({ HOME: "/home/test" })).not.toHaveProperty("HOME");
  });

  it.each([
    ["LOG_LEVEL", "loud"],
    ["NODE_ENV", "staging"],
    ["EXCHANGE_RATE_PRECISION", "37"],
    ["EXCHANGE_RATE_PRECISION", "0"],
    ["SHARE_DECIMALS", "256"],
    ["SHARE_DECIMALS", "1.5"],
  ])("rejects %s=%s", (key, value) => {
    expect(() => loadConfig({ [key]: value })).toThrow(ZodError);
  });
});

// =============================================================================
// Logger
// =============================================================================

describe("createLogger", () => {
  it("uses the configured level", () => {
    expect(createLogger({ LOG_LEVEL: "debug", NODE_ENV: "test" }).level).toBe("debug");
  });

  it("silentLogger logs nothing", () => {
    expect(silentLogger().level).toBe("silent");
  });
});
