/**
 * Logging.
 */

import { pino } from "pino";
import type { Logger } from "pino";
import type { VaultConfig } from "./config.js";

/**
 * Build the process logger. Development output goes through pino-pretty.
 */
export function createLogger(config: Pick<VaultConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

/** Default for components constructed without a logger. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
