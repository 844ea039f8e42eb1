/**
 * Vault configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Share accounting
  EXCHANGE_RATE_PRECISION: z.coerce.number().int().min(1).max(36).default(18),
  SHARE_DECIMALS: z.coerce.number().int().min(1).max(255).default(18),
});

export type VaultConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is present but invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): VaultConfig {
  return ConfigSchema.parse(env);
}
