/**
 * @capvault/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Vault parameters are fixed for the lifetime of the process.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

/**
 * A positive amount in base units, given as a digit string.
 */
const PositiveAmountSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, "Expected a base-unit digit string")
  .transform((value) => BigInt(value))
  .refine((value) => value > 0n, "Must be greater than zero");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Vault parameters
  VAULT_OWNER: z.string().trim().min(1),
  VAULT_ADDRESS: z.string().trim().min(1).default("vault"),
  BANK_CAP: PositiveAmountSchema,
  PER_TX_WITHDRAW_LIMIT: PositiveAmountSchema,

  // Display of native amounts in logs
  NATIVE_SYMBOL: z.string().min(1).default("ETH"),
  NATIVE_DECIMALS: z.coerce.number().int().min(0).max(36).default(18),

  // Idempotency
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),
});

export type AppConfig = z.output<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
