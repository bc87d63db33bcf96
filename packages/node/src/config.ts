/**
 * @ledgerpair/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { MoneyError, parseTolerance } from "@ledgerpair/money";
import type { ReconcilerConfig } from "@ledgerpair/reconciler";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("production"),

    // Reconciliation defaults
    RECON_CURRENCY: z.string().min(1).default("USD"),
    RECON_DECIMALS: z.coerce.number().int().min(0).max(18).default(2),
    /** Decimal string; one minor unit when unset */
    RECON_TOLERANCE: z.string().optional(),

    // Request limits
    MAX_BODY_BYTES: z.coerce.number().int().min(1).default(10 * 1024 * 1024),
  })
  .superRefine((config, ctx) => {
    if (config.RECON_TOLERANCE === undefined) return;
    try {
      parseTolerance(config.RECON_TOLERANCE, config.RECON_DECIMALS);
    } catch (err: unknown) {
      if (!(err instanceof MoneyError)) throw err;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["RECON_TOLERANCE"],
        message: err.message,
      });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * Reconciler settings carried by the app configuration.
 */
export function toReconcilerConfig(config: AppConfig): ReconcilerConfig {
  return {
    currency: config.RECON_CURRENCY,
    decimals: config.RECON_DECIMALS,
    ...(config.RECON_TOLERANCE !== undefined
      ? { tolerance: config.RECON_TOLERANCE }
      : {}),
  };
}
