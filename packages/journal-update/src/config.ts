/**
 * @tally/journal-update — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { UpdateConfig } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

/**
 * Check that a zone name is known to the runtime's time zone database.
 */
export function isValidTimeZone(zone: string): boolean {
  if (zone.trim() === "") {
    return false;
  }
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Dates
  APP_TIMEZONE: z
    .string()
    .default("UTC")
    .refine(isValidTimeZone, { message: "Unknown time zone" }),
  FORCE_UTC: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true"),
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
 * The part of the configuration the update engine needs.
 */
export function toUpdateConfig(config: AppConfig): UpdateConfig {
  return {
    timezone: config.APP_TIMEZONE,
    forceUtc: config.FORCE_UTC,
  };
}
