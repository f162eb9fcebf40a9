/**
 * Structured logging.
 *
 * Uses pino for JSON-structured logs, pretty-printed in development.
 * The service derives a child logger per update bound to the journal id.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { AppConfig } from "./config.js";

export type { Logger } from "pino";

/**
 * Root logger for the configured level and environment.
 */
export function createLogger(config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

/** A logger that writes nothing. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
