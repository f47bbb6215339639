/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger options.
 */

import type { LoggerOptions } from "pino";

export const LOGGER_NAME = "dep2con";

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string): LoggerOptions {
  return {
    name: LOGGER_NAME,
    level,
  };
}
