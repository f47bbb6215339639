/**
 * Centralized Configuration Module
 *
 * Type-safe, validated access to the environment variables that pick the
 * default conversion strategies and the log level.
 *
 * Parsed lazily on first access and cached; tests reset the cache with
 * `_resetConfigCache()` after stubbing the environment.
 */

import { z } from "zod";
import { ConfigurationError } from "../utils/errors.js";
import {
  NuclearityStrategy,
  RankingStrategy,
  DEFAULT_MULTINUCLEAR_LABELS,
} from "../dep2con/strategies.js";

/**
 * Comma-separated list, empty entries dropped
 */
const commaList = z
  .union([z.string(), z.undefined()])
  .transform((val): string[] | undefined => {
    if (val === undefined || val.trim() === "") return undefined;
    return val
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  });

/**
 * Environment enum
 */
const Environment = z.enum(["development", "test", "production"]);

/**
 * Log Level enum (pino levels)
 */
const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  runtime: z.object({
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
  }),

  conversion: z.object({
    rankingStrategy: RankingStrategy.default("id"),
    nuclearityStrategy: NuclearityStrategy.default("unamb_else_most_frequent"),
    multinuclearLabels: commaList.transform((labels) => labels ?? [...DEFAULT_MULTINUCLEAR_LABELS]),
  }),

  testing: z.object({
    isVitest: z.boolean().default(false),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    runtime: {
      nodeEnv: env.NODE_ENV || undefined,
      logLevel: env.LOG_LEVEL || undefined,
    },
    conversion: {
      rankingStrategy: env.DEP2CON_RANKING_STRATEGY || undefined,
      nuclearityStrategy: env.DEP2CON_NUCLEARITY_STRATEGY || undefined,
      multinuclearLabels: env.DEP2CON_MULTINUCLEAR_LABELS,
    },
    testing: {
      isVitest: Boolean(env.VITEST),
    },
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid configuration. Please check environment variables.",
      "INVALID_CONFIG",
      { issues: parsed.error.issues }
    );
  }
  return parsed.data;
}

let _cachedConfig: Config | null = null;

function loadConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

/**
 * Lazy-initialized configuration
 *
 * ```
 * import { config } from './config/index.js';
 * const strategy = config.conversion.rankingStrategy;
 * ```
 */
export const config = new Proxy({} as Config, {
  get(_target, prop) {
    return Reflect.get(loadConfig(), prop);
  },

  ownKeys(_target) {
    return Reflect.ownKeys(loadConfig());
  },

  getOwnPropertyDescriptor(_target, prop) {
    return Reflect.getOwnPropertyDescriptor(loadConfig(), prop);
  },

  has(_target, prop) {
    return prop in loadConfig();
  },
});

/**
 * Get configuration (for compatibility and testing)
 */
export function getConfig(): Config {
  return config;
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}

export function isTest(): boolean {
  return config.runtime.nodeEnv === "test" || config.testing.isVitest;
}
