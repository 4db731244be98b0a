/**
 * Environment and configuration resolution
 */

import type { CollectionsConfig, LogLevel } from "./types.js";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Defaults applied when the environment sets nothing (or nothing valid)
 */
export const DEFAULT_CONFIG: CollectionsConfig = {
  logEnabled: true,
  logLevel: "info",
  debug: false,
};

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Resolve library configuration from environment variables
 *
 * - CONTIGUOUS_LOG=off disables logging entirely
 * - CONTIGUOUS_LOG_LEVEL sets the minimum level (debug|info|warn|error)
 * - CONTIGUOUS_DEBUG=1 enables debug entries
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): CollectionsConfig {
  const level = env.CONTIGUOUS_LOG_LEVEL?.trim().toLowerCase();

  return {
    logEnabled: env.CONTIGUOUS_LOG?.trim().toLowerCase() !== "off",
    logLevel: level !== undefined && isLogLevel(level) ? level : DEFAULT_CONFIG.logLevel,
    debug: env.CONTIGUOUS_DEBUG === "1" || env.CONTIGUOUS_DEBUG === "true",
  };
}

/**
 * Whether `level` passes the `minLevel` threshold
 */
export function levelAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel);
}
