/**
 * Structured logging for collection operations
 */

import { levelAtLeast, resolveConfig } from "../config.js";
import type { CollectionsConfig, LogLevel } from "../types.js";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  collection?: string;
  message?: string;
  details?: Record<string, unknown>;
}

class Logger {
  #enabled: boolean;
  #minLevel: LogLevel;
  #debug: boolean;

  constructor(config: CollectionsConfig) {
    this.#enabled = config.logEnabled;
    this.#minLevel = config.logLevel;
    this.#debug = config.debug;
  }

  /**
   * Whether an entry at `level` would be emitted
   */
  isLevelEnabled(level: LogLevel): boolean {
    if (!this.#enabled) return false;
    if (level === "debug") return this.#debug || this.#minLevel === "debug";
    return levelAtLeast(level, this.#minLevel);
  }

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    const parts = [`[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`];

    if (entry.collection) {
      parts.push(entry.collection);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(
        JSON.stringify(entry.details, (_key, value: unknown) =>
          typeof value === "bigint" ? value.toString() : value
        )
      );
    }

    switch (level) {
      case "debug":
        console.debug(parts.join(" "));
        break;
      case "info":
        console.log(parts.join(" "));
        break;
      case "warn":
        console.warn(parts.join(" "));
        break;
      case "error":
        console.error(parts.join(" "));
        break;
    }
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  /**
   * Set the minimum level that is emitted
   */
  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  /**
   * Replace the whole configuration (e.g. after re-reading the environment)
   */
  configure(config: CollectionsConfig): void {
    this.#enabled = config.logEnabled;
    this.#minLevel = config.logLevel;
    this.#debug = config.debug;
  }
}

export type { Logger };

/**
 * Global logger instance, configured from the environment at load time
 */
export const logger = new Logger(resolveConfig());
