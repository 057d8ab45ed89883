/**
 * This module provides the leveled {@linkcode Logger} used by temporary
 * handles to report what they do, and most importantly, to report failures
 * of best-effort deletion that cannot be thrown to any caller.
 *
 * Handles are silent unless a logger is passed to them.
 *
 * ```ts
 * import { consoleLogger } from "@ephemera/fs/log";
 * import { tempFile } from "@ephemera/fs/temp";
 * using file = await tempFile({ logger: consoleLogger("warn") });
 * ```
 *
 * @module log
 */

/** Log level, from most to least verbose. */
export type LogLevel = "debug" | "info" | "warn" | "error";

/** A leveled logger. */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** A logger that drops every message. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Returns a logger that writes messages at or above the given level to the
 * global `console`.
 *
 * @param level The least severe level to write.
 */
export function consoleLogger(level: LogLevel = "info"): Logger {
  const enabled = (at: LogLevel) => LEVELS[at] >= LEVELS[level];
  return {
    debug: (message, ...args) => {
      if (enabled("debug")) console.debug(message, ...args);
    },
    info: (message, ...args) => {
      if (enabled("info")) console.info(message, ...args);
    },
    warn: (message, ...args) => {
      if (enabled("warn")) console.warn(message, ...args);
    },
    error: (message, ...args) => {
      if (enabled("error")) console.error(message, ...args);
    },
  };
}
