/**
 * Logging
 * Scoped console logger with a minimum level
 *
 * Usage:
 *   const log = createLogger("Analyzer", "debug");
 *   log.info("Detection complete", { findings: 3 });
 *   // Output: [Analyzer] Detection complete { findings: 3 }
 *
 * Callers log counts and entity types only, never detected text.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;

  /**
   * Creates a logger scoped to a sub-module ("Parent:child")
   */
  child(scope: string): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type ConsoleMethod = (...args: unknown[]) => void;

function emit(
  method: ConsoleMethod,
  scope: string,
  message: string,
  data: unknown
): void {
  if (data !== undefined) method(`[${scope}]`, message, data);
  else method(`[${scope}]`, message);
}

/**
 * Creates a console logger for a scope
 */
export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const enabled = (wanted: LogLevel): boolean =>
    LEVEL_RANK[wanted] >= LEVEL_RANK[level];

  return {
    debug(message, data) {
      if (enabled("debug")) emit(console.debug, scope, message, data);
    },
    info(message, data) {
      if (enabled("info")) emit(console.info, scope, message, data);
    },
    warn(message, data) {
      if (enabled("warn")) emit(console.warn, scope, message, data);
    },
    error(message, data) {
      if (enabled("error")) emit(console.error, scope, message, data);
    },
    child(sub) {
      return createLogger(`${scope}:${sub}`, level);
    },
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = createLogger("silent", "silent");
