/**
 * Logging
 *
 * Structured console logging for the generator. One JSON object per line,
 * tagged with the stage that wrote it.
 */

import type { Logger, LogLevel } from "@ormgen/contracts";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Creates a simple structured logger.
 * Prefixes all messages with a context identifier and drops entries
 * below `level`.
 */
export function createLogger(
  context: string,
  level: LogLevel = "info"
): Logger {
  const enabled = (entryLevel: LogLevel) =>
    LEVEL_RANK[entryLevel] >= LEVEL_RANK[level];

  return {
    info(message, data) {
      if (!enabled("info")) return;
      console.log(
        JSON.stringify({ level: "info", context, message, ...data })
      );
    },
    warn(message, data) {
      if (!enabled("warn")) return;
      console.warn(
        JSON.stringify({ level: "warn", context, message, ...data })
      );
    },
    error(message, data) {
      if (!enabled("error")) return;
      console.error(
        JSON.stringify({ level: "error", context, message, ...data })
      );
    },
    debug(message, data) {
      if (!enabled("debug")) return;
      console.debug(
        JSON.stringify({ level: "debug", context, message, ...data })
      );
    },
  };
}
