/**
 * Minimal JSON-lines logger for the command-line entry. Matches the Logger
 * interface (service + prefix, structured context + message).
 */

import type { Logger, NamedLoggerFactory } from "./types/logger.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case "debug":
      return "debug";
    case "warn":
      return "warn";
    case "error":
      return "error";
    default:
      return "info";
  }
}

function log(level: LogLevel, ctx: object, msg: string): void {
  const line = JSON.stringify({ level, ...ctx, msg });
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Create a node-style logger factory. Returns an object with get(prefix)
 * that returns a logger writing entries at or above `level`.
 */
export function createNodeJSLogger(
  serviceName: string,
  options: { level?: LogLevel } = {}
): NamedLoggerFactory {
  const threshold = LEVEL_ORDER[options.level ?? "info"];

  const method = (level: LogLevel, prefix: string) =>
    LEVEL_ORDER[level] >= threshold
      ? (ctx: object, msg: string) => log(level, { ...ctx, service: serviceName, prefix }, msg)
      : undefined;

  return {
    get(prefix: string): Logger {
      return {
        debug: method("debug", prefix),
        info: method("info", prefix),
        warn: method("warn", prefix),
        error: method("error", prefix),
      };
    },
  };
}
