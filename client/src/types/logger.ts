/**
 * Structured logger used across the registration client: a context object
 * plus a message, every level optional.
 */

export interface Logger {
  debug?: (ctx: object, msg: string) => void;
  info?: (ctx: object, msg: string) => void;
  warn?: (ctx: object, msg: string) => void;
  error?: (ctx: object, msg: string) => void;
}

export interface NamedLoggerFactory {
  get(name: string): Logger;
}

/** Type for logger factory: either a Logger or an object with get(name) returning Logger. */
export type LoggerFactory = Logger | NamedLoggerFactory;

function isNamedFactory(factory: LoggerFactory): factory is NamedLoggerFactory {
  return "get" in factory && typeof factory.get === "function";
}

/** Resolve logger from factory (supports loggerFactory or loggerFactory.get(SERVICE_NAME)). */
export function resolveLogger(factory: LoggerFactory | undefined, serviceName: string): Logger {
  if (!factory) return console;
  return isNamedFactory(factory) ? factory.get(serviceName) : factory;
}
