/**
 * @keyreg/client
 *
 * Registers a name and its public key with a key service on the local host.
 */

// Main client
export { RegistrationClient, type RegistrationClientOptions } from "./registration/client.js";
export { readDiagnostic } from "./registration/diagnostic.js";

// Config
export {
  type RegistrationClientConfig,
  type RegistrationJob,
  defaultRegistrationClientConfig,
  loadConfig,
} from "./config.js";

// Transport
export { exchange, type ExchangeOptions } from "./transport/http-exchange.js";

// Logging
export { type Logger, type LoggerFactory, type NamedLoggerFactory, resolveLogger } from "./types/logger.js";
export { createNodeJSLogger, parseLogLevel, type LogLevel } from "./logger.js";

// Command-line run
export { runRegistration, type RunOptions } from "./run.js";

// Re-export core types for convenience
export type {
  RegistrationOutcome,
  RegistrationAccepted,
  RegistrationRejected,
  Diagnostic,
  StructuredDiagnostic,
  TextDiagnostic,
  JsonValue,
  RegisterRequestWire,
} from "@keyreg/core";
export { TransportError, type TransportErrorCode, formatDiagnostic } from "@keyreg/core";
