// Wire contract
export * from "./wire.js";

// Wire Zod schemas (runtime validation)
export { PortSchema, ApiErrorBodySchema } from "./wire-schema.js";

// Outcome & diagnostics
export * from "./outcome.js";

// Errors
export * from "./errors.js";
