/**
 * Registration outcome and failure diagnostics.
 */

import { ApiErrorBodySchema } from "./wire-schema.js";
import type { JsonValue } from "./wire.js";

export type StructuredDiagnostic = { kind: "structured"; value: JsonValue };
export type TextDiagnostic = { kind: "text"; text: string };

/** Payload pulled from a rejected response, decoded JSON first, raw text otherwise. */
export type Diagnostic = StructuredDiagnostic | TextDiagnostic;

export type RegistrationAccepted = { ok: true };

export type RegistrationRejected = {
  ok: false;
  status: number;
  diagnostic: Diagnostic;
};

export type RegistrationOutcome = RegistrationAccepted | RegistrationRejected;

export function accepted(): RegistrationAccepted {
  return { ok: true };
}

export function rejected(status: number, diagnostic: Diagnostic): RegistrationRejected {
  return { ok: false, status, diagnostic };
}

export function structuredDiagnostic(value: JsonValue): StructuredDiagnostic {
  return { kind: "structured", value };
}

export function textDiagnostic(text: string): TextDiagnostic {
  return { kind: "text", text };
}

export const UNPRINTABLE_DIAGNOSTIC = "<structured response body too deeply nested to print>";

/**
 * Renders a diagnostic as a single line for people to read.
 * The key service's own error body prints as "message: detail".
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  if (diagnostic.kind === "text") {
    return diagnostic.text.length > 0 ? diagnostic.text : "<empty response body>";
  }
  const apiError = ApiErrorBodySchema.safeParse(diagnostic.value);
  if (apiError.success) {
    const { message, detail } = apiError.data;
    return detail ? `${message}: ${detail}` : message;
  }
  try {
    return JSON.stringify(diagnostic.value);
  } catch (err) {
    // stringify recurses; a body nested past the stack limit still gets a line
    if (err instanceof RangeError) return UNPRINTABLE_DIAGNOSTIC;
    throw err;
  }
}
