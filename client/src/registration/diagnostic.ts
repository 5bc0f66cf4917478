/**
 * Diagnostic extraction for rejected registrations.
 */

import {
  structuredDiagnostic,
  textDiagnostic,
  type Diagnostic,
  type JsonValue,
} from "@keyreg/core";

/**
 * Read a rejected response's body once: decoded JSON when it parses,
 * otherwise the raw text.
 */
export async function readDiagnostic(response: Response): Promise<Diagnostic> {
  const text = await response.text();
  const value = decodeJson(text);
  return value === undefined ? textDiagnostic(text) : structuredDiagnostic(value);
}

// JSON.parse only ever yields a JsonValue; the parse itself is the check.
function decodeJson(text: string): JsonValue | undefined {
  try {
    const value: JsonValue = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}
