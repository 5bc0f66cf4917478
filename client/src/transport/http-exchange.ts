/**
 * Timed HTTP exchange with the key service.
 *
 * A single timer bounds the whole exchange: connecting, waiting for the
 * response and whatever the handler reads from it. Failures to complete the
 * exchange surface as TransportError; anything the handler throws for other
 * reasons passes through unchanged.
 */

import { TransportError } from "@keyreg/core";

const SERVICE_NAME = "keyreg-client:http-exchange";

export interface ExchangeOptions {
  timeoutMs: number;
  /** Optional custom fetch implementation (for testing or environments without global fetch) */
  fetchImpl?: typeof fetch;
}

/**
 * Send one request and hand the response to `handle` while the timer is
 * still running. No retries.
 */
export async function exchange<T>(
  url: string,
  init: RequestInit,
  handle: (response: Response) => Promise<T>,
  options: ExchangeOptions
): Promise<T> {
  const fetchFn = options.fetchImpl ?? globalThis.fetch;
  const method = init.method ?? "GET";
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetchFn(url, { ...init, signal: controller.signal });
    return await handle(response);
  } catch (err) {
    if (controller.signal.aborted) {
      throw new TransportError({
        code: "TIMEOUT",
        message: `${SERVICE_NAME}:exchange - ${method} ${url} timed out after ${options.timeoutMs}ms`,
        url,
        timeoutMs: options.timeoutMs,
        cause: err,
      });
    }
    // fetch reports network failures (refused, DNS, reset) as TypeError
    if (err instanceof TypeError) {
      throw new TransportError({
        code: "CONNECTION_FAILED",
        message: `${SERVICE_NAME}:exchange - ${method} ${url} failed: ${describeNetworkError(err)}`,
        url,
        cause: err,
      });
    }
    throw err;
  } finally {
    clearTimeout(timeoutId);
  }
}

function describeNetworkError(err: TypeError): string {
  const cause = err.cause;
  if (cause instanceof Error) {
    const code = "code" in cause && typeof cause.code === "string" ? cause.code : undefined;
    return code ? `${code} (${cause.message})` : cause.message;
  }
  return err.message;
}
