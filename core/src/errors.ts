/**
 * Transport error for key service requests.
 *
 * Raised when the HTTP exchange itself does not complete. A response with a
 * non-2xx status is not a TransportError; it becomes a failed
 * RegistrationOutcome instead.
 */

export type TransportErrorCode = "CONNECTION_FAILED" | "TIMEOUT";

export class TransportError extends Error {
  public readonly code: TransportErrorCode;
  public readonly url: string;
  public readonly timeoutMs?: number;
  public readonly cause?: unknown;

  constructor(args: {
    code: TransportErrorCode;
    message: string;
    url: string;
    timeoutMs?: number;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "TransportError";
    this.code = args.code;
    this.url = args.url;
    this.timeoutMs = args.timeoutMs;
    this.cause = args.cause;
  }
}

export function isTransportError(err: unknown): err is TransportError {
  return err instanceof TransportError;
}
