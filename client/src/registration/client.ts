/**
 * RegistrationClient — publishes a name and its public key to a key service
 * running on the local host.
 *
 * One request, one policy:
 *   2xx            → accepted, body ignored
 *   other status   → rejected, with a diagnostic read from the body
 *   no exchange    → TransportError (refused, unresolved host, timeout)
 */

import {
  HEALTH_PATH,
  PortSchema,
  REGISTER_PATH,
  accepted,
  isTransportError,
  rejected,
  toRegisterRequestWire,
  type RegistrationOutcome,
} from "@keyreg/core";

import { defaultRegistrationClientConfig, type RegistrationClientConfig } from "../config.js";
import { exchange, type ExchangeOptions } from "../transport/http-exchange.js";
import { resolveLogger, type Logger, type LoggerFactory } from "../types/logger.js";
import { readDiagnostic } from "./diagnostic.js";

const SERVICE_NAME = "keyreg-client";

export interface RegistrationClientOptions {
  config?: RegistrationClientConfig;
  /** Logger factory */
  loggerFactory?: LoggerFactory;
}

export class RegistrationClient {
  private readonly host: string;
  private readonly exchangeOptions: ExchangeOptions;
  private readonly log: Logger;

  constructor(options: RegistrationClientOptions = {}) {
    const config = options.config ?? {};
    this.host = config.host ?? defaultRegistrationClientConfig.host;
    this.exchangeOptions = {
      timeoutMs: config.requestTimeoutMs ?? defaultRegistrationClientConfig.requestTimeoutMs,
      fetchImpl: config.fetchImpl,
    };
    this.log = resolveLogger(options.loggerFactory, SERVICE_NAME);
  }

  /**
   * Register `user` with `key` on the key service at `port`.
   *
   * Resolves with the outcome for any HTTP status; rejects with
   * TransportError only when no response could be obtained in time.
   */
  async register(port: number, user: string, key: string): Promise<RegistrationOutcome> {
    const url = this.buildUrl("register", port, REGISTER_PATH);
    const init: RequestInit = {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(toRegisterRequestWire(user, key)),
    };

    this.log.debug?.({ url, name: user }, `${SERVICE_NAME}:register - Sending registration`);

    let outcome: RegistrationOutcome;
    try {
      outcome = await exchange(
        url,
        init,
        async (response) => {
          if (response.ok) {
            await discardBody(response);
            return accepted();
          }
          return rejected(response.status, await readDiagnostic(response));
        },
        this.exchangeOptions
      );
    } catch (err) {
      if (isTransportError(err)) {
        this.log.error?.({ url, code: err.code }, `${SERVICE_NAME}:register - ${err.message}`);
      }
      throw err;
    }

    if (outcome.ok) {
      this.log.info?.({ name: user, port }, `${SERVICE_NAME}:register - Registered`);
    } else {
      this.log.warn?.(
        { name: user, port, status: outcome.status, diagnostic: outcome.diagnostic.kind },
        `${SERVICE_NAME}:register - Key service rejected registration`
      );
    }
    return outcome;
  }

  /**
   * Probe the key service root. True for a 2xx answer, false for any other
   * status; TransportError when the service cannot be reached.
   */
  async checkHealth(port: number): Promise<boolean> {
    const url = this.buildUrl("checkHealth", port, HEALTH_PATH);
    const healthy = await exchange(
      url,
      { method: "GET" },
      async (response) => {
        await discardBody(response);
        return response.ok;
      },
      this.exchangeOptions
    );
    this.log.debug?.({ url, healthy }, `${SERVICE_NAME}:checkHealth - Probed key service`);
    return healthy;
  }

  private buildUrl(method: string, port: number, path: string): string {
    if (!PortSchema.safeParse(port).success) {
      throw new Error(`${SERVICE_NAME}:${method} - Invalid port ${port}: expected an integer from 1 to 65535`);
    }
    return `http://${this.host}:${port}${path}`;
  }
}

/** Release the connection without reading what the service sent. */
async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel();
}
