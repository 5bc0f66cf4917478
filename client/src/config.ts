/**
 * Registration client configuration.
 *
 * The client itself takes a RegistrationClientConfig. The command-line entry
 * builds one, together with the port/user/key to register, from the
 * environment (KEYREG_* variables, optionally seeded from .env).
 */

import { readFileSync, existsSync } from "node:fs";
import { z } from "zod";
import type { Logger } from "./types/logger.js";

const LOG_PREFIX = "keyreg-client:config";

export interface RegistrationClientConfig {
  /** Host the key service listens on. Default: "localhost" */
  host?: string;
  /** Bound on the whole request/response exchange. Default: 10000 */
  requestTimeoutMs?: number;
  /** Optional custom fetch implementation (for testing or environments without global fetch) */
  fetchImpl?: typeof fetch;
}

export const defaultRegistrationClientConfig = {
  host: "localhost",
  requestTimeoutMs: 10_000,
} as const;

/**
 * Everything the command-line entry needs for one registration.
 */
export interface RegistrationJob {
  port: number;
  user: string;
  key: string;
  client: RegistrationClientConfig;
}

// setTimeout clamps anything above this to 1ms
const MAX_TIMEOUT_MS = 2_147_483_647;

const EnvSchema = z.object({
  KEYREG_PORT: z.coerce.number().int().min(1).max(65535),
  KEYREG_USER: z.string().min(1).optional(),
  USER: z.string().min(1).optional(),
  KEYREG_KEY: z.string().min(1).optional(),
  KEYREG_KEY_FILE: z.string().min(1).optional(),
  KEYREG_HOST: z.string().min(1).optional(),
  KEYREG_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
});

/**
 * Load a registration job from the environment.
 * Env: KEYREG_PORT, KEYREG_USER (or USER), KEYREG_KEY or KEYREG_KEY_FILE,
 * KEYREG_HOST, KEYREG_TIMEOUT_MS.
 */
export function loadConfig(params: { env?: NodeJS.ProcessEnv; log?: Logger } = {}): RegistrationJob {
  const env = params.env ?? process.env;
  const log = params.log ?? console;

  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`${LOG_PREFIX} - Invalid environment: ${problems}`);
  }
  const vars = parsed.data;

  const user = vars.KEYREG_USER ?? vars.USER;
  if (!user) {
    throw new Error(`${LOG_PREFIX} - KEYREG_USER (or USER) is required`);
  }

  let key = vars.KEYREG_KEY;
  if (key === undefined && vars.KEYREG_KEY_FILE) {
    const keyPath = vars.KEYREG_KEY_FILE;
    if (!existsSync(keyPath)) {
      throw new Error(`${LOG_PREFIX} - Key file not found: ${keyPath}`);
    }
    log.info?.({ keyPath }, `${LOG_PREFIX} - Reading key from file`);
    key = readFileSync(keyPath, "utf-8").trim();
  }
  if (!key) {
    throw new Error(`${LOG_PREFIX} - KEYREG_KEY or KEYREG_KEY_FILE is required`);
  }

  return {
    port: vars.KEYREG_PORT,
    user,
    key,
    client: {
      host: vars.KEYREG_HOST ?? defaultRegistrationClientConfig.host,
      requestTimeoutMs: vars.KEYREG_TIMEOUT_MS ?? defaultRegistrationClientConfig.requestTimeoutMs,
    },
  };
}
