/**
 * One registration run for the command-line entry: load config, register,
 * print the diagnostic of a rejection and carry on.
 */

import { formatDiagnostic } from "@keyreg/core";
import { loadConfig } from "./config.js";
import { RegistrationClient } from "./registration/client.js";
import { resolveLogger, type LoggerFactory } from "./types/logger.js";

const SERVICE_NAME = "keyreg-register";

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  loggerFactory?: LoggerFactory;
  /** Where the diagnostic of a rejected registration goes. Default: console.log */
  print?: (line: string) => void;
  /** Overrides the fetch the client uses */
  fetchImpl?: typeof fetch;
}

/**
 * Resolves with the process exit code. A rejection is reported, not fatal;
 * transport and configuration errors propagate.
 */
export async function runRegistration(options: RunOptions = {}): Promise<number> {
  const log = resolveLogger(options.loggerFactory, `${SERVICE_NAME}:run`);
  const print = options.print ?? ((line: string) => console.log(line));

  const job = loadConfig({ env: options.env, log });
  const client = new RegistrationClient({
    config: { ...job.client, fetchImpl: options.fetchImpl },
    loggerFactory: options.loggerFactory,
  });

  const outcome = await client.register(job.port, job.user, job.key);
  if (!outcome.ok) {
    print(formatDiagnostic(outcome.diagnostic));
  }
  return 0;
}
