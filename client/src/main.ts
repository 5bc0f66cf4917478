/**
 * keyreg-register: registers $KEYREG_USER and its public key with the key
 * service on localhost:$KEYREG_PORT.
 */

import "dotenv/config";
import { createNodeJSLogger, parseLogLevel } from "./logger.js";
import { runRegistration } from "./run.js";

const SERVICE_NAME = "keyreg-register";

async function main(): Promise<void> {
  const loggerFactory = createNodeJSLogger(SERVICE_NAME, { level: parseLogLevel(process.env.LOG_LEVEL) });
  process.exitCode = await runRegistration({ loggerFactory });
}

main().catch((err) => {
  console.error(`${SERVICE_NAME}:main - Fatal:`, err);
  process.exit(1);
});
