#!/usr/bin/env node
import { config as dotenvConfig } from "dotenv";
import { logger } from "./logger";
import { errorMessage } from "./errors";
import { runCli } from "./cli";

dotenvConfig();

async function main(): Promise<void> {
  const code = await runCli(process.argv.slice(2));
  process.exit(code);
}

main().catch((e) => {
  logger.fatal({ error: errorMessage(e) }, "Fatal error");
  process.exit(1);
});
