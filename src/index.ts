#!/usr/bin/env node

import { parseCliArgs, resolveRuntimeConfig } from "./config/index.js";
import { APP_NAME } from "./constants.js";
import { errorMessage } from "./errors.js";
import { generateReport } from "./pipeline.js";

async function main(): Promise<void> {
  const cli = parseCliArgs(process.argv.slice(2));
  const config = resolveRuntimeConfig({ cli, env: process.env });
  await generateReport(config);
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(`[${APP_NAME}] ${errorMessage(error)}`);
  process.exit(1);
});
