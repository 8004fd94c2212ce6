#!/usr/bin/env node
import { loadDotenv } from "./env";
import { errorMessage } from "./errors";
import { run } from "./cli";
import { logError } from "./helpers/log.helper";

loadDotenv();

run(process.argv.slice(2)).catch((e: unknown) => {
  logError(errorMessage(e));
  process.exit(1);
});
