#!/usr/bin/env node
import { runCli } from "./cli/program.js";
import { logger } from "./logger.js";

runCli(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error("Unexpected failure", { error: err instanceof Error ? err.stack : String(err) });
    process.exitCode = 2;
  });
