#!/usr/bin/env node
/**
 * Entry point: load config, compose the script named on the command line (or stdin).
 */

import { loadConfig } from "./config";
import { createLogger, logError } from "./logging";
import { runCompose } from "./cli";

function main(): void {
  const config = loadConfig();
  // stdout carries the document; logs go to stderr.
  const log = createLogger({ ...config.logging, fd: 2 });
  try {
    process.exitCode = runCompose(process.argv.slice(2), config, log, {
      write: (text) => process.stdout.write(text),
    });
  } catch (err) {
    logError(log, err instanceof Error ? err : new Error(String(err)));
    process.exitCode = 1;
  }
}

main();
