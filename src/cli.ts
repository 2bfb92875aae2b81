/**
 * ssml-compose: read a JSON script, print the SSML document on stdout.
 * Exit code 0 when every fragment was appended, 1 otherwise.
 */

import type { Logger } from "pino";
import type { AppConfig } from "./config";
import { logError } from "./logging";
import { compose, loadScript } from "./script";

export interface CliIO {
  write(text: string): void;
}

export function runCompose(args: string[], config: AppConfig, log: Logger, io: CliIO): number {
  const scriptPath = args[0] ?? config.compose.scriptPath;
  const script = loadScript(scriptPath);
  const result = compose(script, { stopOnError: config.compose.stopOnError, logger: log });
  for (const failure of result.errors) {
    logError(log, failure.error, { event: "FRAGMENT_FAILED", index: failure.index, code: failure.error.code });
  }
  if (result.errors.length > 0 && config.compose.stopOnError) return 1;
  io.write(`${result.ssml}\n`);
  return result.errors.length > 0 ? 1 : 0;
}
