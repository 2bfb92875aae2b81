/**
 * Structured logging for the SSML builder and the compose CLI.
 * JSON lines by default; pino-pretty when pretty is on.
 *
 * Env:
 *   LOG_LEVEL   - debug | info | warn | error (default: info)
 *   LOG_PRETTY  - true | 1 to force pretty output (default: on outside production and test)
 *   LOG_FILE    - If set, also append all logs to this path (creates dirs if needed).
 */

import pino from "pino";
import type { SsmlError } from "../ssml/errors";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
  file?: string;
  /** File descriptor for the primary stream (1 = stdout, 2 = stderr). */
  fd?: 1 | 2;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const v = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === v);
}

export function defaultPretty(): boolean {
  const flag = process.env.LOG_PRETTY?.trim();
  if (flag) return flag === "true" || flag === "1";
  const env = process.env.NODE_ENV;
  return env !== "production" && env !== "test";
}

/** Primary stream (stdout/stderr, pretty or JSON) plus the optional file destination. */
export function buildStreams(config: LoggerConfig = {}): pino.StreamEntry[] {
  const fd = config.fd ?? 1;
  const pretty = config.pretty ?? defaultPretty();
  const logFile = config.file ?? process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true, destination: fd } }),
    });
  } else {
    streams.push({ stream: pino.destination({ dest: fd, sync: true }) });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true, sync: true }),
    });
  }
  return streams;
}

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? parseLogLevel(process.env.LOG_LEVEL) ?? "info",
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const streams = buildStreams(config);
  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

/** Log a fragment the builder refused to append. */
export function logFragmentRejected(log: pino.Logger, element: string, error: SsmlError): void {
  log.debug(
    { event: "SSML_FRAGMENT_REJECTED", element, code: error.code, parameter: error.parameter },
    error.message
  );
}

/** Log a finished compose run (counts only; fragment text may be sensitive). */
export function logComposed(log: pino.Logger, applied: number, failed: number, ssmlLength: number): void {
  log.info({ event: "SSML_COMPOSED", applied, failed, ssmlLength }, "Script composed");
}

/** Log error. */
export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, stack: err.stack, ...context }, "Error");
}
