/**
 * Env-based configuration for the ssml-compose CLI.
 * Load from .env.local (or process.env).
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";
import { defaultPretty, parseLogLevel, type LogLevel } from "../logging";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export interface AppConfig {
  logging: {
    level: LogLevel;
    pretty: boolean;
    /** Extra log destination (appended). */
    file?: string;
  };

  compose: {
    /** Skip the rest of a script after the first rejected fragment. */
    stopOnError: boolean;
    /** Script read when the CLI gets no path argument. Unset = stdin. */
    scriptPath?: string;
  };
}

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

function getEnvFlag(key: string, defaultValue: boolean): boolean {
  const v = getEnv(key)?.toLowerCase();
  if (v === undefined) return defaultValue;
  return v === "true" || v === "1";
}

/**
 * Build config from environment variables.
 * LOG_LEVEL, LOG_PRETTY, LOG_FILE, SSML_STOP_ON_ERROR, SSML_SCRIPT_PATH.
 */
export function loadConfig(): AppConfig {
  return {
    logging: {
      level: parseLogLevel(getEnv("LOG_LEVEL")) ?? "info",
      pretty: defaultPretty(),
      file: getEnv("LOG_FILE"),
    },
    compose: {
      stopOnError: getEnvFlag("SSML_STOP_ON_ERROR", true),
      scriptPath: getEnv("SSML_SCRIPT_PATH"),
    },
  };
}
