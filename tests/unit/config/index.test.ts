/**
 * Unit tests for config loading.
 */

import { loadConfig } from "../../../src/config";

describe("loadConfig", () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it("stops on error unless disabled", () => {
    delete process.env.SSML_STOP_ON_ERROR;
    expect(loadConfig().compose.stopOnError).toBe(true);
    process.env.SSML_STOP_ON_ERROR = "false";
    expect(loadConfig().compose.stopOnError).toBe(false);
    process.env.SSML_STOP_ON_ERROR = "1";
    expect(loadConfig().compose.stopOnError).toBe(true);
  });

  it("reads the default script path", () => {
    process.env.SSML_SCRIPT_PATH = " scripts/intro.json ";
    expect(loadConfig().compose.scriptPath).toBe("scripts/intro.json");
    process.env.SSML_SCRIPT_PATH = "";
    expect(loadConfig().compose.scriptPath).toBeUndefined();
  });

  it("falls back to info for unknown log levels", () => {
    process.env.LOG_LEVEL = "DEBUG";
    expect(loadConfig().logging.level).toBe("debug");
    process.env.LOG_LEVEL = "verbose";
    expect(loadConfig().logging.level).toBe("info");
  });

  it("honours LOG_PRETTY over NODE_ENV", () => {
    process.env.LOG_PRETTY = "true";
    expect(loadConfig().logging.pretty).toBe(true);
    delete process.env.LOG_PRETTY;
    process.env.NODE_ENV = "test";
    expect(loadConfig().logging.pretty).toBe(false);
  });
});
