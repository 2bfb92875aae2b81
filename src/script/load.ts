/**
 * Read and validate a script from a file or stdin.
 */

import * as fs from "fs";
import { parseScript, type Script } from "./schema";

/** Parse script JSON text. Throws on malformed JSON or a ScriptValidationError on bad shape. */
export function parseScriptText(text: string, source = "script"): Script {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse ${source} as JSON: ${reason}`);
  }
  return parseScript(json);
}

/** Load a script from path, or from stdin when path is undefined. */
export function loadScript(scriptPath?: string): Script {
  const text = fs.readFileSync(scriptPath ?? 0, "utf8");
  return parseScriptText(text, scriptPath ?? "stdin");
}
