/**
 * Unit tests for script validation.
 */

import * as path from "path";
import { ScriptValidationError, loadScript, parseScript, parseScriptText } from "../../../src/script";

describe("parseScript", () => {
  it("accepts every fragment type", () => {
    const script = parseScript({
      fragments: [
        { type: "speech", text: "a" },
        { type: "amazonEffect", name: "whispered", text: "b" },
        { type: "audio", src: "https://x" },
        { type: "break", strength: "weak" },
        { type: "break", timeMs: 250 },
        { type: "emphasis", level: "strong", text: "c" },
        { type: "paragraph", text: "d" },
        { type: "prosody", rate: "fast", pitch: -2, text: "e" },
        { type: "sentence", text: "f" },
        { type: "substitution", alias: "g", text: "h" },
      ],
    });
    expect(script.fragments.length).toBe(10);
    expect(script.fragments[4]).toEqual({ type: "break", timeMs: 250 });
  });

  it("rejects a break with both strength and time", () => {
    expect(() => parseScript({ fragments: [{ type: "break", strength: "weak", timeMs: 5 }] })).toThrow(
      ScriptValidationError
    );
  });

  it("rejects unknown fragment types", () => {
    expect(() => parseScript({ fragments: [{ type: "voice", text: "x" }] })).toThrow(ScriptValidationError);
  });

  it("reports the path of a missing field", () => {
    try {
      parseScript({});
      throw new Error("expected parseScript to throw");
    } catch (err) {
      expect(err).toBeInstanceOf(ScriptValidationError);
      expect((err as ScriptValidationError).issues).toEqual(["fragments: Required"]);
    }
  });
});

describe("parseScriptText", () => {
  it("wraps malformed JSON with the source name", () => {
    expect(() => parseScriptText("{", "inline.json")).toThrow(/^Failed to parse inline\.json as JSON: /);
  });
});

describe("loadScript", () => {
  it("reads and validates a script file", () => {
    const script = loadScript(path.resolve(__dirname, "../../fixtures/greeting.json"));
    expect(script.fragments.map((f) => f.type)).toEqual(["sentence", "break", "prosody", "substitution", "audio"]);
  });
});
