/**
 * Unit tests for compose (script replay through SsmlBuilder).
 */

import pino from "pino";
import { compose, parseScript } from "../../../src/script";

const silent = pino({ level: "silent" });

const mixedScript = parseScript({
  fragments: [
    { type: "speech", text: "Before " },
    { type: "audio", src: "ftp://files.example.com/a.mp3" },
    { type: "prosody", pitch: 2.5, text: "odd" },
    { type: "speech", text: "after" },
  ],
});

describe("compose", () => {
  it("renders fragments in script order", () => {
    const script = parseScript({
      fragments: [
        { type: "amazonEffect", name: "whispered", text: "psst" },
        { type: "break", timeMs: 1200.7 },
        { type: "break", strength: "x-strong" },
        { type: "emphasis", level: "reduced", text: "quiet" },
        { type: "prosody", rate: 90, volume: "loud", text: "now" },
      ],
    });
    const result = compose(script, { logger: silent });
    expect(result.errors).toEqual([]);
    expect(result.applied).toBe(5);
    expect(result.ssml).toBe(
      '<speak><amazon:effect name="whispered">psst</amazon:effect><break time="1200ms"/>' +
        '<break strength="x-strong"/><emphasis level="reduced">quiet</emphasis>' +
        '<prosody rate="90%" volume="loud">now</prosody></speak>'
    );
  });

  it("stops at the first failure by default", () => {
    const result = compose(mixedScript, { logger: silent });
    expect(result.applied).toBe(1);
    expect(result.errors.map((e) => [e.index, e.error.code])).toEqual([[1, "INVALID_SCHEME"]]);
    expect(result.ssml).toBe("<speak>Before </speak>");
  });

  it("continues past failures when stopOnError is false", () => {
    const result = compose(mixedScript, { logger: silent, stopOnError: false });
    expect(result.applied).toBe(2);
    expect(result.errors.map((e) => [e.index, e.error.code, e.error.parameter])).toEqual([
      [1, "INVALID_SCHEME", undefined],
      [2, "UNSUPPORTED_TYPE", "pitch"],
    ]);
    expect(result.ssml).toBe("<speak>Before after</speak>");
  });

  it("logs a summary", () => {
    const lines: Array<Record<string, unknown>> = [];
    const log = pino({ level: "info" }, { write: (line: string) => lines.push(JSON.parse(line)) });
    compose(parseScript({ fragments: [{ type: "sentence", text: "hi" }] }), { logger: log });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      event: "SSML_COMPOSED",
      applied: 1,
      failed: 0,
      ssmlLength: "<speak><s>hi</s></speak>".length,
      msg: "Script composed",
    });
  });
});
