/**
 * SSML builder: accumulates rendered fragments in call order and wraps them in <speak>.
 *
 * Text and tokens are written verbatim (no XML escaping); callers supply markup-safe values.
 * Infallible appends return the builder for chaining. Appends that validate input return an
 * AppendResult; on failure nothing is written and the same builder is handed back.
 */

import type { Logger } from "pino";
import { logger as defaultLogger, logFragmentRejected } from "../logging";
import type { AmazonEffectName } from "./amazon-effect";
import type { EmphasisLevel } from "./emphasis";
import { SsmlError, invalidScheme, invalidUrl, unsupportedType } from "./errors";
import type { PauseLength } from "./pause";
import { PROSODY_FORMATS, resolveProsodySetting, type ProsodySettings } from "./prosody";

export type AppendResult =
  | { ok: true; builder: SsmlBuilder }
  | { ok: false; builder: SsmlBuilder; error: SsmlError };

export interface SsmlBuilderOptions {
  /** Receives a debug entry for every rejected fragment. */
  logger?: Logger;
}

const PROSODY_ATTRIBUTES = ["rate", "pitch", "volume"] as const;

export class SsmlBuilder {
  private buffer = "";
  private readonly log: Logger;

  constructor(options: SsmlBuilderOptions = {}) {
    this.log = options.logger ?? defaultLogger;
  }

  /** Characters accumulated so far (excluding the <speak> wrapper). */
  get length(): number {
    return this.buffer.length;
  }

  appendPlainSpeech(text: string): this {
    this.buffer += text;
    return this;
  }

  appendAmazonEffect(effect: AmazonEffectName, text: string): this {
    this.buffer += `<amazon:effect name="${effect}">${text}</amazon:effect>`;
    return this;
  }

  /**
   * src must parse as an absolute URL with the https scheme. A relative reference parses but has
   * no scheme, so it fails with INVALID_SCHEME. The parsed (percent-encoded) URL is rendered.
   */
  appendAudio(src: string): AppendResult {
    let url: URL;
    try {
      url = new URL(src);
    } catch (err) {
      if (isRelativeReference(src)) return this.reject("audio", invalidScheme(""));
      return this.reject("audio", invalidUrl(src, err));
    }
    const scheme = url.protocol.replace(/:$/, "");
    if (scheme !== "https") return this.reject("audio", invalidScheme(scheme));
    return this.accept(`<audio src="${renderUrl(src, url)}"/>`);
  }

  /** Durations render as whole milliseconds, truncated toward zero. */
  appendBreak(length: PauseLength): AppendResult {
    const fragment = renderBreak(length);
    if (fragment === null) {
      return this.reject("break", unsupportedType("strengthOrDuration", "a pause strength or a duration"));
    }
    return this.accept(fragment);
  }

  appendEmphasis(level: EmphasisLevel, text: string): this {
    this.buffer += `<emphasis level="${level}">${text}</emphasis>`;
    return this;
  }

  appendParagraph(text: string): this {
    this.buffer += `<p>${text}</p>`;
    return this;
  }

  /**
   * Only the settings that are present become attributes, always in rate, pitch, volume order.
   * Fails on the first setting that is neither a token nor an integer.
   */
  appendProsody(settings: ProsodySettings, text: string): AppendResult {
    const attributes: string[] = [];
    for (const name of PROSODY_ATTRIBUTES) {
      const resolved = resolveProsodySetting(settings[name], PROSODY_FORMATS[name]);
      if (resolved.kind === "unsupported") {
        return this.reject("prosody", unsupportedType(name, `a prosody ${name} token or an integer`));
      }
      if (resolved.kind === "value") attributes.push(`${name}="${resolved.text}"`);
    }
    return this.accept(`<prosody ${attributes.join(" ")}>${text}</prosody>`);
  }

  appendSentence(text: string): this {
    this.buffer += `<s>${text}</s>`;
    return this;
  }

  appendSubstitution(alias: string, text: string): this {
    this.buffer += `<sub alias="${alias}">${text}</sub>`;
    return this;
  }

  build(): string {
    return `<speak>${this.buffer}</speak>`;
  }

  private accept(fragment: string): AppendResult {
    this.buffer += fragment;
    return { ok: true, builder: this };
  }

  private reject(element: string, error: SsmlError): AppendResult {
    logFragmentRejected(this.log, element, error);
    return { ok: false, builder: this, error };
  }
}

// Typed callers can only pass a PauseLength; plain JS callers can pass anything.
function renderBreak(length: unknown): string | null {
  if (typeof length !== "object" || length === null || !("kind" in length)) return null;
  if (
    length.kind === "duration" &&
    "milliseconds" in length &&
    typeof length.milliseconds === "number"
  ) {
    const milliseconds = Math.trunc(length.milliseconds);
    return Number.isSafeInteger(milliseconds) ? `<break time="${milliseconds}ms"/>` : null;
  }
  if (length.kind === "strength" && "strength" in length && typeof length.strength === "string") {
    return `<break strength="${length.strength}"/>`;
  }
  return null;
}

const SCHEME_PREFIX = /^[A-Za-z][A-Za-z0-9+.-]*:/;
const AUTHORITY_ONLY = /^[A-Za-z][A-Za-z0-9+.-]*:\/\/[^/?#]*(?:[?#]|$)/;
const RELATIVE_BASE = "https://relative.invalid/";

function isRelativeReference(src: string): boolean {
  if (SCHEME_PREFIX.test(src) || src.startsWith(":")) return false;
  try {
    new URL(src, RELATIVE_BASE);
    return true;
  } catch {
    return false;
  }
}

// The URL parser adds "/" to an empty path; "https://x" stays "https://x".
function renderUrl(src: string, url: URL): string {
  if (!AUTHORITY_ONLY.test(src)) return url.href;
  return url.href.replace(/^([^?#]*?)\/(?=[?#]|$)/, "$1");
}
