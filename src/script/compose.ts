/**
 * Replay a validated script against a fresh SsmlBuilder.
 */

import type { Logger } from "pino";
import { logger as defaultLogger, logComposed } from "../logging";
import { SsmlBuilder, type AppendResult } from "../ssml/builder";
import type { SsmlError } from "../ssml/errors";
import { pauseDuration, pauseStrength } from "../ssml/pause";
import type { Fragment, Script } from "./schema";

export interface ComposeOptions {
  /** Skip remaining fragments after the first failure (default true). */
  stopOnError?: boolean;
  logger?: Logger;
}

export interface FragmentFailure {
  /** Position of the fragment in script.fragments. */
  index: number;
  error: SsmlError;
}

export interface ComposeResult {
  /** Document built from every fragment that was appended. */
  ssml: string;
  errors: FragmentFailure[];
  /** Number of fragments appended. */
  applied: number;
}

function appendFragment(builder: SsmlBuilder, fragment: Fragment): AppendResult {
  switch (fragment.type) {
    case "speech":
      return { ok: true, builder: builder.appendPlainSpeech(fragment.text) };
    case "amazonEffect":
      return { ok: true, builder: builder.appendAmazonEffect(fragment.name, fragment.text) };
    case "audio":
      return builder.appendAudio(fragment.src);
    case "break":
      return builder.appendBreak(
        "timeMs" in fragment ? pauseDuration(fragment.timeMs) : pauseStrength(fragment.strength)
      );
    case "emphasis":
      return { ok: true, builder: builder.appendEmphasis(fragment.level, fragment.text) };
    case "paragraph":
      return { ok: true, builder: builder.appendParagraph(fragment.text) };
    case "prosody":
      return builder.appendProsody(
        { rate: fragment.rate, pitch: fragment.pitch, volume: fragment.volume },
        fragment.text
      );
    case "sentence":
      return { ok: true, builder: builder.appendSentence(fragment.text) };
    case "substitution":
      return { ok: true, builder: builder.appendSubstitution(fragment.alias, fragment.text) };
  }
}

export function compose(script: Script, options: ComposeOptions = {}): ComposeResult {
  const log = options.logger ?? defaultLogger;
  const stopOnError = options.stopOnError ?? true;
  const builder = new SsmlBuilder({ logger: log });
  const errors: FragmentFailure[] = [];
  let applied = 0;

  for (const [index, fragment] of script.fragments.entries()) {
    const result = appendFragment(builder, fragment);
    if (result.ok) {
      applied++;
      continue;
    }
    errors.push({ index, error: result.error });
    if (stopOnError) break;
  }

  const ssml = builder.build();
  logComposed(log, applied, errors.length, ssml.length);
  return { ssml, errors, applied };
}
