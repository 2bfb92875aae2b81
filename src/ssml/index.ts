export { SsmlBuilder } from "./builder";
export type { AppendResult, SsmlBuilderOptions } from "./builder";
export { SsmlError } from "./errors";
export type { SsmlErrorCode, PolymorphicParameter } from "./errors";
export { AmazonEffect } from "./amazon-effect";
export type { AmazonEffectName } from "./amazon-effect";
export { Emphasis } from "./emphasis";
export type { EmphasisLevel } from "./emphasis";
export { PauseStrength, pauseDuration, pauseStrength } from "./pause";
export type { PauseLength, PauseStrengthName } from "./pause";
export { ProsodyPitch, ProsodyRate, ProsodyVolume } from "./prosody";
export type { ProsodyPitchName, ProsodyRateName, ProsodySettings, ProsodyVolumeName } from "./prosody";
