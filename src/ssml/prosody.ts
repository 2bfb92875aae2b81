/**
 * Prosody rate/pitch/volume tokens and the rules that turn a setting into attribute text.
 */

export const ProsodyRate = {
  XSlow: "x-slow",
  Slow: "slow",
  Medium: "medium",
  Fast: "fast",
  XFast: "x-fast",
} as const;

export const ProsodyPitch = {
  XLow: "x-low",
  Low: "low",
  Medium: "medium",
  High: "high",
  XHigh: "x-high",
} as const;

export const ProsodyVolume = {
  Silent: "silent",
  XSoft: "x-soft",
  Soft: "soft",
  Medium: "medium",
  Loud: "loud",
  XLoud: "x-loud",
} as const;

export type ProsodyRateName = (typeof ProsodyRate)[keyof typeof ProsodyRate] | (string & {});
export type ProsodyPitchName = (typeof ProsodyPitch)[keyof typeof ProsodyPitch] | (string & {});
export type ProsodyVolumeName = (typeof ProsodyVolume)[keyof typeof ProsodyVolume] | (string & {});

/**
 * Each attribute is a token, an integer offset, or absent (omitted from the tag).
 * rate: percent of normal speed; pitch: signed percent; volume: signed decibels.
 */
export interface ProsodySettings {
  rate?: ProsodyRateName | number;
  pitch?: ProsodyPitchName | number;
  volume?: ProsodyVolumeName | number;
}

interface NumericFormat {
  unit: string;
  /** Prefix strictly positive values with "+". */
  signed: boolean;
}

export const PROSODY_FORMATS: Record<keyof ProsodySettings, NumericFormat> = {
  rate: { unit: "%", signed: false },
  pitch: { unit: "%", signed: true },
  volume: { unit: "dB", signed: true },
};

export type ResolvedSetting =
  | { kind: "absent" }
  | { kind: "value"; text: string }
  | { kind: "unsupported" };

/** Resolve one prosody setting to the text that goes inside the attribute quotes. */
export function resolveProsodySetting(value: unknown, format: NumericFormat): ResolvedSetting {
  if (value === undefined || value === null) return { kind: "absent" };
  if (typeof value === "string") return { kind: "value", text: value };
  if (typeof value === "number" && Number.isSafeInteger(value)) {
    const sign = format.signed && value > 0 ? "+" : "";
    return { kind: "value", text: `${sign}${value}${format.unit}` };
  }
  return { kind: "unsupported" };
}
