/**
 * Pause strengths and the strength-or-duration argument of <break>.
 */

export const PauseStrength = {
  None: "none",
  XWeak: "x-weak",
  Weak: "weak",
  Medium: "medium",
  Strong: "strong",
  XStrong: "x-strong",
  Default: "medium",
} as const;

export type PauseStrengthName = (typeof PauseStrength)[keyof typeof PauseStrength] | (string & {});

/** Either a named strength or an explicit duration; never both. */
export type PauseLength =
  | { kind: "strength"; strength: PauseStrengthName }
  | { kind: "duration"; milliseconds: number };

export function pauseStrength(strength: PauseStrengthName): PauseLength {
  return { kind: "strength", strength };
}

/**
 * Explicit pause length. Fractions of a millisecond are kept here and
 * truncated when rendered (1500.999 renders as 1500ms).
 */
export function pauseDuration(milliseconds: number): PauseLength {
  return { kind: "duration", milliseconds };
}
