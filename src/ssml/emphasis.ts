/**
 * Emphasis levels for <emphasis level="...">.
 */

export const Emphasis = {
  Strong: "strong",
  Moderate: "moderate",
  Reduced: "reduced",
  /** What most engines apply when no level is given. */
  Default: "moderate",
} as const;

export type EmphasisLevel = (typeof Emphasis)[keyof typeof Emphasis] | (string & {});
