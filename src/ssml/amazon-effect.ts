/**
 * Amazon-specific voice effects for <amazon:effect name="...">.
 */

export const AmazonEffect = {
  Whispered: "whispered",
} as const;

/** A known effect name, or any vendor string passed through verbatim. */
export type AmazonEffectName = (typeof AmazonEffect)[keyof typeof AmazonEffect] | (string & {});
