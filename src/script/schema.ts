/**
 * JSON script format: an ordered list of fragments replayed against an SsmlBuilder.
 */

import { z } from "zod";

const ProsodySettingSchema = z.union([z.string(), z.number()]).optional();

export const FragmentSchema = z.union([
  z.object({ type: z.literal("speech"), text: z.string() }).strict(),
  z.object({ type: z.literal("amazonEffect"), name: z.string(), text: z.string() }).strict(),
  z.object({ type: z.literal("audio"), src: z.string() }).strict(),
  z.object({ type: z.literal("break"), strength: z.string() }).strict(),
  z.object({ type: z.literal("break"), timeMs: z.number() }).strict(),
  z.object({ type: z.literal("emphasis"), level: z.string(), text: z.string() }).strict(),
  z.object({ type: z.literal("paragraph"), text: z.string() }).strict(),
  z
    .object({
      type: z.literal("prosody"),
      rate: ProsodySettingSchema,
      pitch: ProsodySettingSchema,
      volume: ProsodySettingSchema,
      text: z.string(),
    })
    .strict(),
  z.object({ type: z.literal("sentence"), text: z.string() }).strict(),
  z.object({ type: z.literal("substitution"), alias: z.string(), text: z.string() }).strict(),
]);

export const ScriptSchema = z.object({
  fragments: z.array(FragmentSchema),
});

export type Fragment = z.infer<typeof FragmentSchema>;
export type Script = z.infer<typeof ScriptSchema>;

export class ScriptValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid SSML script: ${issues.join("; ")}`);
    this.name = "ScriptValidationError";
    this.issues = issues;
  }
}

/** Validate parsed JSON. Throws ScriptValidationError listing each issue as "path: message". */
export function parseScript(input: unknown): Script {
  const result = ScriptSchema.safeParse(input);
  if (!result.success) {
    throw new ScriptValidationError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return result.data;
}
