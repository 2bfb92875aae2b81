/**
 * Script composer: JSON fragment lists rendered through SsmlBuilder.
 */

export { FragmentSchema, ScriptSchema, ScriptValidationError, parseScript } from "./schema";
export type { Fragment, Script } from "./schema";
export { compose } from "./compose";
export type { ComposeOptions, ComposeResult, FragmentFailure } from "./compose";
export { loadScript, parseScriptText } from "./load";
