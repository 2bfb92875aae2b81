/**
 * Errors returned (not thrown) by the SSML builder when a fragment is rejected.
 */

export type SsmlErrorCode = "INVALID_URL" | "INVALID_SCHEME" | "UNSUPPORTED_TYPE";

/** Builder parameter that accepts more than one shape. */
export type PolymorphicParameter = "strengthOrDuration" | "rate" | "pitch" | "volume";

export class SsmlError extends Error {
  readonly code: SsmlErrorCode;
  /** Set for UNSUPPORTED_TYPE. */
  readonly parameter?: PolymorphicParameter;

  constructor(code: SsmlErrorCode, message: string, parameter?: PolymorphicParameter) {
    super(message);
    this.name = "SsmlError";
    this.code = code;
    this.parameter = parameter;
  }
}

export function invalidUrl(src: string, cause: unknown): SsmlError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new SsmlError("INVALID_URL", `src "${src}" failed to parse into a valid URL: ${reason}`);
}

export function invalidScheme(scheme: string): SsmlError {
  return new SsmlError("INVALID_SCHEME", `src must be a HTTPS URL. Scheme ${scheme || "(none)"} not valid`);
}

export function unsupportedType(parameter: PolymorphicParameter, expected: string): SsmlError {
  return new SsmlError(
    "UNSUPPORTED_TYPE",
    `unsupported ${parameter} type. must be either ${expected}`,
    parameter
  );
}
