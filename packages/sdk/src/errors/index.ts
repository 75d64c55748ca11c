export const ERR = {
  MALFORMED_HEADER: "MALFORMED_HEADER",
  UNSUPPORTED_VERSION: "UNSUPPORTED_VERSION",
  INVALID_SECTION_COUNT: "INVALID_SECTION_COUNT",
  INVALID_SECTION_TYPE: "INVALID_SECTION_TYPE",
  INVALID_SECTION_SIZE: "INVALID_SECTION_SIZE",
  INVALID_FIELD_SIZE: "INVALID_FIELD_SIZE",
  INVALID_FIELD_ELEMENT: "INVALID_FIELD_ELEMENT",
  INVALID_MODULUS: "INVALID_MODULUS",
  UNEXPECTED_EOF: "UNEXPECTED_EOF",
  TRUNCATED_PUBLIC_INPUT: "TRUNCATED_PUBLIC_INPUT",
  CIRCUIT_DESERIALIZATION: "CIRCUIT_DESERIALIZATION",
  PROOF_DESERIALIZATION: "PROOF_DESERIALIZATION",
  BACKEND_INVOCATION: "BACKEND_INVOCATION",
  INVALID_CONFIG: "INVALID_CONFIG",
  ARTIFACT_MISSING: "ARTIFACT_MISSING",
  ARTIFACT_INTEGRITY: "ARTIFACT_INTEGRITY",
} as const;

export type ErrCode = (typeof ERR)[keyof typeof ERR];

export class SDKError extends Error {
  readonly code: ErrCode;
  constructor(code: ErrCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "SDKError";
    this.code = code;
  }
}

export function isSDKError(e: unknown, code?: ErrCode): e is SDKError {
  return e instanceof SDKError && (code === undefined || e.code === code);
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: SDKError };

/** Run `fn`, capturing an SDKError as a failed Result. Other throws propagate. */
export function attempt<T>(fn: () => T): Result<T> {
  try {
    return { ok: true, value: fn() };
  } catch (e) {
    if (isSDKError(e)) return { ok: false, error: e };
    throw e;
  }
}

/** Re-label `e` as `code`, keeping the original as `cause`. */
export function wrapError(code: ErrCode, message: string, e: unknown): SDKError {
  if (isSDKError(e, code)) return e;
  const detail = e instanceof Error ? e.message : String(e);
  return new SDKError(code, `${message}: ${detail}`, e);
}
