/**
 * Hashing-layer error types.
 *
 * Fixed codes, one class. Pure operations return these as values at the
 * call boundary; lower-level helpers throw them.
 */

export type HashErrorCode =
  | "DECODE_ERROR"
  | "INPUT_TOO_LARGE"
  | "HEADER_LENGTH_INVALID"
  | "TARGET_INVALID";

export class HashError extends Error {
  public readonly code: HashErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: HashErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "HashError";
    this.code = code;
    this.details = details ?? {};
  }
}
