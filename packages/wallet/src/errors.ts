/**
 * Derivation errors. Always fatal: a bad path or index halts the run.
 */

export type DerivationErrorCode =
  | "MALFORMED_PATH"
  | "INDEX_OUT_OF_RANGE"
  | "INVALID_MNEMONIC";

export class DerivationError extends Error {
  public readonly code: DerivationErrorCode;
  constructor(code: DerivationErrorCode, message: string) {
    super(message);
    this.name = "DerivationError";
    this.code = code;
  }
}
