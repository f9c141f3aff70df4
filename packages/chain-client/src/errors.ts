/**
 * Chain client errors.
 *
 * Every failure that crosses the ChainClient boundary is a ChainClientError
 * whose code tells the engine how to react.
 */

export type ChainClientErrorCode =
  | "NONCE_TOO_LOW"
  | "NONCE_TOO_HIGH"
  | "ALREADY_KNOWN"
  | "INSUFFICIENT_FUNDS"
  | "INVALID_ADDRESS"
  | "TIMEOUT"
  | "NETWORK"
  | "REJECTED"
  | "NOT_CONNECTED";

export class ChainClientError extends Error {
  public readonly code: ChainClientErrorCode;

  constructor(code: ChainClientErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ChainClientError";
    this.code = code;
  }
}

export function isChainClientError(err: unknown): err is ChainClientError {
  return err instanceof ChainClientError;
}
