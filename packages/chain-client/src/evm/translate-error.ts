/**
 * Translation of viem errors into ChainClientError codes.
 *
 * viem wraps RPC failures several layers deep; the cause chain is walked
 * for a typed error first, then the message is matched against the
 * strings execution clients actually return.
 */

import {
  BaseError,
  HttpRequestError,
  InsufficientFundsError,
  InvalidAddressError,
  NonceTooHighError,
  NonceTooLowError,
  TimeoutError,
} from "viem";
import { ChainClientError, type ChainClientErrorCode } from "../errors.js";

const MESSAGE_PATTERNS: readonly (readonly [string, ChainClientErrorCode])[] = [
  ["nonce too low", "NONCE_TOO_LOW"],
  ["replacement transaction underpriced", "NONCE_TOO_LOW"],
  ["nonce too high", "NONCE_TOO_HIGH"],
  ["already known", "ALREADY_KNOWN"],
  ["known transaction", "ALREADY_KNOWN"],
  ["insufficient funds", "INSUFFICIENT_FUNDS"],
  ["invalid address", "INVALID_ADDRESS"],
  ["timed out", "TIMEOUT"],
  ["timeout", "TIMEOUT"],
  ["econnrefused", "NETWORK"],
  ["econnreset", "NETWORK"],
  ["socket hang up", "NETWORK"],
  ["fetch failed", "NETWORK"],
];

function codeFromTypedError(err: BaseError): ChainClientErrorCode | undefined {
  if (err.walk((e) => e instanceof NonceTooLowError)) return "NONCE_TOO_LOW";
  if (err.walk((e) => e instanceof NonceTooHighError)) return "NONCE_TOO_HIGH";
  if (err.walk((e) => e instanceof InsufficientFundsError)) return "INSUFFICIENT_FUNDS";
  if (err.walk((e) => e instanceof InvalidAddressError)) return "INVALID_ADDRESS";
  if (err.walk((e) => e instanceof TimeoutError)) return "TIMEOUT";
  return undefined;
}

function codeFromMessage(message: string | undefined): ChainClientErrorCode | undefined {
  if (!message) return undefined;
  const msg = message.toLowerCase();
  for (const [pattern, code] of MESSAGE_PATTERNS) {
    if (msg.includes(pattern)) return code;
  }
  return undefined;
}

/**
 * Map any error thrown by viem (or the transport under it) to a ChainClientError.
 *
 * Unrecognized node rejections become REJECTED; unrecognized transport
 * failures become NETWORK.
 */
export function translateViemError(err: unknown): ChainClientError {
  if (err instanceof ChainClientError) return err;

  const message = err instanceof Error ? err.message : String(err);

  if (err instanceof BaseError) {
    const code =
      codeFromTypedError(err) ??
      codeFromMessage(err.details) ??
      codeFromMessage(message) ??
      (err.walk((e) => e instanceof HttpRequestError) ? "NETWORK" : "REJECTED");
    return new ChainClientError(code, err.shortMessage, { cause: err });
  }

  return new ChainClientError(codeFromMessage(message) ?? "NETWORK", message, { cause: err });
}
