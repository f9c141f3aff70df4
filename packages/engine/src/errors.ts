/**
 * Engine errors and submission failure classification.
 *
 * Per-account failures travel as values (Unknown snapshots, Failed
 * records); these classes carry the detail and decide whether a run
 * may continue.
 */

import type { ActionReason, PendingAction, TxHash } from "@hd-funder/types";
import { isChainClientError, type ChainClientErrorCode } from "@hd-funder/chain-client";
import { DerivationError } from "@hd-funder/wallet";
import { RetryExhaustedError } from "./retry.js";

// =============================================================================
// Observation
// =============================================================================

/** A balance read failed. Recoverable; retried next cycle. */
export class ObservationError extends Error {
  public readonly accountIndex: number;
  constructor(accountIndex: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ObservationError";
    this.accountIndex = accountIndex;
  }
}

// =============================================================================
// Submission
// =============================================================================

export type RetryableSubmissionCode =
  | "NONCE_TOO_LOW"
  | "NONCE_TOO_HIGH"
  | "ALREADY_KNOWN"
  | "TIMEOUT"
  | "NETWORK"
  | "REJECTED"
  | "INSUFFICIENT_FUNDS"
  | "UNKNOWN";

export type FatalSubmissionCode =
  | "INSUFFICIENT_FUNDS"
  | "INSUFFICIENT_ROOT_FUNDS"
  | "INVALID_ADDRESS"
  | "NOT_CONNECTED"
  | "DERIVATION_FAILED";

/** Nonce mismatch or transient RPC failure. Re-planned and retried. */
export class RetryableSubmissionError extends Error {
  public readonly code: RetryableSubmissionCode;
  constructor(code: RetryableSubmissionCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RetryableSubmissionError";
    this.code = code;
  }
}

/** Operator attention required. The run halts. */
export class FatalSubmissionError extends Error {
  public readonly code: FatalSubmissionCode;
  constructor(code: FatalSubmissionCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FatalSubmissionError";
    this.code = code;
  }
}

export type SubmissionError = RetryableSubmissionError | FatalSubmissionError;

/** Accepted by the chain but not confirmed within the polling budget. */
export class ConfirmationTimeoutError extends Error {
  public readonly actionId: string;
  public readonly txHash: TxHash;
  public readonly attempts: number;
  constructor(action: PendingAction, txHash: TxHash, attempts: number) {
    super(`Transaction ${txHash} for ${action.id} not confirmed after ${attempts} polls`);
    this.name = "ConfirmationTimeoutError";
    this.actionId = action.id;
    this.txHash = txHash;
    this.attempts = attempts;
  }
}

const FATAL_CHAIN_CODES: ReadonlySet<ChainClientErrorCode> = new Set([
  "INSUFFICIENT_FUNDS",
  "INVALID_ADDRESS",
  "NOT_CONNECTED",
]);

function isFatalChainCode(code: ChainClientErrorCode): code is "INSUFFICIENT_FUNDS" | "INVALID_ADDRESS" | "NOT_CONNECTED" {
  return FATAL_CHAIN_CODES.has(code);
}

/**
 * Map any failure raised while sending into the submission taxonomy.
 * Unrecognized errors are retryable. A reclaim source that cannot pay
 * is retryable too: only the root running dry halts a run.
 */
export function classifySubmissionError(err: unknown, reason?: ActionReason): SubmissionError {
  if (err instanceof RetryableSubmissionError || err instanceof FatalSubmissionError) {
    return err;
  }
  if (err instanceof RetryExhaustedError) {
    return classifySubmissionError(err.lastError, reason);
  }
  if (err instanceof DerivationError) {
    return new FatalSubmissionError("DERIVATION_FAILED", err.message, { cause: err });
  }
  if (isChainClientError(err)) {
    if (err.code === "INSUFFICIENT_FUNDS" && reason === "reclaim") {
      return new RetryableSubmissionError(err.code, err.message, { cause: err });
    }
    return isFatalChainCode(err.code)
      ? new FatalSubmissionError(err.code, err.message, { cause: err })
      : new RetryableSubmissionError(err.code, err.message, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new RetryableSubmissionError("UNKNOWN", message, { cause: err });
}

/** True for errors a further send attempt may fix. */
export function isRetryableSubmissionError(err: unknown, reason?: ActionReason): boolean {
  return classifySubmissionError(err, reason) instanceof RetryableSubmissionError;
}

// =============================================================================
// Engine
// =============================================================================

export type EngineStateErrorCode = "INVALID_TRANSITION";

export class EngineStateError extends Error {
  public readonly code: EngineStateErrorCode;
  constructor(code: EngineStateErrorCode, message: string) {
    super(message);
    this.name = "EngineStateError";
    this.code = code;
  }
}
