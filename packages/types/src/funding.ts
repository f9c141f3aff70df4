/**
 * Funding Types
 *
 * The data model of the funding engine: derived accounts, balance
 * observations, the funding policy, planned actions, nonce leases and
 * transaction records.
 *
 * Rules:
 * - All types are immutable (readonly); a newer value supersedes an older one
 * - Amounts are bigint in the smallest unit of the base asset
 * - Accounts are referenced, never copied with mutable state
 */

import type { Address, TxHash } from "./chain.js";

// =============================================================================
// Accounts
// =============================================================================

/**
 * An account derived from the master seed.
 * Carries no key material; signing goes through the deriver.
 */
export interface Account {
  /** Position in the derivation sequence */
  readonly index: number;

  /** Checksummed address */
  readonly address: Address;

  /** Derivation path resolved from the template (e.g. "m/44'/60'/3'/0/0") */
  readonly path: string;
}

// =============================================================================
// Balance observation
// =============================================================================

interface SnapshotBase {
  readonly account: Account;

  /** Monotonic timestamp (ms) taken when the read completed */
  readonly observedAt: number;
}

/** A balance read that succeeded. */
export interface KnownBalanceSnapshot extends SnapshotBase {
  readonly status: "known";
  readonly balance: bigint;
}

/** A balance read that failed; retried next cycle. */
export interface UnknownBalanceSnapshot extends SnapshotBase {
  readonly status: "unknown";
  readonly error: string;

  /** Balance from the most recent successful read, if any */
  readonly lastKnownBalance?: bigint;
}

export type BalanceSnapshot = KnownBalanceSnapshot | UnknownBalanceSnapshot;

// =============================================================================
// Policy
// =============================================================================

/**
 * Funding policy. Fixed for the lifetime of a run.
 */
export interface FundingPolicy {
  /** Top-up triggers when balance < threshold */
  readonly threshold: bigint;

  /** Balance a top-up restores to */
  readonly target: bigint;

  /** Minimum balance left in a non-root account by reclaim */
  readonly reserve: bigint;

  /** Index of the account that funds the others and receives reclaims */
  readonly rootIndex: number;
}

// =============================================================================
// Actions
// =============================================================================

export type ActionReason = "fund" | "reclaim";

/**
 * A transfer the engine has decided to make.
 *
 * Fund: root → destination. Reclaim: source → root.
 */
export interface PendingAction {
  /** Unique per planned action */
  readonly id: string;
  readonly reason: ActionReason;
  readonly source: Account;
  readonly destination: Account;
  readonly amount: bigint;
}

// =============================================================================
// Nonces
// =============================================================================

export type NonceLeaseState = "reserved" | "committed" | "released";

/**
 * A nonce handed out by a sequencer. Exclusively held by one submission
 * until it is committed (accepted by the chain) or released (failed).
 */
export interface NonceLease {
  readonly id: number;
  readonly account: Address;
  readonly value: number;
  readonly state: NonceLeaseState;
}

// =============================================================================
// Transactions
// =============================================================================

/**
 * Why a transaction did not reach confirmation.
 *
 * - timeout: accepted but not confirmed within the poll budget (indeterminate)
 * - retryable: transient failure; re-planned next cycle
 * - fatal: operator attention required; the run halts
 * - reverted: included on chain but failed
 */
export type FailureKind = "timeout" | "retryable" | "fatal" | "reverted";

export type TransactionStatus =
  | { readonly state: "submitted" }
  | { readonly state: "confirmed" }
  | {
      readonly state: "failed";
      readonly failure: FailureKind;
      readonly code: string;
      readonly message: string;
    };

export interface TransactionRecord {
  readonly action: PendingAction;

  /** Nonce the transaction was sent with, once one was leased */
  readonly nonce?: number;

  /** Chain transaction id, once the chain accepted the transaction */
  readonly txHash?: TxHash;

  /** Value + worst-case fee debited from the source while in flight */
  readonly debit?: bigint;

  readonly status: TransactionStatus;
}
