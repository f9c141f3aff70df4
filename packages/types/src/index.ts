/**
 * @hd-funder/types: Shared domain types for the funding stack.
 *
 * These types are used across all packages:
 * - Chain references (ids, addresses, hashes)
 * - Accounts, balance snapshots and the funding policy
 * - Planned actions, nonce leases and transaction records
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Chain types
export type {
  ChainId,
  ChainRef,
  Hex,
  Address,
  TxHash,
} from "./chain.js";

// Funding types
export type {
  Account,
  BalanceSnapshot,
  KnownBalanceSnapshot,
  UnknownBalanceSnapshot,
  FundingPolicy,
  ActionReason,
  PendingAction,
  NonceLease,
  NonceLeaseState,
  FailureKind,
  TransactionStatus,
  TransactionRecord,
} from "./funding.js";

// Runtime type guards
export { isFundingPolicy } from "./guards.js";
