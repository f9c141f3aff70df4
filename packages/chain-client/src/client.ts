/**
 * Chain Client Interface
 *
 * The capability the funding engine consumes: read balances and nonces,
 * quote fees, submit signed transactions and look up their status.
 * Every chain-specific implementation must satisfy this interface.
 *
 * Design rules:
 * - All methods return Promises (chain queries are inherently async)
 * - Failures are thrown as ChainClientError, never returned
 * - Signing is not a client concern; clients only relay signed bytes
 */

import type { Address, ChainId, ChainRef, Hex, TxHash } from "@hd-funder/types";

// =============================================================================
// Configuration
// =============================================================================

/**
 * Configuration for connecting to a chain.
 */
export interface ChainClientConfig {
  /** Chain to connect to */
  readonly chain: ChainRef;

  /** RPC endpoint URL */
  readonly rpcUrl: string;

  /** Per-call timeout in milliseconds. Default: 30000 */
  readonly timeoutMs?: number;

  /** Gas limit used for plain value transfers. Default: 21000 */
  readonly transferGasLimit?: bigint;
}

// =============================================================================
// Fees
// =============================================================================

/**
 * Fee parameters for one value transfer.
 */
export interface FeeQuote {
  readonly gasLimit: bigint;
  readonly maxFeePerGas: bigint;
  readonly maxPriorityFeePerGas: bigint;

  /** Worst-case fee: gasLimit * maxFeePerGas */
  readonly total: bigint;
}

// =============================================================================
// Transactions
// =============================================================================

/**
 * A value transfer ready to be signed.
 */
export interface TransferRequest {
  readonly to: Address;
  readonly value: bigint;
  readonly nonce: number;
  readonly fee: FeeQuote;
}

/**
 * A signed transfer. The hash is known before submission, so a
 * submission with an ambiguous outcome can be looked up instead of resent.
 */
export interface SignedTransaction {
  readonly from: Address;
  readonly to: Address;
  readonly value: bigint;
  readonly nonce: number;
  readonly hash: TxHash;
  readonly serialized: Hex;
}

/**
 * Signing capability scoped to a single account.
 */
export interface TransactionSigner {
  readonly address: Address;
  signTransfer(request: TransferRequest): Promise<SignedTransaction>;
}

/**
 * Status of a transaction as seen by the chain.
 *
 * "not-found" means neither a receipt nor a pending transaction exists.
 */
export type TransactionStatusResult = "pending" | "confirmed" | "failed" | "not-found";

// =============================================================================
// Client Interface
// =============================================================================

export interface ChainClient {
  /** Which chain this client talks to */
  readonly chainId: ChainId;

  /** Numeric chain id used when signing */
  readonly numericChainId: number;

  /** Balance in the smallest unit */
  getBalance(address: Address): Promise<bigint>;

  /** Next nonce for the address, counting pending transactions */
  getNonce(address: Address): Promise<number>;

  /** Fee for a plain value transfer */
  estimateFee(): Promise<FeeQuote>;

  /** Relay a signed transaction; resolves with its hash once accepted */
  submitTransaction(signed: SignedTransaction): Promise<TxHash>;

  /** Look up a transaction by hash */
  getTransactionStatus(hash: TxHash): Promise<TransactionStatusResult>;
}
