/**
 * @hd-funder/chain-client: Chain access for the funding engine.
 *
 * Provides the ChainClient contract the engine consumes, the signer
 * contract the wallet implements, and a viem-backed EVM client.
 *
 * Design rules:
 * - Chain-agnostic interface, chain-specific implementations
 * - Every RPC failure surfaces as a coded ChainClientError
 * - Clients relay signed bytes; they never hold keys
 */

// Core client interface
export type {
  ChainClient,
  ChainClientConfig,
  FeeQuote,
  TransferRequest,
  SignedTransaction,
  TransactionSigner,
  TransactionStatusResult,
} from "./client.js";

// Errors
export { ChainClientError, isChainClientError } from "./errors.js";
export type { ChainClientErrorCode } from "./errors.js";

// Chain definitions
export {
  evmChainNumber,
  getChainRef,
  isEvmChain,
  supportedChainIds,
  viemChainFor,
} from "./chains.js";

// EVM implementation
export { EvmChainClient, translateViemError } from "./evm/index.js";
