/**
 * EVM Chain Client: viem-backed implementation of ChainClient.
 *
 * Supports any EVM-compatible chain in the chain registry
 * (Ethereum, Base, Arbitrum, Optimism, Polygon, local devnets).
 *
 * Capabilities:
 * - Native balance and pending nonce reads
 * - EIP-1559 fee quotes for plain value transfers
 * - Raw transaction relay
 * - Receipt / mempool lookups by hash
 */

import {
  createPublicClient,
  http,
  TransactionNotFoundError,
  TransactionReceiptNotFoundError,
  type PublicClient,
  type HttpTransport,
  type Chain,
} from "viem";
import type { Address, TxHash } from "@hd-funder/types";
import type {
  ChainClient,
  ChainClientConfig,
  FeeQuote,
  SignedTransaction,
  TransactionStatusResult,
} from "../client.js";
import { evmChainNumber, isEvmChain, supportedChainIds, viemChainFor } from "../chains.js";
import { ChainClientError } from "../errors.js";
import { translateViemError } from "./translate-error.js";

const DEFAULT_TRANSFER_GAS = 21_000n;

// =============================================================================
// EVM Chain Client
// =============================================================================

export class EvmChainClient implements ChainClient {
  readonly chainId: string;
  readonly numericChainId: number;
  private client: PublicClient<HttpTransport, Chain> | null = null;
  private readonly config: ChainClientConfig;
  private readonly transferGasLimit: bigint;

  constructor(config: ChainClientConfig) {
    if (!isEvmChain(config.chain.chainId)) {
      throw new Error(
        `EvmChainClient: expected EVM chain ID (eip155:*), got '${config.chain.chainId}'`
      );
    }
    this.chainId = config.chain.chainId;
    this.numericChainId = evmChainNumber(config.chain.chainId);
    this.config = config;
    this.transferGasLimit = config.transferGasLimit ?? DEFAULT_TRANSFER_GAS;
  }

  async connect(): Promise<void> {
    const viemChain = viemChainFor(this.chainId);
    if (!viemChain) {
      throw new Error(
        `EvmChainClient: unsupported chain '${this.chainId}'. ` +
          `Supported: ${supportedChainIds().join(", ")}`
      );
    }

    this.client = createPublicClient({
      chain: viemChain,
      transport: http(this.config.rpcUrl, {
        timeout: this.config.timeoutMs ?? 30_000,
        retryCount: 0,
      }),
    });
  }

  async disconnect(): Promise<void> {
    this.client = null;
  }

  isConnected(): boolean {
    return this.client !== null;
  }

  async getBalance(address: Address): Promise<bigint> {
    const client = this.requireClient();
    try {
      return await client.getBalance({ address });
    } catch (err: unknown) {
      throw translateViemError(err);
    }
  }

  async getNonce(address: Address): Promise<number> {
    const client = this.requireClient();
    try {
      return await client.getTransactionCount({ address, blockTag: "pending" });
    } catch (err: unknown) {
      throw translateViemError(err);
    }
  }

  async estimateFee(): Promise<FeeQuote> {
    const client = this.requireClient();
    try {
      const { maxFeePerGas, maxPriorityFeePerGas } = await client.estimateFeesPerGas();
      return {
        gasLimit: this.transferGasLimit,
        maxFeePerGas,
        maxPriorityFeePerGas,
        total: this.transferGasLimit * maxFeePerGas,
      };
    } catch (err: unknown) {
      throw translateViemError(err);
    }
  }

  async submitTransaction(signed: SignedTransaction): Promise<TxHash> {
    const client = this.requireClient();
    try {
      return await client.sendRawTransaction({
        serializedTransaction: signed.serialized,
      });
    } catch (err: unknown) {
      throw translateViemError(err);
    }
  }

  async getTransactionStatus(hash: TxHash): Promise<TransactionStatusResult> {
    const client = this.requireClient();
    try {
      const receipt = await client.getTransactionReceipt({ hash });
      return receipt.status === "success" ? "confirmed" : "failed";
    } catch (err: unknown) {
      if (!(err instanceof TransactionReceiptNotFoundError)) {
        throw translateViemError(err);
      }
    }

    // No receipt yet: distinguish "in the mempool" from "never seen"
    try {
      await client.getTransaction({ hash });
      return "pending";
    } catch (err: unknown) {
      if (err instanceof TransactionNotFoundError) {
        return "not-found";
      }
      throw translateViemError(err);
    }
  }

  // ===========================================================================
  // Private helpers
  // ===========================================================================

  private requireClient(): PublicClient<HttpTransport, Chain> {
    if (!this.client) {
      throw new ChainClientError(
        "NOT_CONNECTED",
        "EvmChainClient: not connected. Call connect() before querying."
      );
    }
    return this.client;
  }
}
