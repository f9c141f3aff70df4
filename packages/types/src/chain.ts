/**
 * Chain Types
 *
 * Chain-agnostic references shared by the client, wallet and engine layers.
 *
 * Rules:
 * - Chain IDs follow CAIP-2 convention (e.g. "eip155:1")
 * - Addresses and hashes are 0x-prefixed hex strings
 * - Amounts are bigint in the chain's smallest unit (wei)
 */

/**
 * Chain identifier (e.g., "eip155:1" for Ethereum mainnet).
 */
export type ChainId = string;

/**
 * 0x-prefixed hex string.
 */
export type Hex = `0x${string}`;

/**
 * Account address on an EVM chain.
 */
export type Address = `0x${string}`;

/**
 * Transaction hash on a specific chain.
 */
export type TxHash = `0x${string}`;

/**
 * Reference to a specific chain.
 */
export interface ChainRef {
  /** Chain identifier */
  readonly chainId: ChainId;

  /** Human-readable chain name */
  readonly name: string;

  /** Chain family (only "evm" is executable today) */
  readonly family: string;
}
