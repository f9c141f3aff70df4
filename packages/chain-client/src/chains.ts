/**
 * EVM chains the client can reach, keyed by CAIP-2 id ("eip155:<n>").
 * Display names and RPC metadata come from viem's chain definitions.
 */

import type { Chain } from "viem";
import {
  arbitrum,
  base,
  baseSepolia,
  foundry,
  mainnet,
  optimism,
  polygon,
  sepolia,
} from "viem/chains";
import type { ChainId, ChainRef } from "@hd-funder/types";

const SUPPORTED: readonly Chain[] = [
  mainnet,
  sepolia,
  base,
  baseSepolia,
  arbitrum,
  optimism,
  polygon,
  foundry,
];

const BY_ID = new Map<ChainId, Chain>(
  SUPPORTED.map((chain) => [`eip155:${chain.id}`, chain]),
);

export function supportedChainIds(): ChainId[] {
  return [...BY_ID.keys()];
}

/** The viem chain behind a CAIP-2 id, if supported. */
export function viemChainFor(chainId: ChainId): Chain | undefined {
  return BY_ID.get(chainId);
}

export function getChainRef(chainId: ChainId): ChainRef | undefined {
  const chain = BY_ID.get(chainId);
  if (chain === undefined) return undefined;
  return { chainId, name: chain.name, family: "evm" };
}

export function isEvmChain(chainId: ChainId): boolean {
  return chainId.startsWith("eip155:");
}

/**
 * Numeric chain id of an EVM chain ("eip155:8453" → 8453).
 *
 * @throws Error if the id is not a well-formed eip155 reference
 */
export function evmChainNumber(chainId: ChainId): number {
  const match = /^eip155:(\d+)$/.exec(chainId);
  if (!match?.[1]) {
    throw new Error(`Not an EVM chain id: '${chainId}'`);
  }
  return Number(match[1]);
}
