/**
 * Runtime wiring: chain client, account deriver and engine built from
 * validated configuration.
 */

import type { Logger } from "pino";
import type { ChainRef } from "@hd-funder/types";
import { EvmChainClient, getChainRef } from "@hd-funder/chain-client";
import { AccountDeriver } from "@hd-funder/wallet";
import { DistributionEngine } from "@hd-funder/engine";
import { confirmRetry, fundingPolicy, sendRetry, type AppConfig } from "./config.js";

export interface Runtime {
  readonly client: EvmChainClient;
  readonly deriver: AccountDeriver;
  readonly engine: DistributionEngine;
  close(): Promise<void>;
}

export async function createRuntime(config: AppConfig, logger: Logger): Promise<Runtime> {
  const chain: ChainRef | undefined = getChainRef(config.CHAIN_ID);
  if (chain === undefined) {
    throw new Error(`Unsupported CHAIN_ID '${config.CHAIN_ID}'`);
  }

  const client = new EvmChainClient({
    chain,
    rpcUrl: config.RPC_URL,
    timeoutMs: config.RPC_TIMEOUT_MS,
  });
  await client.connect();

  const deriver = new AccountDeriver({
    mnemonic: config.MNEMONIC,
    pathTemplate: config.DERIVATION_PATH,
    maxAccounts: config.ACCOUNT_COUNT,
    chainId: client.numericChainId,
  });

  const engine = new DistributionEngine(
    { accounts: deriver, signers: deriver, client, logger },
    {
      policy: fundingPolicy(config),
      accountCount: config.ACCOUNT_COUNT,
      pollIntervalMs: config.POLL_INTERVAL_MS,
      pollConcurrency: config.POLL_CONCURRENCY,
      retry: sendRetry(config),
      confirm: confirmRetry(config),
    },
  );

  logger.info(
    {
      chain: chain.name,
      chainId: chain.chainId,
      accounts: config.ACCOUNT_COUNT,
      root: deriver.derive(config.ROOT_INDEX).address,
    },
    "runtime ready",
  );

  return {
    client,
    deriver,
    engine,
    close: () => client.disconnect(),
  };
}
