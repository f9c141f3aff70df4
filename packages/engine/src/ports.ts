/**
 * Capabilities the engine consumes from the wallet layer.
 * The wallet's AccountDeriver satisfies both.
 */

import type { Account } from "@hd-funder/types";
import type { TransactionSigner } from "@hd-funder/chain-client";

export interface AccountSource {
  derive(index: number): Account;
  deriveRange(start: number, count: number): Iterable<Account>;
}

export interface SignerProvider {
  /** Run `use` with a signer scoped to `account`; key material does not outlive the call */
  withSigner<T>(account: Account, use: (signer: TransactionSigner) => Promise<T>): Promise<T>;
}
