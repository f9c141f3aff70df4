/**
 * Shared test fixtures: accounts, policies, a silent logger, fake signers.
 */

import pino from "pino";
import type { Account, Address, FundingPolicy, TxHash } from "@hd-funder/types";
import type { SignedTransaction, TransactionSigner } from "@hd-funder/chain-client";
import type { AccountSource, SignerProvider } from "../../src/ports.js";

export const silentLogger = pino({ level: "silent" });

export interface LogLine {
  readonly level: number;
  readonly msg: string;
  readonly [field: string]: unknown;
}

/** A logger that records every line at `level` or above as parsed JSON. */
export function captureLogger(level = "info"): { logger: pino.Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino({ level }, {
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  });
  return { logger, lines };
}

export const noopSleep = async (_ms: number, _signal?: AbortSignal): Promise<void> => {};

export function addressOf(index: number): Address {
  return `0x${(index + 1).toString(16).padStart(40, "0")}`;
}

export function account(index: number): Account {
  return { index, address: addressOf(index), path: `m/44'/60'/${index}'/0/0` };
}

export function accounts(count: number): Account[] {
  return Array.from({ length: count }, (_, i) => account(i));
}

export function policy(overrides: Partial<FundingPolicy> = {}): FundingPolicy {
  return { threshold: 100n, target: 500n, reserve: 50n, rootIndex: 0, ...overrides };
}

export class FakeAccounts implements AccountSource {
  constructor(private readonly max: number) {}

  derive(index: number): Account {
    if (index < 0 || index >= this.max) {
      throw new Error(`index ${index} out of range`);
    }
    return account(index);
  }

  deriveRange(start: number, count: number): Iterable<Account> {
    return Array.from({ length: count }, (_, i) => this.derive(start + i));
  }
}

/**
 * Signs by fabricating a unique hash per signature. Counts open scopes so
 * tests can check that every signer was released.
 */
export class FakeSigners implements SignerProvider {
  open = 0;
  signed: SignedTransaction[] = [];
  private seq = 0;
  private readonly failing = new Map<number, Error>();

  failFor(index: number, error: Error): void {
    this.failing.set(index, error);
  }

  async withSigner<T>(acct: Account, use: (signer: TransactionSigner) => Promise<T>): Promise<T> {
    const failure = this.failing.get(acct.index);
    if (failure) throw failure;

    this.open++;
    try {
      return await use({
        address: acct.address,
        signTransfer: async (request) => {
          const tx: SignedTransaction = {
            from: acct.address,
            to: request.to,
            value: request.value,
            nonce: request.nonce,
            hash: fakeHash(++this.seq),
            serialized: `0x02${this.seq.toString(16)}`,
          };
          this.signed.push(tx);
          return tx;
        },
      });
    } finally {
      this.open--;
    }
  }
}

export function fakeHash(n: number): TxHash {
  return `0x${n.toString(16).padStart(64, "0")}`;
}
