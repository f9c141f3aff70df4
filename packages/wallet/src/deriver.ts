/**
 * Account Deriver: deterministic accounts from one master seed.
 *
 * Turns a BIP-39 mnemonic and a path template into a sequence of
 * accounts. Addresses come from derived public keys; private keys are
 * only materialized inside `withSigner` and wiped when it returns.
 *
 * Rules:
 * - derive(index) is a pure function of (seed, template, index)
 * - The seed never leaves this class
 * - index must lie in [0, maxAccounts) and below 2^31
 */

import { mnemonicToSeedSync, validateMnemonic } from "@scure/bip39";
import { wordlist } from "@scure/bip39/wordlists/english";
import { secp256k1 } from "@noble/curves/secp256k1";
import { HDKey, publicKeyToAddress } from "viem/accounts";
import type { Account } from "@hd-funder/types";
import type { TransactionSigner } from "@hd-funder/chain-client";
import { DerivationError } from "./errors.js";
import {
  DEFAULT_PATH_TEMPLATE,
  HARDENED_OFFSET,
  parsePathTemplate,
  type PathTemplate,
} from "./derivation-path.js";
import { createTransferSigner } from "./signer.js";

export interface AccountDeriverConfig {
  /** BIP-39 English mnemonic */
  readonly mnemonic: string;

  /** Path template with one {index} placeholder. Default: m/44'/60'/{index}'/0/0 */
  readonly pathTemplate?: string;

  /** Exclusive upper bound on derivable indices */
  readonly maxAccounts: number;

  /** Numeric chain id the signers bind transactions to */
  readonly chainId: number;
}

export class AccountDeriver {
  readonly maxAccounts: number;
  private readonly master: HDKey;
  private readonly path: PathTemplate;
  private readonly chainId: number;
  private readonly cache: Map<number, Account> = new Map();

  constructor(config: AccountDeriverConfig) {
    const mnemonic = config.mnemonic.trim().split(/\s+/).join(" ");
    if (!validateMnemonic(mnemonic, wordlist)) {
      throw new DerivationError("INVALID_MNEMONIC", "Mnemonic is not a valid BIP-39 English phrase");
    }
    if (!Number.isInteger(config.maxAccounts) || config.maxAccounts < 1) {
      throw new DerivationError(
        "INDEX_OUT_OF_RANGE",
        `maxAccounts must be a positive integer, got ${config.maxAccounts}`,
      );
    }

    this.path = parsePathTemplate(config.pathTemplate ?? DEFAULT_PATH_TEMPLATE);
    this.master = HDKey.fromMasterSeed(mnemonicToSeedSync(mnemonic));
    this.maxAccounts = config.maxAccounts;
    this.chainId = config.chainId;
  }

  get pathTemplate(): string {
    return this.path.template;
  }

  /**
   * Derive the account at `index`.
   *
   * @throws DerivationError INDEX_OUT_OF_RANGE
   */
  derive(index: number): Account {
    this.assertIndex(index);
    const cached = this.cache.get(index);
    if (cached) return cached;

    const path = this.path.resolve(index);
    const publicKey = this.master.derive(path).publicKey;
    if (!publicKey) {
      throw new DerivationError("MALFORMED_PATH", `No public key at path '${path}'`);
    }

    const uncompressed = secp256k1.ProjectivePoint.fromHex(publicKey).toHex(false);
    const account: Account = Object.freeze({
      index,
      address: publicKeyToAddress(`0x${uncompressed}`),
      path,
    });
    this.cache.set(index, account);
    return account;
  }

  /**
   * Lazily derive `count` accounts starting at `start`.
   * The returned iterable can be iterated any number of times.
   *
   * @throws DerivationError INDEX_OUT_OF_RANGE when the range leaves [0, maxAccounts)
   */
  deriveRange(start: number, count: number): Iterable<Account> {
    if (!Number.isInteger(count) || count < 0) {
      throw new DerivationError("INDEX_OUT_OF_RANGE", `Invalid account count ${count}`);
    }
    if (count > 0) {
      this.assertIndex(start);
      this.assertIndex(start + count - 1);
    }

    return {
      [Symbol.iterator]: () => this.iterate(start, count),
    };
  }

  /**
   * Run `use` with a signer for `account`. The derived private key is
   * wiped once `use` settles, whether it resolves or throws.
   */
  async withSigner<T>(
    account: Account,
    use: (signer: TransactionSigner) => Promise<T>,
  ): Promise<T> {
    const expected = this.derive(account.index);
    if (expected.address !== account.address) {
      throw new DerivationError(
        "INDEX_OUT_OF_RANGE",
        `Account ${account.index} was not derived from this seed`,
      );
    }

    const key = this.master.derive(expected.path);
    try {
      if (!key.privateKey) {
        throw new DerivationError("MALFORMED_PATH", `No private key at path '${expected.path}'`);
      }
      return await use(createTransferSigner(key.privateKey, this.chainId));
    } finally {
      key.wipePrivateData();
    }
  }

  private *iterate(start: number, count: number): Generator<Account> {
    for (let i = start; i < start + count; i++) {
      yield this.derive(i);
    }
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.maxAccounts || index >= HARDENED_OFFSET) {
      throw new DerivationError(
        "INDEX_OUT_OF_RANGE",
        `Account index ${index} is outside [0, ${Math.min(this.maxAccounts, HARDENED_OFFSET)})`,
      );
    }
  }
}
