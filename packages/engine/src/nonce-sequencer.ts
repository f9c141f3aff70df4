/**
 * Nonce Sequencer: serialized nonce allocation for one sending account.
 *
 * Owns the authoritative next-nonce counter for its account. A lease is
 * held exclusively from reserve() until commit() or release(); further
 * reserve() calls queue behind it, so reservation plus submission forms
 * the account's critical section.
 *
 * Rules:
 * - The counter is read from the chain on first use and after a resync request
 * - commit() advances past the leased value; release() makes it reusable
 * - Double commit and release-after-commit are warnings, not failures
 */

import type { Logger } from "pino";
import type { Account, Address, NonceLease, NonceLeaseState } from "@hd-funder/types";
import type { ChainClient } from "@hd-funder/chain-client";
import { Mutex } from "./concurrency.js";

export type NonceSource = Pick<ChainClient, "getNonce">;

export interface ReleaseOptions {
  /** Re-read the nonce from the chain before the next lease */
  readonly resync?: boolean;
}

interface ActiveLease {
  readonly lease: NonceLease;
  readonly unlock: () => void;
}

export class NonceSequencer {
  readonly address: Address;
  private readonly source: NonceSource;
  private readonly logger: Logger;
  private readonly mutex = new Mutex();
  private readonly settled: Map<number, NonceLeaseState> = new Map();
  private next: number | null = null;
  private highestCommitted = -1;
  private stale = true;
  private active: ActiveLease | null = null;
  private leaseSeq = 0;

  constructor(address: Address, source: NonceSource, logger: Logger) {
    this.address = address;
    this.source = source;
    this.logger = logger.child({ component: "nonce-sequencer", address });
  }

  /**
   * Wait for exclusive access and lease the next nonce.
   * Throws if the chain read needed to (re)initialize the counter fails;
   * no lease is held in that case.
   */
  async reserve(): Promise<NonceLease> {
    const unlock = await this.mutex.acquire();
    let value: number;
    try {
      value = await this.currentValue();
    } catch (err: unknown) {
      unlock();
      throw err;
    }

    const lease: NonceLease = {
      id: ++this.leaseSeq,
      account: this.address,
      value,
      state: "reserved",
    };
    this.active = { lease, unlock };
    return lease;
  }

  /** The chain accepted a transaction with this lease's nonce. */
  commit(lease: NonceLease): NonceLease {
    if (!this.isActive(lease)) {
      this.logger.warn(
        { leaseId: lease.id, nonce: lease.value, state: this.stateOf(lease) },
        "commit on a lease that is not reserved; ignored",
      );
      return { ...lease, state: this.stateOf(lease) };
    }
    this.next = lease.value + 1;
    this.highestCommitted = Math.max(this.highestCommitted, lease.value);
    return this.settle(lease, "committed");
  }

  /** The submission failed; the nonce was not consumed. */
  release(lease: NonceLease, options: ReleaseOptions = {}): NonceLease {
    if (!this.isActive(lease)) {
      this.logger.warn(
        { leaseId: lease.id, nonce: lease.value, state: this.stateOf(lease) },
        "release on a lease that is not reserved; ignored",
      );
      return { ...lease, state: this.stateOf(lease) };
    }
    if (options.resync) {
      this.stale = true;
    }
    return this.settle(lease, "released");
  }

  /** Current state of a lease issued by this sequencer. */
  stateOf(lease: NonceLease): NonceLeaseState {
    if (this.active?.lease.id === lease.id) return "reserved";
    return this.settled.get(lease.id) ?? lease.state;
  }

  /** True while a lease is reserved or reservations are queued */
  get busy(): boolean {
    return this.mutex.locked;
  }

  private async currentValue(): Promise<number> {
    if (this.next !== null && !this.stale) {
      return this.next;
    }
    const chainNonce = await this.source.getNonce(this.address);
    if (chainNonce <= this.highestCommitted) {
      this.logger.warn(
        { chainNonce, highestCommitted: this.highestCommitted },
        "chain nonce is behind committed transactions",
      );
    }
    this.logger.debug({ previous: this.next, chainNonce }, "nonce synchronized from chain");
    this.next = chainNonce;
    this.stale = false;
    return chainNonce;
  }

  private isActive(lease: NonceLease): boolean {
    return this.active !== null && this.active.lease.id === lease.id;
  }

  private settle(lease: NonceLease, state: "committed" | "released"): NonceLease {
    const active = this.active;
    this.active = null;
    this.settled.set(lease.id, state);
    active?.unlock();
    return { ...lease, state };
  }
}

/**
 * One sequencer per sending account, created on first use.
 */
export class NonceSequencerPool {
  private readonly sequencers: Map<Address, NonceSequencer> = new Map();
  private readonly source: NonceSource;
  private readonly logger: Logger;

  constructor(source: NonceSource, logger: Logger) {
    this.source = source;
    this.logger = logger;
  }

  for(account: Account): NonceSequencer {
    let sequencer = this.sequencers.get(account.address);
    if (!sequencer) {
      sequencer = new NonceSequencer(account.address, this.source, this.logger);
      this.sequencers.set(account.address, sequencer);
    }
    return sequencer;
  }
}
