/**
 * Balance Observer: concurrent balance reads across accounts.
 *
 * Produces one snapshot per account per poll. A failed read never aborts
 * the batch; it yields an Unknown snapshot carrying the last balance that
 * was read successfully, and the account is read again next cycle.
 *
 * Rules:
 * - Read-only: never mutates chain state
 * - Snapshots are fresh objects; a later poll supersedes, never mutates
 * - At most `concurrency` reads in flight
 */

import { performance } from "node:perf_hooks";
import type { Logger } from "pino";
import type {
  Account,
  BalanceSnapshot,
  FundingPolicy,
} from "@hd-funder/types";
import { isChainClientError, type ChainClient } from "@hd-funder/chain-client";
import { mapWithConcurrency } from "./concurrency.js";
import { ObservationError } from "./errors.js";
import {
  RetryExhaustedError,
  sleep,
  withRetry,
  type RetryConfig,
  type SleepFn,
} from "./retry.js";

export type BalanceSource = Pick<ChainClient, "getBalance">;

export interface BalanceObserverOptions {
  /** Parallel reads. Default: 4 */
  readonly concurrency?: number;
  /** Retries within one poll. Default: a single attempt */
  readonly retry?: RetryConfig;
  /** Monotonic clock in ms. Default: performance.now */
  readonly clock?: () => number;
  readonly sleepFn?: SleepFn;
}

export interface WatchOptions {
  readonly intervalMs: number;
  readonly signal?: AbortSignal;
  /** Awaited before every poll */
  readonly beforePoll?: () => Promise<void>;
}

const SINGLE_ATTEMPT: RetryConfig = {
  maxAttempts: 1,
  baseDelayMs: 0,
  maxDelayMs: 0,
  jitterMs: 0,
};

const TRANSIENT_READ_CODES = new Set(["TIMEOUT", "NETWORK"]);

function isTransientRead(err: unknown): boolean {
  return !isChainClientError(err) || TRANSIENT_READ_CODES.has(err.code);
}

export class BalanceObserver {
  private readonly client: BalanceSource;
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly retry: RetryConfig;
  private readonly clock: () => number;
  private readonly sleepFn: SleepFn;
  private readonly lastKnown: Map<number, bigint> = new Map();

  constructor(client: BalanceSource, logger: Logger, options: BalanceObserverOptions = {}) {
    this.client = client;
    this.logger = logger.child({ component: "balance-observer" });
    this.concurrency = options.concurrency ?? 4;
    this.retry = options.retry ?? SINGLE_ATTEMPT;
    this.clock = options.clock ?? (() => performance.now());
    this.sleepFn = options.sleepFn ?? sleep;
  }

  /**
   * Read every account's balance once. Snapshots come back in input order.
   */
  async poll(accounts: Iterable<Account>): Promise<BalanceSnapshot[]> {
    const list = [...accounts];
    const snapshots = await mapWithConcurrency(list, this.concurrency, (account) =>
      this.observe(account),
    );

    const unknown = snapshots.filter((s) => s.status === "unknown").length;
    this.logger.debug({ accounts: list.length, unknown }, "poll complete");
    return snapshots;
  }

  /**
   * Poll on a fixed interval until `signal` aborts. The interval sleep
   * starts once the consumer asks for the next batch.
   */
  async *watch(
    accounts: Iterable<Account>,
    options: WatchOptions,
  ): AsyncGenerator<BalanceSnapshot[], void, undefined> {
    const list = [...accounts];
    while (!options.signal?.aborted) {
      await options.beforePoll?.();
      yield await this.poll(list);
      if (options.signal?.aborted) break;
      await this.sleepFn(options.intervalMs, options.signal);
    }
  }

  /**
   * True iff the account needs a top-up. Unknown snapshots count as below.
   */
  belowThreshold(snapshot: BalanceSnapshot, policy: FundingPolicy): boolean {
    return snapshot.status === "unknown" || snapshot.balance < policy.threshold;
  }

  /** Balance from the most recent successful read of `index`. */
  lastKnownBalance(index: number): bigint | undefined {
    return this.lastKnown.get(index);
  }

  private async observe(account: Account): Promise<BalanceSnapshot> {
    try {
      const balance = await withRetry(
        () => this.client.getBalance(account.address),
        this.retry,
        { shouldRetry: isTransientRead, sleepFn: this.sleepFn },
      );
      this.lastKnown.set(account.index, balance);
      return { status: "known", account, balance, observedAt: this.clock() };
    } catch (err: unknown) {
      const cause = err instanceof RetryExhaustedError ? err.lastError : err;
      const error = new ObservationError(
        account.index,
        `Balance read failed for account ${account.index}: ${messageOf(cause)}`,
        { cause },
      );
      const lastKnownBalance = this.lastKnown.get(account.index);
      this.logger.warn(
        {
          accountIndex: account.index,
          err: error.message,
          lastKnownBalance: lastKnownBalance?.toString(),
        },
        "balance unknown",
      );
      return {
        status: "unknown",
        account,
        error: error.message,
        observedAt: this.clock(),
        ...(lastKnownBalance !== undefined ? { lastKnownBalance } : {}),
      };
    }
  }
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
