/**
 * Transaction Submitter: planned actions to confirmed transfers.
 *
 * Two phases per action:
 *
 * 1. Send: inside the source account's critical section, lease a nonce,
 *    sign through the scoped signer, relay. Retried with backoff while the
 *    failure is retryable.
 * 2. Confirm: poll the chain by hash with exponential backoff until the
 *    transaction is confirmed, reverted, or the polling budget runs out.
 *
 * Rules:
 * - At most one outstanding transaction per action key (reason + route)
 * - An ambiguous send is looked up by hash before anything is resent
 * - Nonce mismatches release the lease with a resync request
 * - An unconfirmed transaction stays outstanding until a lookup settles it, never blindly resent
 * - A fund action never spends what the root cannot cover, in-flight debits included
 */

import type { Logger } from "pino";
import type {
  Account,
  PendingAction,
  TransactionRecord,
  TxHash,
} from "@hd-funder/types";
import {
  isChainClientError,
  type ChainClient,
  type ChainClientErrorCode,
  type FeeQuote,
  type SignedTransaction,
} from "@hd-funder/chain-client";
import { actionKey } from "./actions.js";
import {
  ConfirmationTimeoutError,
  FatalSubmissionError,
  classifySubmissionError,
  isRetryableSubmissionError,
  type SubmissionError,
} from "./errors.js";
import type { NonceSequencerPool } from "./nonce-sequencer.js";
import type { SignerProvider } from "./ports.js";
import {
  DEFAULT_CONFIRM_CONFIG,
  DEFAULT_RETRY_CONFIG,
  computeDelay,
  sleep,
  withRetry,
  type RetryConfig,
  type SleepFn,
} from "./retry.js";

// =============================================================================
// Types
// =============================================================================

export interface TransactionSubmitterDeps {
  readonly client: ChainClient;
  readonly signers: SignerProvider;
  readonly nonces: NonceSequencerPool;
  readonly logger: Logger;
}

export interface TransactionSubmitterOptions {
  /** Send attempts. Default: 3 attempts, base 1s, cap 30s, 200ms jitter */
  readonly retry?: RetryConfig;
  /** Confirmation polls. Default: 5 polls, base 1s doubling */
  readonly confirm?: RetryConfig;
  readonly sleepFn?: SleepFn;
}

export interface SendOptions {
  /** Use this fee instead of quoting one */
  readonly fee?: FeeQuote;
  /** Stops retries and further sends; never interrupts a send in progress */
  readonly signal?: AbortSignal;
}

export interface BatchReport {
  /** One record per attempted action, in input order */
  readonly records: readonly TransactionRecord[];
  /** Actions never sent: the batch halted on a Fatal failure or was cancelled */
  readonly notAttempted: readonly PendingAction[];
  /** First Fatal failure, if any */
  readonly fatal?: FatalSubmissionError;
}

interface Dispatched {
  readonly record: TransactionRecord;
  readonly failure?: SubmissionError;
}

interface SendResult {
  readonly signed: SignedTransaction;
  readonly txHash: TxHash;
}

/** Codes after which the transaction may have reached the chain anyway. */
const AMBIGUOUS_CODES: ReadonlySet<ChainClientErrorCode> = new Set([
  "TIMEOUT",
  "NETWORK",
  "NONCE_TOO_LOW",
  "ALREADY_KNOWN",
]);

const NONCE_CODES: ReadonlySet<ChainClientErrorCode> = new Set([
  "NONCE_TOO_LOW",
  "NONCE_TOO_HIGH",
]);

// =============================================================================
// Transaction Submitter
// =============================================================================

export class TransactionSubmitter {
  private readonly client: ChainClient;
  private readonly signers: SignerProvider;
  private readonly nonces: NonceSequencerPool;
  private readonly logger: Logger;
  private readonly retry: RetryConfig;
  private readonly confirmPolicy: RetryConfig;
  private readonly sleepFn: SleepFn;

  /** Submitted, or timed out and therefore indeterminate, by action key */
  private readonly outstanding: Map<string, TransactionRecord> = new Map();

  constructor(deps: TransactionSubmitterDeps, options: TransactionSubmitterOptions = {}) {
    this.client = deps.client;
    this.signers = deps.signers;
    this.nonces = deps.nonces;
    this.logger = deps.logger.child({ component: "transaction-submitter" });
    this.retry = options.retry ?? DEFAULT_RETRY_CONFIG;
    this.confirmPolicy = options.confirm ?? DEFAULT_CONFIRM_CONFIG;
    this.sleepFn = options.sleepFn ?? sleep;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Public API
  // ───────────────────────────────────────────────────────────────────────

  /** Send one action and wait for a terminal outcome. */
  async submit(action: PendingAction, options: SendOptions = {}): Promise<TransactionRecord> {
    const sent = await this.send(action, options);
    return sent.status.state === "submitted" ? this.confirm(sent) : sent;
  }

  /**
   * Send phase only. Resolves with a Submitted record once the chain
   * accepted the transaction, or a Failed record. Never throws for
   * chain failures.
   */
  async send(action: PendingAction, options: SendOptions = {}): Promise<TransactionRecord> {
    return (await this.dispatch(action, options)).record;
  }

  /**
   * Poll for a terminal outcome of a Submitted record. On timeout the
   * transaction stays outstanding until `reconcile` or the next send for
   * the same key settles it.
   */
  async confirm(record: TransactionRecord): Promise<TransactionRecord> {
    const txHash = record.txHash;
    if (record.status.state !== "submitted" || txHash === undefined) {
      return record;
    }

    const key = actionKey(record.action);
    const log = this.logger.child({ actionId: record.action.id, txHash });
    const attempts = this.confirmPolicy.maxAttempts;

    for (let attempt = 0; attempt < attempts; attempt++) {
      const status = await this.lookup(txHash);

      if (status === "confirmed") {
        this.outstanding.delete(key);
        log.info({ amount: record.action.amount.toString() }, "transaction confirmed");
        return { ...record, status: { state: "confirmed" } };
      }
      if (status === "failed") {
        this.outstanding.delete(key);
        log.error({ accountIndex: record.action.destination.index }, "transaction reverted");
        return {
          ...record,
          status: {
            state: "failed",
            failure: "reverted",
            code: "REVERTED",
            message: `Transaction ${txHash} reverted`,
          },
        };
      }

      if (attempt < attempts - 1) {
        await this.sleepFn(computeDelay(attempt, this.confirmPolicy));
      }
    }

    const timeout = new ConfirmationTimeoutError(record.action, txHash, attempts);
    log.warn({ attempts }, timeout.message);
    return {
      ...record,
      status: {
        state: "failed",
        failure: "timeout",
        code: "CONFIRMATION_TIMEOUT",
        message: timeout.message,
      },
    };
  }

  /**
   * Send every action, then confirm every accepted transaction.
   *
   * Actions from one source go out one at a time in input order; distinct
   * sources proceed concurrently. A Fatal failure stops further sends from
   * every source, but transactions already accepted are still confirmed.
   */
  async submitBatch(actions: readonly PendingAction[], options: SendOptions = {}): Promise<BatchReport> {
    const bySource = new Map<number, PendingAction[]>();
    for (const action of actions) {
      const group = bySource.get(action.source.index) ?? [];
      group.push(action);
      bySource.set(action.source.index, group);
    }

    const sent = new Map<string, TransactionRecord>();
    const notAttempted = new Set<string>();
    const halt: { fatal?: FatalSubmissionError } = {};

    await Promise.all(
      [...bySource.values()].map(async (group) => {
        for (const action of group) {
          if (halt.fatal !== undefined || options.signal?.aborted) {
            notAttempted.add(action.id);
            continue;
          }
          const { record, failure } = await this.dispatch(action, options);
          sent.set(action.id, record);
          if (failure instanceof FatalSubmissionError && halt.fatal === undefined) {
            halt.fatal = failure;
          }
        }
      }),
    );

    // A deduplicated send hands back the outstanding record; poll each hash once
    const polling = new Map<TxHash, Promise<TransactionRecord>>();
    const confirmed = await Promise.all(
      [...sent.entries()].map(async ([id, record]) => {
        const txHash = record.txHash;
        if (txHash === undefined || record.status.state !== "submitted") {
          return [id, record] as const;
        }
        let pending = polling.get(txHash);
        if (!pending) {
          pending = this.confirm(record);
          polling.set(txHash, pending);
        }
        return [id, await pending] as const;
      }),
    );
    const final = new Map(confirmed);

    const records: TransactionRecord[] = [];
    const skipped: PendingAction[] = [];
    for (const action of actions) {
      const record = final.get(action.id);
      if (record) {
        records.push(record);
      } else if (notAttempted.has(action.id)) {
        skipped.push(action);
      }
    }

    if (skipped.length > 0) {
      this.logger.warn(
        { count: skipped.length, halted: halt.fatal !== undefined, cancelled: options.signal?.aborted ?? false },
        "actions not attempted",
      );
    }

    return halt.fatal !== undefined
      ? { records, notAttempted: skipped, fatal: halt.fatal }
      : { records, notAttempted: skipped };
  }

  /**
   * Look up every outstanding transaction and drop the ones that reached
   * the chain's verdict or vanished. Returns the records it resolved;
   * transactions still pending, or whose lookup failed, stay outstanding.
   */
  async reconcile(): Promise<TransactionRecord[]> {
    const resolved: TransactionRecord[] = [];
    for (const [key, record] of [...this.outstanding]) {
      const txHash = record.txHash;
      if (txHash === undefined) {
        this.outstanding.delete(key);
        continue;
      }

      const status = await this.lookup(txHash);
      if (status === "pending" || status === "unknown") continue;

      this.outstanding.delete(key);
      const log = this.logger.child({ actionId: record.action.id, txHash });
      switch (status) {
        case "confirmed":
          log.info({ amount: record.action.amount.toString() }, "outstanding transaction confirmed");
          resolved.push({ ...record, status: { state: "confirmed" } });
          break;
        case "failed":
          log.warn({ accountIndex: record.action.destination.index }, "outstanding transaction reverted");
          resolved.push({
            ...record,
            status: {
              state: "failed",
              failure: "reverted",
              code: "REVERTED",
              message: `Transaction ${txHash} reverted`,
            },
          });
          break;
        case "not-found":
          log.warn({ accountIndex: record.action.destination.index }, "outstanding transaction dropped");
          resolved.push({
            ...record,
            status: {
              state: "failed",
              failure: "retryable",
              code: "DROPPED",
              message: `Transaction ${txHash} is no longer known to the chain`,
            },
          });
          break;
      }
    }
    return resolved;
  }

  /** Amounts sent but not yet confirmed, by destination index. */
  inFlightByDestination(): Map<number, bigint> {
    const totals = new Map<number, bigint>();
    for (const record of this.outstanding.values()) {
      const index = record.action.destination.index;
      totals.set(index, (totals.get(index) ?? 0n) + record.action.amount);
    }
    return totals;
  }

  /** Outstanding records: submitted, or timed out and not yet resolved. */
  inFlight(): TransactionRecord[] {
    return [...this.outstanding.values()];
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  private async dispatch(action: PendingAction, options: SendOptions): Promise<Dispatched> {
    const key = actionKey(action);
    const existing = this.outstanding.get(key);
    if (existing) {
      const settled = await this.recheck(key, existing);
      if (settled) return { record: settled };
    }

    const log = this.logger.child({
      actionId: action.id,
      accountIndex: action.destination.index,
      sourceIndex: action.source.index,
    });

    try {
      const fee = options.fee ?? (await this.client.estimateFee());
      if (action.reason === "fund") {
        await this.preflight(action, fee);
      }

      const result = await withRetry(() => this.attempt(action, fee), this.retry, {
        shouldRetry: (err) => isRetryableSubmissionError(err, action.reason),
        sleepFn: this.sleepFn,
        signal: options.signal,
        onRetry: (err, attempt, delayMs) => {
          log.warn(
            { attempt, delayMs, err: classifySubmissionError(err, action.reason).message },
            "send failed; retrying",
          );
        },
      });

      const record: TransactionRecord = {
        action,
        nonce: result.signed.nonce,
        txHash: result.txHash,
        debit: action.amount + fee.total,
        status: { state: "submitted" },
      };
      this.outstanding.set(key, record);
      log.info(
        { txHash: result.txHash, nonce: result.signed.nonce, amount: action.amount.toString() },
        "transaction submitted",
      );
      return { record };
    } catch (err: unknown) {
      const failure = classifySubmissionError(err, action.reason);
      return { record: this.failed(action, failure, log), failure };
    }
  }

  /**
   * One send attempt inside the source's critical section.
   */
  private async attempt(action: PendingAction, fee: FeeQuote): Promise<SendResult> {
    const sequencer = this.nonces.for(action.source);
    const lease = await sequencer.reserve();
    let signed: SignedTransaction | undefined;

    try {
      const tx = await this.signers.withSigner(action.source, (signer) =>
        signer.signTransfer({
          to: action.destination.address,
          value: action.amount,
          nonce: lease.value,
          fee,
        }),
      );
      signed = tx;
      const txHash = await this.client.submitTransaction(tx);
      sequencer.commit(lease);
      return { signed: tx, txHash };
    } catch (err: unknown) {
      if (signed !== undefined && isChainClientError(err) && AMBIGUOUS_CODES.has(err.code)) {
        const status = await this.lookup(signed.hash);
        if (status === "pending" || status === "confirmed" || status === "failed") {
          this.logger.info(
            { actionId: action.id, txHash: signed.hash, code: err.code },
            "send reported an error but the transaction is known to the chain",
          );
          sequencer.commit(lease);
          return { signed, txHash: signed.hash };
        }
      }
      const resync = isChainClientError(err) && NONCE_CODES.has(err.code);
      sequencer.release(lease, { resync });
      throw err;
    }
  }

  /**
   * Fund pre-flight: the root's fresh balance, less the debits of its
   * own outstanding transactions, must cover amount + fee.
   */
  private async preflight(action: PendingAction, fee: FeeQuote): Promise<void> {
    const balance = await this.client.getBalance(action.source.address);
    const committed = this.outstandingDebit(action.source);
    const available = balance - committed;
    const required = action.amount + fee.total;

    if (available < required) {
      throw new FatalSubmissionError(
        "INSUFFICIENT_ROOT_FUNDS",
        `Root account ${action.source.index} cannot cover ${required} wei ` +
          `(balance ${balance}, in flight ${committed})`,
      );
    }
  }

  private outstandingDebit(source: Account): bigint {
    let total = 0n;
    for (const record of this.outstanding.values()) {
      if (record.action.source.index === source.index) {
        total += record.debit ?? record.action.amount;
      }
    }
    return total;
  }

  /**
   * Resolve an outstanding record before sending the same route again.
   * Returns the record to report when nothing should be sent.
   */
  private async recheck(key: string, existing: TransactionRecord): Promise<TransactionRecord | undefined> {
    const txHash = existing.txHash;
    if (txHash === undefined) {
      this.outstanding.delete(key);
      return undefined;
    }

    const status = await this.lookup(txHash);
    switch (status) {
      case "pending":
      case "unknown":
        this.logger.info({ key, txHash, status }, "transaction still outstanding; not resending");
        return existing;
      case "confirmed":
        this.outstanding.delete(key);
        this.logger.info({ key, txHash }, "outstanding transaction confirmed; dropping stale action");
        return { ...existing, status: { state: "confirmed" } };
      case "failed":
      case "not-found":
        this.outstanding.delete(key);
        this.logger.warn({ key, txHash, status }, "outstanding transaction did not land; resending");
        return undefined;
    }
  }

  /** Status by hash; a failed lookup reads as "unknown". */
  private async lookup(
    txHash: TxHash,
  ): Promise<"pending" | "confirmed" | "failed" | "not-found" | "unknown"> {
    try {
      return await this.client.getTransactionStatus(txHash);
    } catch (err: unknown) {
      this.logger.debug(
        { txHash, err: err instanceof Error ? err.message : String(err) },
        "status lookup failed",
      );
      return "unknown";
    }
  }

  private failed(action: PendingAction, failure: SubmissionError, log: Logger): TransactionRecord {
    const fatal = failure instanceof FatalSubmissionError;
    log[fatal ? "error" : "warn"](
      { code: failure.code, amount: action.amount.toString() },
      fatal ? `fatal: ${failure.message}` : `send failed: ${failure.message}`,
    );
    return {
      action,
      status: {
        state: "failed",
        failure: fatal ? "fatal" : "retryable",
        code: failure.code,
        message: failure.message,
      },
    };
  }
}
