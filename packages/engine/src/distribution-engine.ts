/**
 * Distribution Engine: the three operating modes, plus a read-only status.
 *
 *   idle ──► init-dist | cont-fund | reclaim | status ──► done | fatal
 *
 * An engine runs exactly one mode. Any Fatal submission outcome moves the
 * run to "fatal" and stops further sends; transactions already accepted
 * are still confirmed.
 */

import type { Logger } from "pino";
import type {
  Account,
  BalanceSnapshot,
  FundingPolicy,
  PendingAction,
  TransactionRecord,
} from "@hd-funder/types";
import { isFundingPolicy } from "@hd-funder/types";
import type { ChainClient } from "@hd-funder/chain-client";
import { ActionFactory } from "./actions.js";
import { BalanceObserver } from "./balance-observer.js";
import { EngineStateError } from "./errors.js";
import { FundingPlanner } from "./funding-planner.js";
import { NonceSequencerPool } from "./nonce-sequencer.js";
import type { AccountSource, SignerProvider } from "./ports.js";
import { ReclaimCoordinator, type SkippedReclaim } from "./reclaim-coordinator.js";
import type { RetryConfig, SleepFn } from "./retry.js";
import { TransactionSubmitter, type BatchReport } from "./transaction-submitter.js";

// =============================================================================
// Types
// =============================================================================

export type EngineMode = "init-dist" | "cont-fund" | "reclaim" | "status";
export type EngineState = "idle" | EngineMode | "done" | "fatal";

const VALID_TRANSITIONS: Record<EngineState, readonly EngineState[]> = {
  idle: ["init-dist", "cont-fund", "reclaim", "status"],
  "init-dist": ["done", "fatal"],
  "cont-fund": ["done", "fatal"],
  reclaim: ["done", "fatal"],
  status: ["done", "fatal"],
  done: [],
  fatal: [],
};

export interface DistributionEngineConfig {
  readonly policy: FundingPolicy;
  /** Accounts managed, root included: indices [0, accountCount) */
  readonly accountCount: number;
  /** ContFund cycle interval. Default: 20000 */
  readonly pollIntervalMs?: number;
  /** Parallel balance reads. Default: 4 */
  readonly pollConcurrency?: number;
  readonly retry?: RetryConfig;
  readonly confirm?: RetryConfig;
  readonly sleepFn?: SleepFn;
  readonly clock?: () => number;
}

export interface DistributionEngineDeps {
  readonly accounts: AccountSource;
  readonly signers: SignerProvider;
  readonly client: ChainClient;
  readonly logger: Logger;
}

export interface CycleReport {
  readonly cycle: number;
  readonly planned: number;
  readonly confirmed: number;
  readonly failed: number;
  readonly notAttempted: number;
  readonly skipped: number;
  /** Earlier transactions whose outcome was settled before this cycle's poll */
  readonly settled: number;
  /** Sum of amounts confirmed this cycle */
  readonly fundsConfirmed: bigint;
  /** Sum of amounts sent and still unconfirmed at the end of the cycle */
  readonly fundsInFlight: bigint;
  readonly records: readonly TransactionRecord[];
}

export interface RunReport {
  readonly mode: EngineMode;
  readonly state: "done" | "fatal";
  readonly cycles: readonly CycleReport[];
}

export interface StatusReport {
  readonly state: "done" | "fatal";
  readonly snapshots: readonly BalanceSnapshot[];
}

// =============================================================================
// Engine
// =============================================================================

export class DistributionEngine {
  private current: EngineState = "idle";
  private readonly config: DistributionEngineConfig;
  private readonly accountSource: AccountSource;
  private readonly logger: Logger;
  private readonly root: Account;
  private readonly observer: BalanceObserver;
  private readonly planner: FundingPlanner;
  private readonly submitter: TransactionSubmitter;
  private readonly reclaimer: ReclaimCoordinator;

  constructor(deps: DistributionEngineDeps, config: DistributionEngineConfig) {
    if (!isFundingPolicy(config.policy)) {
      throw new Error("DistributionEngine: funding policy needs non-negative amounts and target >= threshold");
    }
    if (config.policy.rootIndex >= config.accountCount) {
      throw new Error(
        `DistributionEngine: root index ${config.policy.rootIndex} is outside ${config.accountCount} accounts`,
      );
    }
    this.config = config;
    this.accountSource = deps.accounts;
    this.logger = deps.logger.child({ component: "distribution-engine" });
    this.root = deps.accounts.derive(config.policy.rootIndex);

    const actions = new ActionFactory();
    this.observer = new BalanceObserver(deps.client, deps.logger, {
      concurrency: config.pollConcurrency ?? 4,
      ...(config.clock ? { clock: config.clock } : {}),
      ...(config.sleepFn ? { sleepFn: config.sleepFn } : {}),
    });
    this.planner = new FundingPlanner(this.root, actions);
    this.submitter = new TransactionSubmitter(
      {
        client: deps.client,
        signers: deps.signers,
        nonces: new NonceSequencerPool(deps.client, deps.logger),
        logger: deps.logger,
      },
      {
        ...(config.retry ? { retry: config.retry } : {}),
        ...(config.confirm ? { confirm: config.confirm } : {}),
        ...(config.sleepFn ? { sleepFn: config.sleepFn } : {}),
      },
    );
    this.reclaimer = new ReclaimCoordinator(this.root, this.submitter, deps.client, deps.logger, actions);
  }

  get state(): EngineState {
    return this.current;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Modes
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Fund every non-root account to target, regardless of its balance.
   */
  async initDist(signal?: AbortSignal): Promise<RunReport> {
    this.transition("init-dist");
    const accounts = this.accounts();
    const actions = this.planner.planInitial(accounts, this.config.policy);
    this.logger.info({ accounts: accounts.length, actions: actions.length }, "initial distribution");

    const batch = await this.submitter.submitBatch(actions, signal ? { signal } : {});
    await this.pollFailed(batch);
    const cycle = this.summarize(1, actions, batch, []);
    return this.finish("init-dist", [cycle], batch.fatal !== undefined);
  }

  /**
   * settle → poll → plan → submit → sleep, until `signal` aborts or a
   * Fatal outcome halts the run. Outstanding transactions are looked up
   * before each poll; whatever is still in flight counts toward balances.
   */
  async contFund(signal: AbortSignal): Promise<RunReport> {
    this.transition("cont-fund");
    const accounts = this.accounts();
    const policy = this.config.policy;
    const cycles: CycleReport[] = [];
    let settled: TransactionRecord[] = [];
    let fatal = false;

    for await (const snapshots of this.observer.watch(accounts, {
      intervalMs: this.config.pollIntervalMs ?? 20_000,
      signal,
      beforePoll: async () => {
        settled = await this.submitter.reconcile();
      },
    })) {
      const inFlight = this.submitter.inFlightByDestination();
      this.logger.debug(
        {
          cycle: cycles.length + 1,
          belowThreshold: snapshots.filter((s) => this.observer.belowThreshold(s, policy)).length,
          inFlight: inFlight.size,
          settled: settled.length,
        },
        "cycle polled",
      );
      const actions = this.planner.plan(snapshots, policy, inFlight);
      const batch = await this.submitter.submitBatch(actions, { signal });
      const cycle = this.summarize(cycles.length + 1, actions, batch, [], settled.length);
      cycles.push(cycle);

      if (batch.fatal !== undefined) {
        fatal = true;
        break;
      }
    }

    if (!fatal) {
      this.logger.info({ cycles: cycles.length }, "continuous funding stopped");
    }
    return this.finish("cont-fund", cycles, fatal);
  }

  /**
   * Sweep every non-root account down to its reserve.
   */
  async reclaim(signal?: AbortSignal): Promise<RunReport> {
    this.transition("reclaim");
    const snapshots = await this.observer.poll(this.accounts());
    const actions = this.reclaimer.planReclaim(snapshots, this.config.policy);
    this.logger.info({ actions: actions.length }, "reclaim planned");

    const report = await this.reclaimer.execute(actions, signal);
    const cycle = this.summarize(1, actions, report, report.skipped);
    return this.finish("reclaim", [cycle], report.fatal !== undefined);
  }

  /**
   * Read every account's balance. Sends nothing.
   */
  async status(): Promise<StatusReport> {
    this.transition("status");
    const snapshots = await this.observer.poll(this.accounts());
    this.transition("done");
    return { state: "done", snapshots };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  private accounts(): Account[] {
    return [...this.accountSource.deriveRange(0, this.config.accountCount)];
  }

  private transition(to: EngineState): void {
    if (!VALID_TRANSITIONS[this.current].includes(to)) {
      throw new EngineStateError(
        "INVALID_TRANSITION",
        `Cannot transition from "${this.current}" to "${to}"`,
      );
    }
    this.logger.debug({ from: this.current, to }, "state transition");
    this.current = to;
  }

  private finish(mode: EngineMode, cycles: CycleReport[], fatal: boolean): RunReport {
    const state = fatal ? "fatal" : "done";
    this.transition(state);
    return { mode, state, cycles };
  }

  /**
   * Poll the accounts behind failed records so the report carries a
   * last known balance.
   */
  private async pollFailed(batch: BatchReport): Promise<void> {
    const failed = batch.records
      .filter((r) => r.status.state === "failed")
      .map((r) => r.action.destination);
    if (failed.length > 0) {
      await this.observer.poll(failed);
    }
  }

  private summarize(
    cycle: number,
    actions: readonly PendingAction[],
    batch: BatchReport,
    skipped: readonly SkippedReclaim[],
    settled = 0,
  ): CycleReport {
    let confirmed = 0;
    let failed = 0;
    let fundsConfirmed = 0n;

    for (const record of batch.records) {
      if (record.status.state === "confirmed") {
        confirmed++;
        fundsConfirmed += record.action.amount;
        continue;
      }
      if (record.status.state !== "failed") continue;

      failed++;
      const index = accountIndexOf(record.action);
      const lastKnownBalance = this.observer.lastKnownBalance(index);
      const fields = {
        accountIndex: index,
        reason: record.action.reason,
        code: record.status.code,
        failure: record.status.failure,
        lastKnownBalance: lastKnownBalance?.toString() ?? "unknown",
      };
      if (record.status.failure === "fatal") {
        this.logger.error(fields, record.status.message);
      } else {
        this.logger.warn(fields, record.status.message);
      }
    }

    const fundsInFlight = this.submitter
      .inFlight()
      .reduce((sum, record) => sum + record.action.amount, 0n);

    const report: CycleReport = {
      cycle,
      planned: actions.length,
      confirmed,
      failed,
      notAttempted: batch.notAttempted.length,
      skipped: skipped.length,
      settled,
      fundsConfirmed,
      fundsInFlight,
      records: batch.records,
    };
    this.logger.info(
      {
        cycle,
        planned: report.planned,
        confirmed,
        failed,
        notAttempted: report.notAttempted,
        skipped: report.skipped,
        settled,
        fundsConfirmed: fundsConfirmed.toString(),
        fundsInFlight: fundsInFlight.toString(),
      },
      "cycle complete",
    );
    return report;
  }
}

/** The non-root side of an action: destination of a fund, source of a reclaim. */
function accountIndexOf(action: PendingAction): number {
  return action.reason === "fund" ? action.destination.index : action.source.index;
}
