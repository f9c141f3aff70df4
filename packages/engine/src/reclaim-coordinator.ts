/**
 * Reclaim Coordinator: sweep balances above reserve back to the root.
 *
 * Planning is pure. Execution quotes one fee for the sweep, nets it out
 * of each amount and pins it on every send, so a source ends at or above
 * its reserve. Sources too poor to pay the fee are skipped and reported.
 */

import type { Logger } from "pino";
import type {
  Account,
  BalanceSnapshot,
  FundingPolicy,
  PendingAction,
  TransactionRecord,
} from "@hd-funder/types";
import type { ChainClient, FeeQuote } from "@hd-funder/chain-client";
import { ActionFactory } from "./actions.js";
import { classifySubmissionError, FatalSubmissionError } from "./errors.js";
import type { BatchReport, TransactionSubmitter } from "./transaction-submitter.js";

export interface SkippedReclaim {
  readonly action: PendingAction;
  readonly fee: bigint;
}

export interface ReclaimReport extends BatchReport {
  /** Sources whose surplus does not cover the transfer fee */
  readonly skipped: readonly SkippedReclaim[];
  /** Fee quoted for the sweep, when the quote succeeded */
  readonly fee?: FeeQuote;
}

export class ReclaimCoordinator {
  readonly root: Account;
  private readonly submitter: TransactionSubmitter;
  private readonly client: Pick<ChainClient, "estimateFee">;
  private readonly logger: Logger;
  private readonly actions: ActionFactory;

  constructor(
    root: Account,
    submitter: TransactionSubmitter,
    client: Pick<ChainClient, "estimateFee">,
    logger: Logger,
    actions: ActionFactory = new ActionFactory(),
  ) {
    this.root = root;
    this.submitter = submitter;
    this.client = client;
    this.logger = logger.child({ component: "reclaim-coordinator" });
    this.actions = actions;
  }

  /**
   * One reclaim per non-root account holding more than the reserve:
   * amount = balance - reserve, destination = root. Unknown snapshots
   * are skipped; sweeping a guessed balance could cut into the reserve.
   */
  planReclaim(snapshots: readonly BalanceSnapshot[], policy: FundingPolicy): PendingAction[] {
    return [...snapshots]
      .sort((a, b) => a.account.index - b.account.index)
      .flatMap((snapshot) => {
        if (snapshot.account.index === this.root.index || snapshot.account.index === policy.rootIndex) {
          return [];
        }
        if (snapshot.status !== "known" || snapshot.balance <= policy.reserve) {
          return [];
        }
        return [
          this.actions.create("reclaim", snapshot.account, this.root, snapshot.balance - policy.reserve),
        ];
      });
  }

  /**
   * Send every reclaim whose amount exceeds the fee, value = amount - fee.
   * Distinct sources run concurrently.
   */
  async execute(actions: readonly PendingAction[], signal?: AbortSignal): Promise<ReclaimReport> {
    if (actions.length === 0) {
      return { records: [], notAttempted: [], skipped: [] };
    }

    let fee: FeeQuote;
    try {
      fee = await this.client.estimateFee();
    } catch (err: unknown) {
      const failure = classifySubmissionError(err);
      this.logger.warn({ code: failure.code, err: failure.message }, "fee quote failed; reclaim deferred");
      const records = actions.map((action): TransactionRecord => ({
        action,
        status: {
          state: "failed",
          failure: failure instanceof FatalSubmissionError ? "fatal" : "retryable",
          code: failure.code,
          message: failure.message,
        },
      }));
      return failure instanceof FatalSubmissionError
        ? { records, notAttempted: [], skipped: [], fatal: failure }
        : { records, notAttempted: [], skipped: [] };
    }

    const skipped: SkippedReclaim[] = [];
    const sendable: PendingAction[] = [];
    for (const action of actions) {
      if (action.amount <= fee.total) {
        skipped.push({ action, fee: fee.total });
        this.logger.info(
          {
            accountIndex: action.source.index,
            amount: action.amount.toString(),
            fee: fee.total.toString(),
          },
          "reclaim skipped: surplus does not cover the fee",
        );
        continue;
      }
      sendable.push({ ...action, amount: action.amount - fee.total });
    }

    const batch = await this.submitter.submitBatch(sendable, signal ? { fee, signal } : { fee });
    return { ...batch, skipped, fee };
  }
}
