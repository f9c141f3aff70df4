/**
 * Funding Planner: threshold-driven top-up decisions.
 *
 * Pure: turns snapshots and a policy into fund actions from the root.
 *
 * Rules:
 * - The root is never a destination
 * - balance >= threshold: no action
 * - balance < threshold: amount = target - balance, never negative, never zero
 * - Unknown snapshots count as below threshold, valued at their last known balance (or zero)
 * - Actions are emitted in ascending account index order
 */

import type {
  Account,
  BalanceSnapshot,
  FundingPolicy,
  PendingAction,
} from "@hd-funder/types";
import { ActionFactory } from "./actions.js";

export class FundingPlanner {
  readonly root: Account;
  private readonly actions: ActionFactory;

  constructor(root: Account, actions: ActionFactory = new ActionFactory()) {
    this.root = root;
    this.actions = actions;
  }

  /**
   * Plan top-ups for every account below threshold.
   *
   * @param inFlight - Amounts already sent but not yet confirmed, by destination index.
   *   Counted toward the balance so an unconfirmed top-up is not repeated.
   */
  plan(
    snapshots: readonly BalanceSnapshot[],
    policy: FundingPolicy,
    inFlight: ReadonlyMap<number, bigint> = new Map(),
  ): PendingAction[] {
    this.assertRoot(policy);
    const planned: PendingAction[] = [];

    for (const snapshot of byIndex(snapshots)) {
      if (snapshot.account.index === this.root.index) continue;

      const pending = inFlight.get(snapshot.account.index) ?? 0n;
      const balance =
        snapshot.status === "known"
          ? snapshot.balance
          : snapshot.lastKnownBalance ?? 0n;
      const effective = balance + pending;

      if (snapshot.status === "known" && effective >= policy.threshold) continue;

      const amount = clampToZero(policy.target - effective);
      if (amount === 0n) continue;

      planned.push(this.actions.create("fund", this.root, snapshot.account, amount));
    }

    return planned;
  }

  /**
   * Plan a full distribution: every non-root account receives `target`,
   * regardless of its current balance.
   */
  planInitial(accounts: Iterable<Account>, policy: FundingPolicy): PendingAction[] {
    this.assertRoot(policy);
    if (policy.target === 0n) return [];

    return [...accounts]
      .filter((account) => account.index !== this.root.index)
      .sort((a, b) => a.index - b.index)
      .map((account) => this.actions.create("fund", this.root, account, policy.target));
  }

  private assertRoot(policy: FundingPolicy): void {
    if (policy.rootIndex !== this.root.index) {
      throw new Error(
        `FundingPlanner: policy root index ${policy.rootIndex} does not match root account ${this.root.index}`,
      );
    }
  }
}

function byIndex(snapshots: readonly BalanceSnapshot[]): BalanceSnapshot[] {
  return [...snapshots].sort((a, b) => a.account.index - b.account.index);
}

function clampToZero(value: bigint): bigint {
  return value > 0n ? value : 0n;
}
