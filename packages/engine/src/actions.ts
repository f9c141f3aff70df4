/**
 * Action identity.
 *
 * Every planned action gets a unique id; the key identifies the transfer
 * route and is what deduplication of in-flight transactions runs on.
 */

import type { Account, ActionReason, PendingAction } from "@hd-funder/types";

/** "fund:0->3" */
export function actionKey(action: Pick<PendingAction, "reason" | "source" | "destination">): string {
  return `${action.reason}:${action.source.index}->${action.destination.index}`;
}

/**
 * Issues actions with ids of the form "<key>#<n>", n increasing per factory.
 */
export class ActionFactory {
  private seq = 0;

  create(reason: ActionReason, source: Account, destination: Account, amount: bigint): PendingAction {
    const key = actionKey({ reason, source, destination });
    return Object.freeze({
      id: `${key}#${++this.seq}`,
      reason,
      source,
      destination,
      amount,
    });
  }
}
