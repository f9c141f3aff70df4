/**
 * Runs one engine mode and maps its outcome to a process exit code.
 */

import { formatEther } from "viem";
import type { Logger } from "pino";
import type { BalanceSnapshot } from "@hd-funder/types";
import type { DistributionEngine, EngineMode, RunReport } from "@hd-funder/engine";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

export type ModeRunner = Pick<DistributionEngine, "initDist" | "contFund" | "reclaim" | "status">;

export type Output = (line: string) => void;

export async function runMode(
  engine: ModeRunner,
  mode: EngineMode,
  signal: AbortSignal,
  out: Output,
  logger: Logger,
): Promise<number> {
  if (mode === "status") {
    const report = await engine.status();
    for (const snapshot of report.snapshots) {
      out(formatSnapshot(snapshot));
    }
    return report.state === "fatal" ? EXIT_FATAL : EXIT_OK;
  }

  const report = await runFunding(engine, mode, signal);
  logger.info(summarize(report), report.state === "fatal" ? "run halted" : "run complete");
  return report.state === "fatal" ? EXIT_FATAL : EXIT_OK;
}

function runFunding(
  engine: ModeRunner,
  mode: Exclude<EngineMode, "status">,
  signal: AbortSignal,
): Promise<RunReport> {
  switch (mode) {
    case "init-dist":
      return engine.initDist(signal);
    case "cont-fund":
      return engine.contFund(signal);
    case "reclaim":
      return engine.reclaim(signal);
  }
}

function summarize(report: RunReport) {
  let confirmed = 0;
  let failed = 0;
  let fundsConfirmed = 0n;
  for (const cycle of report.cycles) {
    confirmed += cycle.confirmed;
    failed += cycle.failed;
    fundsConfirmed += cycle.fundsConfirmed;
  }
  return {
    mode: report.mode,
    state: report.state,
    cycles: report.cycles.length,
    confirmed,
    failed,
    fundsConfirmed: fundsConfirmed.toString(),
  };
}

/** One tab-separated line per account: index, address, balance. */
export function formatSnapshot(snapshot: BalanceSnapshot): string {
  const { index, address } = snapshot.account;
  if (snapshot.status === "known") {
    return `${index}\t${address}\t${formatEther(snapshot.balance)} ETH`;
  }
  const last =
    snapshot.lastKnownBalance === undefined
      ? ""
      : ` (last known ${formatEther(snapshot.lastKnownBalance)} ETH)`;
  return `${index}\t${address}\tunknown${last}`;
}
