/**
 * Runtime Type Guards
 *
 * Narrowing functions for values that arrive from configuration or
 * external callers.
 */

import type { FundingPolicy } from "./funding.js";

function isIndex(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isAmount(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n;
}

/**
 * A policy is usable when all amounts are non-negative and
 * the target is not below the threshold.
 */
export function isFundingPolicy(value: unknown): value is FundingPolicy {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isAmount(v.threshold) &&
    isAmount(v.target) &&
    isAmount(v.reserve) &&
    isIndex(v.rootIndex) &&
    v.target >= v.threshold
  );
}
