/**
 * @hd-funder/engine: The funding engine.
 *
 * Observes balances of HD-derived accounts, plans top-ups and reclaims,
 * and submits them with nonce and retry discipline.
 *
 * Design rules:
 * - One nonce sequencer per sending account; reservation and submission are one critical section
 * - Per-account failures are values, never batch-aborting exceptions
 * - At most one outstanding transaction per action route
 */

// Orchestration
export { DistributionEngine } from "./distribution-engine.js";
export type {
  DistributionEngineConfig,
  DistributionEngineDeps,
  EngineMode,
  EngineState,
  CycleReport,
  RunReport,
  StatusReport,
} from "./distribution-engine.js";

// Components
export { BalanceObserver } from "./balance-observer.js";
export type { BalanceObserverOptions, BalanceSource, WatchOptions } from "./balance-observer.js";
export { FundingPlanner } from "./funding-planner.js";
export { ReclaimCoordinator } from "./reclaim-coordinator.js";
export type { ReclaimReport, SkippedReclaim } from "./reclaim-coordinator.js";
export { TransactionSubmitter } from "./transaction-submitter.js";
export type {
  BatchReport,
  SendOptions,
  TransactionSubmitterDeps,
  TransactionSubmitterOptions,
} from "./transaction-submitter.js";
export { NonceSequencer, NonceSequencerPool } from "./nonce-sequencer.js";
export type { NonceSource, ReleaseOptions } from "./nonce-sequencer.js";

// Actions
export { ActionFactory, actionKey } from "./actions.js";

// Capabilities
export type { AccountSource, SignerProvider } from "./ports.js";

// Primitives
export { Mutex, mapWithConcurrency } from "./concurrency.js";
export {
  withRetry,
  computeDelay,
  sleep,
  RetryExhaustedError,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_CONFIRM_CONFIG,
} from "./retry.js";
export type { RetryConfig, RetryOptions, SleepFn } from "./retry.js";

// Errors
export {
  ObservationError,
  RetryableSubmissionError,
  FatalSubmissionError,
  ConfirmationTimeoutError,
  EngineStateError,
  classifySubmissionError,
  isRetryableSubmissionError,
} from "./errors.js";
export type {
  RetryableSubmissionCode,
  FatalSubmissionCode,
  SubmissionError,
  EngineStateErrorCode,
} from "./errors.js";
