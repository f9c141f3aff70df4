/**
 * Retry with exponential backoff.
 *
 * Generic retry utility for transient failures. Parameterizes transaction
 * sends, confirmation polling and balance reads; the transport is not its
 * concern, so it is tested with plain functions.
 *
 * Backoff formula: min(baseDelayMs * 2^attempt + jitter, maxDelayMs)
 * where jitter = random(0, jitterMs)
 */

/**
 * Configuration for retry behavior.
 */
export interface RetryConfig {
  /** Maximum number of attempts (including the first try). Default: 3 */
  readonly maxAttempts: number;
  /** Base delay in ms before first retry. Default: 1000 */
  readonly baseDelayMs: number;
  /** Maximum delay in ms between retries. Default: 30000 */
  readonly maxDelayMs: number;
  /** Maximum random jitter in ms added to each delay. Default: 200 */
  readonly jitterMs: number;
}

/**
 * Default retry configuration for sends.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterMs: 200,
};

/**
 * Default confirmation polling: 1s, 2s, 4s, 8s between five polls.
 */
export const DEFAULT_CONFIRM_CONFIG: RetryConfig = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterMs: 0,
};

/**
 * Error thrown when all retry attempts are exhausted, or when the
 * caller cancelled before the next attempt.
 */
export class RetryExhaustedError extends Error {
  constructor(
    /** Number of attempts made */
    public readonly attempts: number,
    /** The last error encountered */
    public readonly lastError: unknown,
  ) {
    const msg = lastError instanceof Error ? lastError.message : String(lastError);
    super(`All ${attempts} retry attempts exhausted. Last error: ${msg}`);
    this.name = "RetryExhaustedError";
  }
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Sleep for the specified duration. Resolves early when `signal` aborts.
 */
export const sleep: SleepFn = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Compute the delay before the next retry attempt.
 *
 * @param attempt - Zero-based attempt index (0 = first retry)
 */
export function computeDelay(
  attempt: number,
  config: RetryConfig,
  random: () => number = Math.random,
): number {
  const exponential = config.baseDelayMs * Math.pow(2, attempt);
  const jitter = random() * config.jitterMs;
  return Math.min(exponential + jitter, config.maxDelayMs);
}

export interface RetryOptions {
  /** Predicate to determine if an error is retryable (default: all errors) */
  readonly shouldRetry?: (err: unknown) => boolean;
  /** Sleep function (injectable for testing) */
  readonly sleepFn?: SleepFn;
  /** Stops further attempts; the attempt in progress is never interrupted */
  readonly signal?: AbortSignal;
  /** Called before each backoff sleep */
  readonly onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Execute a function with retry on failure.
 *
 * @throws RetryExhaustedError if all attempts fail or the signal aborts between attempts
 * @throws The original error if shouldRetry returns false
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {},
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? (() => true);
  const sleepFn = options.sleepFn ?? sleep;
  let lastError: unknown;

  for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err: unknown) {
      lastError = err;

      if (!shouldRetry(err)) {
        throw err;
      }

      if (attempt < config.maxAttempts - 1) {
        if (options.signal?.aborted) {
          throw new RetryExhaustedError(attempt + 1, lastError);
        }
        const delay = computeDelay(attempt, config);
        options.onRetry?.(err, attempt + 1, delay);
        await sleepFn(delay, options.signal);
        if (options.signal?.aborted) {
          throw new RetryExhaustedError(attempt + 1, lastError);
        }
      }
    }
  }

  throw new RetryExhaustedError(config.maxAttempts, lastError);
}
