/**
 * Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * `.env` files are loaded by the entry point through dotenv.
 */

import { z } from "zod";
import type { FundingPolicy } from "@hd-funder/types";
import type { RetryConfig } from "@hd-funder/engine";

// =============================================================================
// Schema
// =============================================================================

const wei = (fallback: string) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, "must be a non-negative integer amount in wei")
    .default(fallback)
    .transform((value) => BigInt(value));

export const ConfigSchema = z
  .object({
    // Credentials and endpoint
    MNEMONIC: z.string().trim().min(1, "MNEMONIC is required"),
    RPC_URL: z.string().url(),
    CHAIN_ID: z
      .string()
      .regex(/^eip155:\d+$/, "must be a CAIP-2 EVM chain id (eip155:<n>)")
      .default("eip155:11155111"),

    // Accounts
    DERIVATION_PATH: z.string().default("m/44'/60'/{index}'/0/0"),
    ACCOUNT_COUNT: z.coerce.number().int().min(1).max(2 ** 31).default(10),
    ROOT_INDEX: z.coerce.number().int().min(0).default(0),

    // Policy (wei)
    FUNDING_THRESHOLD: wei("5000000000000000"),
    FUNDING_TARGET: wei("10000000000000000"),
    RECLAIM_RESERVE: wei("100000000000000"),

    // Scheduling
    POLL_INTERVAL_MS: z.coerce.number().int().min(100).default(20000),
    POLL_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
    RPC_TIMEOUT_MS: z.coerce.number().int().min(100).default(30000),

    // Retry
    SUBMIT_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    CONFIRM_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(5),
    RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
    RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(30000),

    // Logging
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("production"),
  })
  .superRefine((config, ctx) => {
    if (config.FUNDING_TARGET < config.FUNDING_THRESHOLD) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["FUNDING_TARGET"],
        message: "FUNDING_TARGET must be at least FUNDING_THRESHOLD",
      });
    }
    if (config.ROOT_INDEX >= config.ACCOUNT_COUNT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["ROOT_INDEX"],
        message: "ROOT_INDEX must be below ACCOUNT_COUNT",
      });
    }
    if (config.RETRY_MAX_DELAY_MS < config.RETRY_BASE_DELAY_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["RETRY_MAX_DELAY_MS"],
        message: "RETRY_MAX_DELAY_MS must be at least RETRY_BASE_DELAY_MS",
      });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

// =============================================================================
// Derived settings
// =============================================================================

export function fundingPolicy(config: AppConfig): FundingPolicy {
  return {
    threshold: config.FUNDING_THRESHOLD,
    target: config.FUNDING_TARGET,
    reserve: config.RECLAIM_RESERVE,
    rootIndex: config.ROOT_INDEX,
  };
}

export function sendRetry(config: AppConfig): RetryConfig {
  return {
    maxAttempts: config.SUBMIT_MAX_ATTEMPTS,
    baseDelayMs: config.RETRY_BASE_DELAY_MS,
    maxDelayMs: config.RETRY_MAX_DELAY_MS,
    jitterMs: 200,
  };
}

export function confirmRetry(config: AppConfig): RetryConfig {
  return {
    maxAttempts: config.CONFIRM_MAX_ATTEMPTS,
    baseDelayMs: config.RETRY_BASE_DELAY_MS,
    maxDelayMs: config.RETRY_MAX_DELAY_MS,
    jitterMs: 0,
  };
}

/**
 * Config with secrets masked, for logging.
 */
export function redactConfig(config: AppConfig): Record<string, string | number> {
  const out: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(config)) {
    if (key === "MNEMONIC") {
      out[key] = "[redacted]";
    } else if (key === "RPC_URL" && typeof value === "string") {
      // Endpoint paths and queries often carry provider keys
      out[key] = new URL(value).origin;
    } else {
      out[key] = typeof value === "bigint" ? value.toString() : value;
    }
  }
  return out;
}
