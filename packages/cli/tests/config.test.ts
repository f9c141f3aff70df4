/**
 * Tests for config.ts: loadConfig and the settings derived from it.
 */

import { describe, it, expect } from "vitest";
import {
  confirmRetry,
  fundingPolicy,
  loadConfig,
  redactConfig,
  sendRetry,
} from "../src/config.js";

const MNEMONIC = "test test test test test test test test test test test junk";

const base = {
  MNEMONIC,
  RPC_URL: "https://rpc.example.com/v2/test-secret",
};

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig(base);

    expect(config.CHAIN_ID).toBe("eip155:11155111");
    expect(config.DERIVATION_PATH).toBe("m/44'/60'/{index}'/0/0");
    expect(config.ACCOUNT_COUNT).toBe(10);
    expect(config.ROOT_INDEX).toBe(0);
    expect(config.FUNDING_THRESHOLD).toBe(5_000_000_000_000_000n);
    expect(config.FUNDING_TARGET).toBe(10_000_000_000_000_000n);
    expect(config.RECLAIM_RESERVE).toBe(100_000_000_000_000n);
    expect(config.POLL_INTERVAL_MS).toBe(20000);
    expect(config.POLL_CONCURRENCY).toBe(4);
    expect(config.SUBMIT_MAX_ATTEMPTS).toBe(3);
    expect(config.CONFIRM_MAX_ATTEMPTS).toBe(5);
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("production");
  });

  it("coerces numbers and parses wei amounts as bigint", () => {
    const config = loadConfig({
      ...base,
      ACCOUNT_COUNT: "25",
      ROOT_INDEX: "3",
      FUNDING_THRESHOLD: " 100 ",
      FUNDING_TARGET: "500",
    });

    expect(config.ACCOUNT_COUNT).toBe(25);
    expect(config.ROOT_INDEX).toBe(3);
    expect(config.FUNDING_THRESHOLD).toBe(100n);
    expect(config.FUNDING_TARGET).toBe(500n);
  });

  it("requires MNEMONIC and RPC_URL", () => {
    expect(() => loadConfig({ RPC_URL: base.RPC_URL })).toThrow();
    expect(() => loadConfig({ MNEMONIC })).toThrow();
  });

  it("rejects a non-EVM chain id", () => {
    expect(() => loadConfig({ ...base, CHAIN_ID: "solana:mainnet" })).toThrow(
      "must be a CAIP-2 EVM chain id",
    );
  });

  it("rejects fractional or negative amounts", () => {
    expect(() => loadConfig({ ...base, FUNDING_TARGET: "1.5" })).toThrow("wei");
    expect(() => loadConfig({ ...base, RECLAIM_RESERVE: "-1" })).toThrow("wei");
  });

  it("rejects a target below the threshold", () => {
    expect(() =>
      loadConfig({ ...base, FUNDING_THRESHOLD: "500", FUNDING_TARGET: "100" }),
    ).toThrow("FUNDING_TARGET must be at least FUNDING_THRESHOLD");
  });

  it("rejects a root index outside the managed accounts", () => {
    expect(() => loadConfig({ ...base, ACCOUNT_COUNT: "2", ROOT_INDEX: "2" })).toThrow(
      "ROOT_INDEX must be below ACCOUNT_COUNT",
    );
  });

  it("rejects a max delay below the base delay", () => {
    expect(() =>
      loadConfig({ ...base, RETRY_BASE_DELAY_MS: "5000", RETRY_MAX_DELAY_MS: "1000" }),
    ).toThrow("RETRY_MAX_DELAY_MS must be at least RETRY_BASE_DELAY_MS");
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ ...base, LOG_LEVEL: "verbose" })).toThrow();
  });
});

describe("derived settings", () => {
  const config = loadConfig({
    ...base,
    FUNDING_THRESHOLD: "100",
    FUNDING_TARGET: "500",
    RECLAIM_RESERVE: "50",
    ACCOUNT_COUNT: "4",
    ROOT_INDEX: "1",
    SUBMIT_MAX_ATTEMPTS: "4",
    CONFIRM_MAX_ATTEMPTS: "8",
    RETRY_BASE_DELAY_MS: "250",
    RETRY_MAX_DELAY_MS: "4000",
  });

  it("builds the funding policy", () => {
    expect(fundingPolicy(config)).toEqual({
      threshold: 100n,
      target: 500n,
      reserve: 50n,
      rootIndex: 1,
    });
  });

  it("builds jittered send retries and unjittered confirmation polling", () => {
    expect(sendRetry(config)).toEqual({
      maxAttempts: 4,
      baseDelayMs: 250,
      maxDelayMs: 4000,
      jitterMs: 200,
    });
    expect(confirmRetry(config)).toEqual({
      maxAttempts: 8,
      baseDelayMs: 250,
      maxDelayMs: 4000,
      jitterMs: 0,
    });
  });
});

describe("redactConfig", () => {
  it("masks the mnemonic and the RPC path", () => {
    const redacted = redactConfig(loadConfig(base));

    expect(redacted["MNEMONIC"]).toBe("[redacted]");
    expect(redacted["RPC_URL"]).toBe("https://rpc.example.com");
    expect(redacted["FUNDING_TARGET"]).toBe("10000000000000000");
    expect(redacted["ACCOUNT_COUNT"]).toBe(10);
    expect(JSON.stringify(redacted)).not.toContain("test-secret");
  });
});
