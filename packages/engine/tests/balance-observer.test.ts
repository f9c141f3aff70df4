/**
 * Tests for BalanceObserver.
 */

import { describe, it, expect } from "vitest";
import { ChainClientError } from "@hd-funder/chain-client";
import type { BalanceSnapshot } from "@hd-funder/types";
import { BalanceObserver } from "../src/balance-observer.js";
import { FakeChainClient } from "./helpers/fake-chain.js";
import { account, accounts, addressOf, noopSleep, policy, silentLogger } from "./helpers/fixtures.js";

function createObserver(chain: FakeChainClient, clockStart = 1000): BalanceObserver {
  let now = clockStart;
  return new BalanceObserver(chain, silentLogger, {
    concurrency: 2,
    clock: () => now++,
    sleepFn: noopSleep,
  });
}

describe("BalanceObserver", () => {
  describe("poll", () => {
    it("returns one known snapshot per account in input order", async () => {
      const chain = new FakeChainClient()
        .setBalance(addressOf(0), 1000n)
        .setBalance(addressOf(1), 40n)
        .setBalance(addressOf(2), 150n);
      const snapshots = await createObserver(chain).poll(accounts(3));

      expect(snapshots.map((s) => (s.status === "known" ? s.balance : undefined))).toEqual([1000n, 40n, 150n]);
      expect(snapshots.map((s) => s.account.index)).toEqual([0, 1, 2]);
    });

    it("isolates a failed read as an unknown snapshot", async () => {
      const chain = new FakeChainClient()
        .setBalance(addressOf(0), 1000n)
        .setBalance(addressOf(2), 150n)
        .failBalance(addressOf(1), new ChainClientError("TIMEOUT", "request timed out"));

      const [root, failed, ok] = await createObserver(chain).poll(accounts(3));
      expect(root?.status).toBe("known");
      expect(ok?.status).toBe("known");
      expect(failed).toMatchObject({
        status: "unknown",
        error: "Balance read failed for account 1: request timed out",
      });
      expect(failed).not.toHaveProperty("lastKnownBalance");
    });

    it("carries the last known balance into an unknown snapshot", async () => {
      const chain = new FakeChainClient().setBalance(addressOf(1), 80n);
      const observer = createObserver(chain);

      await observer.poll([account(1)]);
      chain.failBalance(addressOf(1), new ChainClientError("NETWORK", "fetch failed"));
      const [snapshot] = await observer.poll([account(1)]);

      expect(snapshot).toMatchObject({ status: "unknown", lastKnownBalance: 80n });
      expect(observer.lastKnownBalance(1)).toBe(80n);
    });

    it("reads the account again on the next poll", async () => {
      const chain = new FakeChainClient()
        .setBalance(addressOf(1), 80n)
        .failBalance(addressOf(1), new ChainClientError("NETWORK", "fetch failed"));
      const observer = createObserver(chain);

      expect((await observer.poll([account(1)]))[0]?.status).toBe("unknown");
      expect((await observer.poll([account(1)]))[0]).toMatchObject({ status: "known", balance: 80n });
    });

    it("retries transient reads within a poll when configured", async () => {
      const chain = new FakeChainClient()
        .setBalance(addressOf(1), 80n)
        .failBalance(addressOf(1), new ChainClientError("NETWORK", "fetch failed"), 2);
      const observer = new BalanceObserver(chain, silentLogger, {
        retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1, jitterMs: 0 },
        sleepFn: noopSleep,
      });

      const [snapshot] = await observer.poll([account(1)]);
      expect(snapshot).toMatchObject({ status: "known", balance: 80n });
      expect(chain.calls.getBalance).toBe(3);
    });

    it("does not retry non-transient read failures", async () => {
      const chain = new FakeChainClient()
        .failBalance(addressOf(1), new ChainClientError("INVALID_ADDRESS", "bad address"));
      const observer = new BalanceObserver(chain, silentLogger, {
        retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1, jitterMs: 0 },
        sleepFn: noopSleep,
      });

      const [snapshot] = await observer.poll([account(1)]);
      expect(snapshot).toMatchObject({ status: "unknown", error: "Balance read failed for account 1: bad address" });
      expect(chain.calls.getBalance).toBe(1);
    });

    it("stamps snapshots with the monotonic clock", async () => {
      const chain = new FakeChainClient();
      const snapshots = await createObserver(chain, 500).poll(accounts(2));
      const stamps = snapshots.map((s) => s.observedAt).sort((a, b) => a - b);
      expect(stamps).toEqual([500, 501]);
    });
  });

  describe("belowThreshold", () => {
    const observer = createObserver(new FakeChainClient());
    const known = (balance: bigint): BalanceSnapshot => ({
      status: "known",
      account: account(1),
      balance,
      observedAt: 0,
    });

    it("is true iff balance < threshold", () => {
      expect(observer.belowThreshold(known(99n), policy())).toBe(true);
      expect(observer.belowThreshold(known(100n), policy())).toBe(false);
      expect(observer.belowThreshold(known(150n), policy())).toBe(false);
    });

    it("treats unknown snapshots as below threshold", () => {
      expect(
        observer.belowThreshold(
          { status: "unknown", account: account(1), error: "x", observedAt: 0, lastKnownBalance: 1000n },
          policy(),
        ),
      ).toBe(true);
    });
  });

  describe("watch", () => {
    it("polls each cycle until aborted", async () => {
      const chain = new FakeChainClient().setBalance(addressOf(1), 10n);
      const controller = new AbortController();
      const sleeps: number[] = [];
      const observer = new BalanceObserver(chain, silentLogger, {
        sleepFn: async (ms) => {
          sleeps.push(ms);
        },
      });

      let cycles = 0;
      for await (const snapshots of observer.watch([account(1)], { intervalMs: 250, signal: controller.signal })) {
        cycles++;
        expect(snapshots).toHaveLength(1);
        chain.setBalance(addressOf(1), BigInt(cycles * 10 + 10));
        if (cycles === 3) controller.abort();
      }

      expect(cycles).toBe(3);
      expect(sleeps).toEqual([250, 250]);
      expect(chain.calls.getBalance).toBe(3);
    });

    it("runs beforePoll ahead of every poll", async () => {
      const chain = new FakeChainClient();
      const controller = new AbortController();
      const observer = createObserver(chain);
      let prepared = 0;

      const seen: bigint[] = [];
      for await (const [snapshot] of observer.watch([account(1)], {
        intervalMs: 1,
        signal: controller.signal,
        beforePoll: async () => {
          prepared++;
          chain.setBalance(addressOf(1), BigInt(prepared * 100));
        },
      })) {
        if (snapshot?.status === "known") seen.push(snapshot.balance);
        if (seen.length === 2) controller.abort();
      }

      expect(prepared).toBe(2);
      expect(seen).toEqual([100n, 200n]);
    });

    it("yields nothing for an aborted signal", async () => {
      const observer = createObserver(new FakeChainClient());
      const batches: BalanceSnapshot[][] = [];
      for await (const batch of observer.watch(accounts(2), { intervalMs: 1, signal: AbortSignal.abort() })) {
        batches.push(batch);
      }
      expect(batches).toEqual([]);
    });
  });
});
