/**
 * Tests for NonceSequencer.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { ChainClientError } from "@hd-funder/chain-client";
import { NonceSequencer, NonceSequencerPool } from "../src/nonce-sequencer.js";
import { FakeChainClient } from "./helpers/fake-chain.js";
import { account, addressOf, captureLogger, silentLogger } from "./helpers/fixtures.js";

const ROOT = addressOf(0);

function createSequencer(chainNonce = 0): { sequencer: NonceSequencer; chain: FakeChainClient } {
  const chain = new FakeChainClient().setNonce(ROOT, chainNonce);
  return { sequencer: new NonceSequencer(ROOT, chain, silentLogger), chain };
}

describe("NonceSequencer", () => {
  it("initializes from the chain on first reserve", async () => {
    const { sequencer, chain } = createSequencer(7);
    const lease = await sequencer.reserve();
    expect(lease).toMatchObject({ account: ROOT, value: 7, state: "reserved" });
    expect(chain.calls.getNonce).toBe(1);
  });

  it("advances after commit without re-reading the chain", async () => {
    const { sequencer, chain } = createSequencer(3);
    sequencer.commit(await sequencer.reserve());
    sequencer.commit(await sequencer.reserve());
    const third = await sequencer.reserve();
    expect(third.value).toBe(5);
    expect(chain.calls.getNonce).toBe(1);
  });

  it("reuses a released value", async () => {
    const { sequencer } = createSequencer(2);
    const first = await sequencer.reserve();
    expect(sequencer.release(first).state).toBe("released");
    const second = await sequencer.reserve();
    expect(second.value).toBe(2);
    expect(second.id).not.toBe(first.id);
  });

  it("re-reads the chain after a release with resync", async () => {
    const { sequencer, chain } = createSequencer(0);
    const lease = await sequencer.reserve();
    chain.setNonce(ROOT, 4);
    sequencer.release(lease, { resync: true });

    const next = await sequencer.reserve();
    expect(next.value).toBe(4);
    expect(chain.calls.getNonce).toBe(2);
  });

  it("treats double commit as a no-op", async () => {
    const { sequencer } = createSequencer(0);
    const lease = await sequencer.reserve();
    expect(sequencer.commit(lease).state).toBe("committed");
    expect(sequencer.commit(lease).state).toBe("committed");
    expect((await sequencer.reserve()).value).toBe(1);
  });

  it("treats release after commit as a no-op", async () => {
    const { sequencer } = createSequencer(0);
    const lease = await sequencer.reserve();
    sequencer.commit(lease);
    expect(sequencer.release(lease, { resync: true }).state).toBe("committed");
    expect(sequencer.stateOf(lease)).toBe("committed");
    expect((await sequencer.reserve()).value).toBe(1);
  });

  it("warns on a settled lease instead of throwing", async () => {
    const { logger, lines } = captureLogger("warn");
    const sequencer = new NonceSequencer(ROOT, new FakeChainClient(), logger);
    const lease = await sequencer.reserve();
    sequencer.commit(lease);
    sequencer.commit(lease);

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      component: "nonce-sequencer",
      leaseId: lease.id,
      state: "committed",
      msg: "commit on a lease that is not reserved; ignored",
    });
  });

  it("holds later reservations until the current lease settles", async () => {
    const { sequencer } = createSequencer(0);
    const first = await sequencer.reserve();

    let secondValue: number | undefined;
    const second = sequencer.reserve().then((lease) => {
      secondValue = lease.value;
      return lease;
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(secondValue).toBeUndefined();
    expect(sequencer.busy).toBe(true);

    sequencer.commit(first);
    expect((await second).value).toBe(1);
  });

  it("holds no lease when the chain read fails", async () => {
    const { sequencer, chain } = createSequencer(5);
    chain.failNonce(new ChainClientError("NETWORK", "fetch failed"));

    await expect(sequencer.reserve()).rejects.toThrow("fetch failed");
    expect(sequencer.busy).toBe(false);
    expect((await sequencer.reserve()).value).toBe(5);
  });

  it("never hands out a committed value twice under concurrent reserves", async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(fc.constantFrom("commit", "release", "resync"), { minLength: 1, maxLength: 30 }),
        async (outcomes) => {
          const chain = new FakeChainClient();
          const sequencer = new NonceSequencer(ROOT, chain, silentLogger);
          const committed: number[] = [];

          await Promise.all(
            outcomes.map(async (outcome) => {
              const lease = await sequencer.reserve();
              await Promise.resolve();
              if (outcome === "commit") {
                // Mirror the chain accepting the transaction
                chain.setNonce(ROOT, lease.value + 1);
                sequencer.commit(lease);
                committed.push(lease.value);
              } else {
                sequencer.release(lease, { resync: outcome === "resync" });
              }
            }),
          );

          expect(new Set(committed).size).toBe(committed.length);
          expect(committed).toEqual([...committed].sort((a, b) => a - b));
        },
      ),
      { numRuns: 50 },
    );
  });
});

describe("NonceSequencerPool", () => {
  it("keeps one sequencer per account", () => {
    const pool = new NonceSequencerPool(new FakeChainClient(), silentLogger);
    expect(pool.for(account(1))).toBe(pool.for(account(1)));
    expect(pool.for(account(1))).not.toBe(pool.for(account(2)));
    expect(pool.for(account(2)).address).toBe(addressOf(2));
  });
});
