/**
 * Tests for Mutex and mapWithConcurrency.
 */

import { describe, it, expect } from "vitest";
import { Mutex, mapWithConcurrency } from "../src/concurrency.js";

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("Mutex", () => {
  it("serves waiters in arrival order", async () => {
    const mutex = new Mutex();
    const order: string[] = [];

    const first = await mutex.acquire();
    const second = mutex.acquire().then((release) => {
      order.push("second");
      return release;
    });
    const third = mutex.acquire().then((release) => {
      order.push("third");
      release();
    });

    await tick();
    expect(order).toEqual([]);
    first();
    (await second)();
    await third;
    expect(order).toEqual(["second", "third"]);
  });

  it("never runs two critical sections at once", async () => {
    const mutex = new Mutex();
    let active = 0;
    let maxActive = 0;

    await Promise.all(
      Array.from({ length: 10 }, () =>
        mutex.acquire().then(async (release) => {
          active++;
          maxActive = Math.max(maxActive, active);
          await tick();
          active--;
          release();
        }),
      ),
    );
    expect(maxActive).toBe(1);
  });

  it("is unlocked once every holder released", async () => {
    const mutex = new Mutex();
    const first = await mutex.acquire();
    const second = mutex.acquire();
    expect(mutex.locked).toBe(true);
    first();
    (await second)();
    expect(mutex.locked).toBe(false);
  });

  it("ignores a second release", async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    expect(mutex.locked).toBe(true);
    release();
    release();
    expect(mutex.locked).toBe(false);
  });
});

describe("mapWithConcurrency", () => {
  it("keeps input order", async () => {
    const result = await mapWithConcurrency([30, 10, 20], 2, async (n) => {
      await new Promise((resolve) => setTimeout(resolve, n));
      return n * 2;
    });
    expect(result).toEqual([60, 20, 40]);
  });

  it("bounds the number of calls in progress", async () => {
    let active = 0;
    let maxActive = 0;
    await mapWithConcurrency(Array.from({ length: 12 }, (_, i) => i), 3, async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await tick();
      active--;
    });
    expect(maxActive).toBe(3);
  });

  it("handles an empty list", async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});
