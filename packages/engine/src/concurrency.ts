/**
 * Concurrency primitives: a FIFO mutex and a bounded-parallel map.
 */

/**
 * Promise-chained mutual exclusion. Waiters are served in arrival order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  /** True while a holder exists or acquirers are queued */
  get locked(): boolean {
    return this.waiting > 0;
  }

  /**
   * Resolve once the lock is held. The returned function releases it;
   * calling it more than once has no effect.
   */
  acquire(): Promise<() => void> {
    this.waiting++;
    let unlock: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => held);

    return previous.then(() => {
      let released = false;
      return () => {
        if (released) return;
        released = true;
        this.waiting--;
        unlock();
      };
    });
  }
}

/**
 * Map over `items` with at most `limit` calls in progress.
 * Results keep the input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await fn(item, index);
    }
  };

  const workers = Array.from(
    { length: Math.max(1, Math.min(limit, items.length)) },
    () => worker(),
  );
  await Promise.all(workers);
  return results;
}
