/**
 * @veil/core - Concurrency primitives
 *
 * Mutex for single-writer state (routing sessions, privacy budgets),
 * Semaphore for bounding in-flight remote calls, and a worker pool for
 * fanning fragments out across a fixed number of workers.
 */

import { availableParallelism } from 'node:os';

// ---------------------------------------------------------------------------
// Semaphore
// ---------------------------------------------------------------------------

export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore permits must be a positive integer, got ${permits}`);
    }
    this.available = permits;
  }

  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available--;
    } else {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      // Hand the permit straight to the next waiter.
      if (next) next();
      else this.available++;
    };
  }

  /** Run `fn` while holding a permit. */
  async run<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get pending(): number {
    return this.waiters.length;
  }

  get free(): number {
    return this.available;
  }
}

// ---------------------------------------------------------------------------
// Mutex
// ---------------------------------------------------------------------------

/**
 * FIFO mutual exclusion. `runExclusive` callers observe each other's
 * writes in submission order.
 */
export class Mutex {
  private readonly semaphore = new Semaphore(1);

  runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    return this.semaphore.run(fn);
  }

  get locked(): boolean {
    return this.semaphore.free === 0;
  }
}

// ---------------------------------------------------------------------------
// Worker pool
// ---------------------------------------------------------------------------

export interface PoolOptions {
  /** Number of workers. 0 or undefined = available cores. */
  concurrency?: number;
  /** When aborted, workers stop taking new items. */
  signal?: AbortSignal;
}

/**
 * Resolve a configured pool size: a positive number is taken as-is,
 * anything else means "one worker per core".
 */
export function resolveConcurrency(configured?: number): number {
  if (configured !== undefined && configured > 0) return Math.floor(configured);
  return Math.max(1, availableParallelism());
}

/**
 * Process `items` with a bounded number of concurrent workers.
 *
 * Results are returned in input order. Items never started because the
 * signal aborted are reported through `onSkipped` and left out of the
 * result array (their slot is `undefined`).
 */
export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions & { onSkipped?: (item: T, index: number) => R } = {},
): Promise<Array<R | undefined>> {
  const concurrency = Math.min(resolveConcurrency(options.concurrency), Math.max(items.length, 1));
  const results: Array<R | undefined> = new Array<R | undefined>(items.length);
  let currentIndex = 0;

  const run = async (): Promise<void> => {
    while (currentIndex < items.length) {
      const index = currentIndex++;
      const item = items[index];

      if (options.signal?.aborted) {
        if (options.onSkipped) results[index] = options.onSkipped(item, index);
        continue;
      }

      results[index] = await worker(item, index);
    }
  };

  const workers: Array<Promise<void>> = [];
  for (let i = 0; i < concurrency; i++) {
    workers.push(run());
  }
  await Promise.all(workers);

  return results;
}
