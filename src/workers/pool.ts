/**
 * Bounded worker pool
 *
 * Runs `worker` over `items` with at most `concurrency` tasks in flight and
 * waits for all of them (fan-in), or until `timeoutMs` elapses. Results keep
 * the input order. Work still running at the deadline is left to finish but
 * its result is dropped.
 */

export type PoolResult<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'timeout' };

export interface PoolOptions {
  concurrency: number;
  /** Batch deadline; omitted means wait for every item */
  timeoutMs?: number;
}

export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T, position: number) => Promise<R>,
  options: PoolOptions
): Promise<PoolResult<R>[]> {
  const results: Array<PoolResult<R> | undefined> = items.map(() => undefined);
  // Lanes share one iterator, so each item is taken exactly once
  const queue = items.entries();
  let closed = false;

  async function drain(): Promise<void> {
    for (const [position, item] of queue) {
      if (closed) {
        return;
      }

      let result: PoolResult<R>;
      try {
        result = { status: 'fulfilled', value: await worker(item, position) };
      } catch (reason) {
        result = { status: 'rejected', reason };
      }
      if (!closed) {
        results[position] = result;
      }
    }
  }

  const lanes = Math.max(1, Math.min(options.concurrency, items.length));
  const finished = Promise.all(Array.from({ length: lanes }, () => drain()));

  if (options.timeoutMs === undefined) {
    await finished;
  } else {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, options.timeoutMs);
    });
    try {
      await Promise.race([finished, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
  closed = true;

  return results.map((result) => result ?? { status: 'timeout' });
}
