/**
 * Worker Pool Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { runPool } from '@/workers/pool.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe('runPool', () => {
  it('should keep results in input order', async () => {
    const results = await runPool(
      [30, 10, 20],
      async (ms) => {
        await new Promise<void>((resolve) => setTimeout(resolve, ms));
        return ms * 2;
      },
      { concurrency: 3 }
    );

    expect(results).toEqual([
      { status: 'fulfilled', value: 60 },
      { status: 'fulfilled', value: 20 },
      { status: 'fulfilled', value: 40 },
    ]);
  });

  it('should never run more than the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;

    await runPool(
      Array.from({ length: 12 }, (_, i) => i),
      async () => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await tick();
        inFlight -= 1;
      },
      { concurrency: 5 }
    );

    expect(peak).toBe(5);
  });

  it('should isolate failures to their own slot', async () => {
    const results = await runPool(
      ['a', 'b'],
      async (item) => {
        if (item === 'a') {
          throw new Error('bad image');
        }
        return item;
      },
      { concurrency: 2 }
    );

    expect(results[0]).toEqual({ status: 'rejected', reason: new Error('bad image') });
    expect(results[1]).toEqual({ status: 'fulfilled', value: 'b' });
  });

  it('should mark unfinished work as timed out at the deadline', async () => {
    const results = await runPool(
      ['fast', 'stuck', 'queued'],
      async (item) => {
        if (item === 'stuck') {
          await new Promise<void>(() => undefined);
        }
        return item;
      },
      { concurrency: 2, timeoutMs: 20 }
    );

    expect(results).toEqual([
      { status: 'fulfilled', value: 'fast' },
      { status: 'timeout' },
      { status: 'fulfilled', value: 'queued' },
    ]);
  });

  it('should pass each item its position', async () => {
    const results = await runPool(['x', 'y'], async (item, position) => `${item}${position}`, {
      concurrency: 1,
    });

    expect(results).toEqual([
      { status: 'fulfilled', value: 'x0' },
      { status: 'fulfilled', value: 'y1' },
    ]);
  });

  it('should hand undefined items to the worker like any other', async () => {
    const results = await runPool(
      [undefined, 'b'],
      async (item) => item ?? 'empty',
      { concurrency: 2 }
    );

    expect(results).toEqual([
      { status: 'fulfilled', value: 'empty' },
      { status: 'fulfilled', value: 'b' },
    ]);
  });

  it('should return an empty list for no items', async () => {
    await expect(runPool([], async () => 1, { concurrency: 5 })).resolves.toEqual([]);
  });
});
