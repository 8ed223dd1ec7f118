/**
 * Keyed Mutex Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { createKeyedMutex } from '@/lib/keyed-mutex.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve: () => resolve() };
}

const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe('Keyed Mutex', () => {
  it('should run tasks on the same key one at a time, in order', async () => {
    const mutex = createKeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.runExclusive('chat-1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
      return 1;
    });
    const second = mutex.runExclusive('chat-1', async () => {
      order.push('second');
      return 2;
    });

    await flush();
    expect(order).toEqual(['first:start']);
    expect(mutex.isLocked('chat-1')).toBe(true);

    gate.resolve();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should not make different keys wait on each other', async () => {
    const mutex = createKeyedMutex();
    const gate = deferred();

    const blocked = mutex.runExclusive('chat-a', () => gate.promise);

    await expect(
      mutex.runExclusive('chat-b', async () => 'done')
    ).resolves.toBe('done');
    expect(mutex.isLocked('chat-a')).toBe(true);

    gate.resolve();
    await blocked;
  });

  it('should keep the queue moving after a task rejects', async () => {
    const mutex = createKeyedMutex();

    const failing = mutex.runExclusive('chat-1', async () => {
      throw new Error('boom');
    });
    const next = mutex.runExclusive('chat-1', async () => 'after');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('after');
  });

  it('should drop idle keys', async () => {
    const mutex = createKeyedMutex();

    await Promise.all([
      mutex.runExclusive('chat-1', async () => undefined),
      mutex.runExclusive('chat-1', async () => undefined),
      mutex.runExclusive('chat-2', async () => undefined),
    ]);

    expect(mutex.size()).toBe(0);
    expect(mutex.isLocked('chat-1')).toBe(false);
  });
});
