/**
 * Keyed mutex
 *
 * Serializes async work per key. Each key owns its own promise chain, so
 * work on different keys never waits on each other. A key's entry is
 * removed once its last queued task settles.
 */

export interface KeyedMutex {
  /**
   * Run `task` once every earlier task for `key` has settled
   */
  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T>;

  /**
   * Whether any task is running or queued for `key`
   */
  isLocked(key: string): boolean;

  /**
   * Number of keys with running or queued work
   */
  size(): number;
}

export function createKeyedMutex(): KeyedMutex {
  const tails = new Map<string, Promise<void>>();

  return {
    async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();

      let release: () => void = () => undefined;
      const current = new Promise<void>((resolve) => {
        release = resolve;
      });
      const tail = previous.then(() => current);
      tails.set(key, tail);

      await previous;
      try {
        return await task();
      } finally {
        release();
        if (tails.get(key) === tail) {
          tails.delete(key);
        }
      }
    },

    isLocked(key: string): boolean {
      return tails.has(key);
    },

    size(): number {
      return tails.size;
    },
  };
}
