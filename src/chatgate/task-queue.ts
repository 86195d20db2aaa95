export type KeyedTaskQueue = {
  run<T>(key: string, task: () => Promise<T>): Promise<T>;
  drain(): Promise<void>;
};

/**
 * Runs tasks one at a time per key, in submission order. A task that fails
 * rejects its own promise and does not block the ones queued behind it.
 * Awaiting a task queued on the key of the task that is running deadlocks.
 */
export function createKeyedTaskQueue(): KeyedTaskQueue {
  const tails = new Map<string, Promise<unknown>>();

  function run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = tails.get(key) ?? Promise.resolve();
    const next = previous
      .then(task, task)
      .finally(() => {
        if (tails.get(key) === next) {
          tails.delete(key);
        }
      });
    tails.set(key, next);
    return next;
  }

  async function drain() {
    await Promise.allSettled(Array.from(tails.values()));
  }

  return { run, drain };
}
