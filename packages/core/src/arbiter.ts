const queues = new WeakMap<object, Promise<void>>();

/**
 * Runs `task` after every task previously queued under `key` has settled.
 * Tasks under different keys run independently.
 */
export function serialize<T>(key: object, task: () => Promise<T>): Promise<T> {
  const previous = queues.get(key) ?? Promise.resolve();
  const run = previous.then(task);
  const settled = run.then(
    () => undefined,
    () => undefined,
  );

  queues.set(key, settled);
  void settled.then(() => {
    if (queues.get(key) === settled) {
      queues.delete(key);
    }
  });

  return run;
}
