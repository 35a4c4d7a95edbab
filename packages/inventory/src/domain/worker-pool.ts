/**
 * Runs `handler` over `values` with at most `limit` calls in flight and returns the results
 * in the order they complete.
 *
 * Results reach `completed` (and `onResult`) only from the worker that produced them, one at
 * a time; nothing else is shared between workers. A rejected handler rejects the pool.
 */
export const runWorkerPool = async <T, R>(
  values: readonly T[],
  limit: number,
  handler: (value: T) => Promise<R>,
  onResult?: (result: R) => void,
): Promise<readonly R[]> => {
  const effectiveLimit = Math.max(1, Math.floor(limit));
  const workerCount = Math.min(effectiveLimit, values.length);
  const completed: R[] = [];
  let index = 0;

  const workers: Promise<void>[] = Array.from({ length: workerCount }, async () => {
    // Each iteration claims the next index; workers return once it passes the end.
    while (true) {
      const current = index;
      index += 1;
      if (current >= values.length) {
        return;
      }

      const value = values[current];
      if (value === undefined) {
        continue;
      }

      const result = await handler(value);
      completed.push(result);
      onResult?.(result);
    }
  });

  await Promise.all(workers);
  return completed;
};
