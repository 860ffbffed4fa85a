/**
 * Simple concurrency limiter. Workers stop taking new items once `signal` aborts; items
 * already started run to completion.
 */
export async function withConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T) => Promise<void>,
  signal?: AbortSignal,
): Promise<void> {
  const queue = [...items];
  const workers: Promise<void>[] = [];

  for (let i = 0; i < Math.min(Math.max(1, concurrency), queue.length); i++) {
    workers.push(
      (async () => {
        while (queue.length > 0 && !signal?.aborted) {
          const item = queue.shift();
          if (item !== undefined) {
            await fn(item);
          }
        }
      })(),
    );
  }

  await Promise.all(workers);
}
