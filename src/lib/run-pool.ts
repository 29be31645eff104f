/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Workers stop picking up new items once `signal` is aborted; callers that need
 * ordered results write into a slot array by index.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  const size = items.length;
  if (size === 0) return;
  let cursor = 0;
  const runners: Promise<void>[] = [];
  const limit = Math.max(1, concurrency);
  for (let i = 0; i < Math.min(limit, size); i++) {
    runners.push((async function pump() {
      while (true) {
        if (signal?.aborted) break;
        const current = cursor++;
        if (current >= size) break;
        await worker(items[current], current);
      }
    })());
  }
  await Promise.all(runners);
}
