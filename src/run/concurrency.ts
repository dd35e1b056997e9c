/**
 * Runs `runner` over `items` with at most `concurrency` calls in flight. Results keep
 * the order of `items`; the first rejection rejects the whole batch.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  runner: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (items.length === 0) return [];
  const limit = Math.max(1, Math.trunc(concurrency));
  const results = new Array<R>(items.length);
  let index = 0;
  const workers = Array.from({ length: Math.min(limit, items.length) }, async () => {
    while (index < items.length) {
      const current = index;
      index += 1;
      results[current] = await runner(items[current], current);
    }
  });
  await Promise.all(workers);
  return results;
}
