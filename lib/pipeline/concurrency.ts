/**
 * Map over items with at most `concurrency` calls in flight. Results keep
 * input order. After the first failure no new items are started and the
 * returned promise rejects with that error once in-flight work settles.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const queue = items.map((_, i) => i);
  const state: { failure: { error: unknown } | null } = { failure: null };

  const workers = Array.from(
    { length: Math.max(1, Math.min(concurrency, items.length)) },
    async () => {
      while (queue.length > 0 && !state.failure) {
        const i = queue.shift();
        if (i === undefined) break;
        try {
          results[i] = await fn(items[i], i);
        } catch (error) {
          state.failure ??= { error };
        }
      }
    }
  );
  await Promise.all(workers);

  if (state.failure) throw state.failure.error;
  return results;
}
