export interface PoolOptions {
  concurrency: number;
  /** When aborted, workers stop taking new items; in-flight items finish. */
  signal?: AbortSignal;
  onProgress?: (done: number, total: number) => void;
}

export type PoolResult<R> = { status: "done"; value: R } | { status: "not-started" };

/**
 * Run `fn` over `items` with at most `concurrency` in flight. Results keep the
 * input order. The first rejection is rethrown after in-flight work settles.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  options: PoolOptions,
): Promise<PoolResult<R>[]> {
  const results: PoolResult<R>[] = items.map(() => ({ status: "not-started" }));
  let next = 0;
  let completed = 0;
  const state: { failure?: { error: unknown } } = {};

  const workers = Array.from(
    { length: Math.max(1, Math.min(options.concurrency, items.length)) },
    async () => {
      while (next < items.length && !state.failure && !options.signal?.aborted) {
        const index = next++;
        const item = items[index];
        if (item === undefined) continue;
        try {
          results[index] = { status: "done", value: await fn(item, index) };
        } catch (error) {
          state.failure ??= { error };
          return;
        }
        completed++;
        options.onProgress?.(completed, items.length);
      }
    },
  );

  await Promise.all(workers);
  if (state.failure) throw state.failure.error;
  return results;
}
