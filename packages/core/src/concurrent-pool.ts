export interface PoolOptions<R> {
  /** Once aborted, idle workers stop taking items. Items already started run to completion. */
  signal?: AbortSignal;
  onItemComplete?: (result: R, index: number) => void;
}

/**
 * Worker pool for concurrent task execution.
 *
 * Keeps up to `concurrency` workers busy; a worker that finishes an item
 * immediately takes the next one. Results keep the input order. Items never
 * started because the signal aborted are `undefined` in the result.
 */
export class ConcurrentPool {
  static async run<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    options: PoolOptions<R> = {},
  ): Promise<(R | undefined)[]> {
    const results: (R | undefined)[] = new Array<R | undefined>(items.length).fill(undefined);
    const { signal, onItemComplete } = options;
    let nextIndex = 0;

    async function worker(): Promise<void> {
      while (nextIndex < items.length && !signal?.aborted) {
        const index = nextIndex++;
        const item = items[index];
        if (item === undefined) continue;
        const result = await processFn(item, index);
        results[index] = result;
        onItemComplete?.(result, index);
      }
    }

    const workers = Array.from({ length: Math.min(Math.max(1, concurrency), items.length) }, () =>
      worker(),
    );
    await Promise.all(workers);
    return results;
  }
}
