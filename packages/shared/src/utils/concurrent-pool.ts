/**
 * ConcurrentPool - Worker pool utility for concurrent task execution.
 *
 * Unlike batch processing where all items in a batch must complete before
 * the next batch starts, the pool keeps N workers active at all times.
 * When a worker finishes, it immediately picks up the next available item.
 */
export class ConcurrentPool {
  /**
   * Process items concurrently and collect every outcome.
   *
   * Spawns up to `concurrency` workers that pull items from a shared queue.
   * A rejected item never stops its worker: the rejection is recorded and the
   * worker moves on, so the returned promise resolves only after every item
   * has settled. Results keep the original item order.
   *
   * @param onItemSettled - Optional callback fired after each item settles
   */
  static async runSettled<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    onItemSettled?: (result: PromiseSettledResult<R>, index: number) => void,
  ): Promise<PromiseSettledResult<R>[]> {
    const results: PromiseSettledResult<R>[] = new Array(items.length);
    let nextIndex = 0;

    async function worker(): Promise<void> {
      while (nextIndex < items.length) {
        const index = nextIndex++;
        try {
          results[index] = {
            status: 'fulfilled',
            value: await processFn(items[index], index),
          };
        } catch (reason) {
          results[index] = { status: 'rejected', reason };
        }
        onItemSettled?.(results[index], index);
      }
    }

    const workers = Array.from(
      { length: Math.min(Math.max(1, concurrency), items.length) },
      () => worker(),
    );
    await Promise.all(workers);
    return results;
  }
}
