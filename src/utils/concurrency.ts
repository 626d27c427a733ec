/**
 * Concurrency Control Utilities
 *
 * Bounded fan-out for per-account enrichment. A fixed number of workers
 * pull from a shared queue; there is no cancellation.
 */

/**
 * Called after each item finishes, with the number finished so far.
 */
export type ProgressFn = (completed: number, total: number) => void;

/**
 * Process items with at most `concurrency` operations in flight.
 *
 * Results are stored at their input index, so the returned array lines up
 * with `items` regardless of completion order.
 *
 * @param items - Items to process
 * @param fn - Async function applied to each item
 * @param concurrency - Maximum concurrent operations (default: 10)
 * @param onProgress - Optional completion callback
 *
 * @example
 * ```typescript
 * const profiles = await processWithConcurrency(
 *   accounts,
 *   (account) => fetchProfile(account, token),
 *   10
 * );
 * ```
 */
export async function processWithConcurrency<T, R>(
  items: T[],
  fn: (item: T, index: number) => Promise<R>,
  concurrency: number = 10,
  onProgress?: ProgressFn
): Promise<R[]> {
  if (items.length === 0) {
    return [];
  }

  const effectiveConcurrency = Math.max(1, Math.floor(concurrency));
  const results: R[] = new Array(items.length);

  let nextIndex = 0;
  let completed = 0;

  async function worker(): Promise<void> {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      results[index] = await fn(items[index], index);
      completed++;
      onProgress?.(completed, items.length);
    }
  }

  const workerCount = Math.min(effectiveConcurrency, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return results;
}
