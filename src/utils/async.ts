/**
 * @fileoverview Async Utilities
 *
 * Shared async helper functions used across the codebase.
 *
 * @packageDocumentation
 */

/**
 * Map `items` through `fn` with at most `concurrency` calls in flight.
 * Results keep the input order.
 *
 * @example
 * ```typescript
 * const sizes = await mapWithConcurrency(files, 8, (file) => fs.stat(file).then((s) => s.size));
 * ```
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workers = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await fn(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}

/** Concurrency for plain file reads. */
export const FILE_SCAN_CONCURRENCY = 16;
