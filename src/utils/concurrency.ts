/**
 * @fileoverview Bounded-parallelism helpers.
 *
 * @module orga-runtime/utils/concurrency
 */

/**
 * Maps `items` through `fn` with at most `limit` calls in flight. A worker
 * picks up the next item as soon as its current one settles, so one slow
 * item never holds back the rest. Results keep the input order.
 *
 * `fn` is expected to settle every call; the first rejection rejects the
 * whole map.
 */
export async function mapWithConcurrency<T, R>(
  items: ReadonlyArray<T>,
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await fn(items[index], index);
    }
  };

  const workers = Math.min(Math.max(1, Math.floor(limit)), items.length);
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}
