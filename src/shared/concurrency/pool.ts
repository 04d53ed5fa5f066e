/**
 * Bounded worker pool
 *
 * Maps items through an async function with at most `limit` calls in
 * flight. Output order matches input order regardless of completion order.
 * The first rejection rejects the whole map; workers stop picking up new
 * items once that happens.
 */

export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`concurrency limit must be a positive integer, got ${limit}`);
  }

  const results = new Array<R>(items.length);
  let cursor = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && cursor < items.length) {
      const index = cursor++;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  const workers = Array.from({ length: Math.min(limit, items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}
