/** Splits `items` into consecutive slices of at most `size`. */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`chunk size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Maps `items` through `fn` with at most `limit` calls in flight.
 * Results keep input order; the first rejection rejects the returned promise.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new RangeError(`concurrency must be a positive integer, got ${limit}`);
  }

  const results = new Array<R>(items.length);
  // one iterator shared by every lane, so each item is taken exactly once
  const queue = items.entries();

  async function lane(): Promise<void> {
    for (const [index, item] of queue) {
      results[index] = await fn(item, index);
    }
  }

  const lanes = Array.from({ length: Math.min(limit, items.length) }, () => lane());
  await Promise.all(lanes);
  return results;
}
