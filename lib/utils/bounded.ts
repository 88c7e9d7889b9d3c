/**
 * Runs `worker` over `items` with at most `limit` calls in flight. Every
 * item is attempted; results come back settled and in input order.
 */
export async function mapSettledBounded<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }
  const results = new Array<PromiseSettledResult<R>>(items.length);
  let next = 0;

  // each lane pulls the next unclaimed index until the list is drained
  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const i = next++;
      try {
        results[i] = { status: "fulfilled", value: await worker(items[i], i) };
      } catch (reason) {
        results[i] = { status: "rejected", reason };
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, () => lane()));
  return results;
}
