/**
 * Runs `worker` over `items` with at most `limit` calls in flight, one batch
 * at a time. Results come back in input order whatever the completion order.
 */
export async function mapSettledInBatches<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  const size = Math.max(1, Math.floor(limit));
  const settled: PromiseSettledResult<R>[] = [];

  for (let i = 0; i < items.length; i += size) {
    const batch = items.slice(i, i + size);
    const batchResults = await Promise.allSettled(
      batch.map((item, offset) => worker(item, i + offset)),
    );
    settled.push(...batchResults);
  }

  return settled;
}
