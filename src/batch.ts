/**
 * Runs `worker` over `items` in consecutive chunks of `batchSize`; each chunk
 * fans out concurrently and is fully settled before the next one starts.
 * Results keep the input order.
 */
export const settleInBatches = async <T, R>(
  items: readonly T[],
  batchSize: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> => {
  const size = Math.max(1, Math.floor(batchSize));
  const results: PromiseSettledResult<R>[] = [];
  for (let start = 0; start < items.length; start += size) {
    const chunk = items.slice(start, start + size);
    const settled = await Promise.allSettled(
      chunk.map((item, offset) => worker(item, start + offset)),
    );
    results.push(...settled);
  }
  return results;
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
