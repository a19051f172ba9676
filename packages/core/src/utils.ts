/**
 * Utility functions shared by the pipeline stages
 */

/**
 * Split an array into consecutive chunks of at most `size` items
 */
export function chunkArray<T>(array: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += size) {
    chunks.push(array.slice(i, i + size));
  }
  return chunks;
}

/**
 * Map items with at most `concurrency` calls in flight, preserving input order
 *
 * Items are processed in batches; a batch starts once the previous one has
 * settled. Rejections propagate after the batch settles.
 */
export async function mapInBatches<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = [];
  let offset = 0;

  for (const batch of chunkArray(items, concurrency)) {
    const start = offset;
    const settled = await Promise.allSettled(batch.map((item, i) => fn(item, start + i)));
    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        throw outcome.reason;
      }
      results.push(outcome.value);
    }
    offset += batch.length;
  }

  return results;
}
