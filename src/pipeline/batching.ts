/**
 * Splits items into ceil(n / batchSize) batches of near-equal size instead of
 * full batches plus a small remainder. Earlier batches take the extra items.
 *
 *   createBalancedBatches([1, 2, 3, 4, 5], 4) -> [[1, 2, 3], [4, 5]]
 */
export function createBalancedBatches<T>(items: T[], batchSize: number): T[][] {
  if (items.length === 0) return [];
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }

  const numBatches = Math.ceil(items.length / batchSize);
  const baseSize = Math.floor(items.length / numBatches);
  const extraItems = items.length % numBatches;

  const batches: T[][] = [];
  let start = 0;
  for (let i = 0; i < numBatches; i++) {
    const size = baseSize + (i < extraItems ? 1 : 0);
    batches.push(items.slice(start, start + size));
    start += size;
  }
  return batches;
}
