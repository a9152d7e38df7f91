export const DEFAULT_BATCH_SIZE = 500;

/**
 * Split `items` into consecutive groups of `size`; only the last may be shorter.
 */
export function chunk<T>(items: readonly T[], size = DEFAULT_BATCH_SIZE): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError('Expected `size` to be an integer >= 1');
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export default chunk;
