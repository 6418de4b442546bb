/**
 * Ranking helpers shared by both aggregation levels.
 */

/**
 * Orders codes by UTF-16 code unit, independent of locale.
 */
export const compareCodes = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Splits `total` ranked positions into `bucketCount` contiguous buckets and
 * returns the 1-based bucket of each position.
 *
 * Bucket sizes differ by at most one and the larger buckets come first: with
 * 23 positions and 10 buckets, buckets 1-3 hold 3 positions and 4-10 hold 2.
 * With fewer positions than buckets, position i falls in bucket i + 1.
 */
export function quantileBuckets(total: number, bucketCount: number): number[] {
  if (!Number.isInteger(bucketCount) || bucketCount < 1) {
    throw new RangeError(`bucketCount must be a positive integer, got ${String(bucketCount)}`);
  }

  const smallSize = Math.floor(total / bucketCount);
  const largeCount = total % bucketCount;
  const largeSpan = largeCount * (smallSize + 1);

  const buckets: number[] = [];
  for (let position = 0; position < total; position++) {
    if (position < largeSpan) {
      buckets.push(Math.floor(position / (smallSize + 1)) + 1);
    } else {
      buckets.push(largeCount + Math.floor((position - largeSpan) / smallSize) + 1);
    }
  }

  return buckets;
}
