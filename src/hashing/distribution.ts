import type { DistributionReport, HashFunction } from '../types/index.js';

/**
 * Count how many keys land in each of `tableSize` buckets under `hash`,
 * with the population standard deviation of those counts (lower is more uniform).
 */
export function analyzeDistribution<K>(
  keys: Iterable<K>,
  hash: HashFunction<K>,
  tableSize: number
): DistributionReport {
  if (!Number.isInteger(tableSize) || tableSize <= 0) {
    throw new RangeError(`tableSize must be a positive integer, got ${tableSize}`);
  }

  const counts: number[] = new Array(tableSize).fill(0);
  let total = 0;
  for (const key of keys) {
    const h = hash(key);
    if (!Number.isSafeInteger(h) || h < 0) {
      throw new TypeError(`hash function must return a non-negative safe integer, got ${h}`);
    }
    counts[h % tableSize]++;
    total++;
  }

  const mean = total / tableSize;
  let variance = 0;
  for (const count of counts) {
    variance += (count - mean) ** 2;
  }
  variance /= tableSize;

  return { counts, mean, stdDev: Math.sqrt(variance) };
}
