/**
 * Shared type definitions
 */

/**
 * Maps a key to a non-negative safe integer.
 * Keys that are equal under the table's equality predicate must hash equally.
 */
export type HashFunction<K> = (key: K) => number;

export type KeyEquals<K> = (a: K, b: K) => boolean;

export type GrowthPolicy = 'double' | 'prime';

export interface HashTableOptions<K> {
  initialCapacity?: number;
  loadFactorThreshold?: number;
  growth?: GrowthPolicy;
  hash?: HashFunction<K>;
  equals?: KeyEquals<K>;
}

export interface HashTableStats {
  size: number;
  capacity: number;
  loadFactor: number;
  hits: number;
  misses: number;
  resizes: number;
  longestChain: number;
  emptyBuckets: number;
}

export interface DistributionReport {
  counts: number[];
  mean: number;
  stdDev: number;
}

export interface UniversalHashParams {
  a: number;
  b: number;
  prime: number;
}
