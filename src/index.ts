export { HashTable, ChainNode, KeyNotFoundError, isPrime, nextPrime, growCapacity, formatValue } from './core/index.js';
export {
  defaultHash,
  sameValueZero,
  polynomialHash,
  polynomialRollingHash,
  djb2Hash,
  fnv1aHash,
  codePointSum,
  divisionMethodHash,
  multiplicationMethodHash,
  createUniversalHash,
  analyzeDistribution
} from './hashing/index.js';
export type {
  HashFunction,
  KeyEquals,
  GrowthPolicy,
  HashTableOptions,
  HashTableStats,
  DistributionReport,
  UniversalHashParams
} from './types/index.js';
