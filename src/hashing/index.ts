/**
 * Hashing
 *
 * The table only needs a HashFunction<K> and a KeyEquals<K>. This module supplies
 * the defaults plus the classic families for experimenting with bucket spread:
 * - defaultHash / sameValueZero: work for any key, match Map semantics
 * - polynomial, rolling, DJB2, FNV-1a: string hashes
 * - division, multiplication, universal: the textbook reduction methods
 * - analyzeDistribution: bucket counts and their spread for a key set
 */

export { defaultHash, sameValueZero } from './defaults.js';
export {
  polynomialHash,
  polynomialRollingHash,
  djb2Hash,
  fnv1aHash,
  codePointSum
} from './strings.js';
export { divisionMethodHash, multiplicationMethodHash, createUniversalHash } from './methods.js';
export { analyzeDistribution } from './distribution.js';
