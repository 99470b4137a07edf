/**
 * Classic string hash functions.
 * All of them walk Unicode code points and return unsigned 32-bit integers,
 * except the rolling hash which reduces by its own modulus.
 */

const FNV_OFFSET_BASIS = 2166136261;
const FNV_PRIME = 16777619;
const DJB2_SEED = 5381;
const MAX_ROLLING_MOD = 2 ** 31;

/**
 * h = h * 31 + c, modulo 2^32.
 */
export function polynomialHash(str: string): number {
  let hash = 0;
  for (const ch of str) {
    hash = (Math.imul(hash, 31) + codePoint(ch)) >>> 0;
  }
  return hash;
}

/**
 * Sum of c_i * base^i, modulo `mod`.
 * `mod` is capped at 2^31 and base * (mod - 1) must be a safe integer,
 * which keeps every intermediate product exact.
 */
export function polynomialRollingHash(str: string, base: number = 31, mod: number = 1_000_000_007): number {
  if (!Number.isInteger(mod) || mod < 1 || mod > MAX_ROLLING_MOD) {
    throw new RangeError(`mod must be an integer in [1, 2^31], got ${mod}`);
  }
  if (!Number.isInteger(base) || base < 0 || !Number.isSafeInteger(base * (mod - 1))) {
    throw new RangeError(`base must be a non-negative integer with base * (mod - 1) <= 2^53 - 1, got ${base}`);
  }

  let hash = 0;
  let power = 1;
  for (const ch of str) {
    hash = (hash + codePoint(ch) * power) % mod;
    power = (power * base) % mod;
  }
  return hash;
}

/**
 * DJB2: h = h * 33 + c, seeded with 5381.
 */
export function djb2Hash(str: string): number {
  let hash = DJB2_SEED;
  for (const ch of str) {
    hash = (Math.imul(hash, 33) + codePoint(ch)) >>> 0;
  }
  return hash;
}

/**
 * FNV-1a, 32-bit.
 */
export function fnv1aHash(str: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (const ch of str) {
    hash ^= codePoint(ch);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
}

/**
 * Sum of code points. Used as the numeric form of a string by the universal family.
 */
export function codePointSum(str: string): number {
  let sum = 0;
  for (const ch of str) {
    sum += codePoint(ch);
  }
  return sum;
}

function codePoint(ch: string): number {
  return ch.codePointAt(0) ?? 0;
}
