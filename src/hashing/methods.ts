import { defaultHash } from './defaults.js';
import { codePointSum, polynomialHash } from './strings.js';
import { isPrime } from '../core/utils.js';
import type { UniversalHashParams } from '../types/index.js';

/** (√5 - 1) / 2 */
const GOLDEN_RATIO_FRACTION = 0.6180339887;

function numericKey(key: string | number): number {
  return typeof key === 'string' ? polynomialHash(key) : defaultHash(key);
}

function assertTableSize(tableSize: number): void {
  if (!Number.isInteger(tableSize) || tableSize <= 0) {
    throw new RangeError(`tableSize must be a positive integer, got ${tableSize}`);
  }
}

/**
 * Division method: k mod m.
 */
export function divisionMethodHash(key: string | number, tableSize: number): number {
  assertTableSize(tableSize);
  return numericKey(key) % tableSize;
}

/**
 * Multiplication method: floor(m * frac(k * A)).
 * Less sensitive to the choice of m than the division method.
 */
export function multiplicationMethodHash(key: string | number, tableSize: number): number {
  assertTableSize(tableSize);
  const product = numericKey(key) * GOLDEN_RATIO_FRACTION;
  return Math.floor(tableSize * (product - Math.floor(product)));
}

/**
 * Build a member of the universal family h(k) = (a*k + b) mod p.
 * Strings are reduced to the sum of their code points first.
 */
export function createUniversalHash({ a, b, prime }: UniversalHashParams): (key: string | number) => number {
  if (!isPrime(prime)) {
    throw new RangeError(`prime must be a prime number, got ${prime}`);
  }
  if (!Number.isInteger(a) || a < 1 || a >= prime) {
    throw new RangeError(`a must be an integer in [1, ${prime}), got ${a}`);
  }
  if (!Number.isInteger(b) || b < 0 || b >= prime) {
    throw new RangeError(`b must be an integer in [0, ${prime}), got ${b}`);
  }

  const bigA = BigInt(a);
  const bigB = BigInt(b);
  const bigP = BigInt(prime);

  return (key: string | number): number => {
    const k = typeof key === 'string' ? codePointSum(key) : defaultHash(key);
    return Number((bigA * BigInt(k) + bigB) % bigP);
  };
}
