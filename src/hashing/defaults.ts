import { polynomialHash } from './strings.js';

const UINT32_RANGE = 2 ** 32;

/**
 * Identity hashes for reference-typed keys, assigned on first sight.
 * Objects live in a WeakMap so hashing a key never keeps it alive.
 */
const objectIds = new WeakMap<object, number>();
const symbolIds = new Map<symbol, number>();
let nextIdentity = 1;

function identityOf(key: object): number {
  let id = objectIds.get(key);
  if (id === undefined) {
    id = nextIdentity++;
    objectIds.set(key, id);
  }
  return id;
}

function symbolIdentity(key: symbol): number {
  let id = symbolIds.get(key);
  if (id === undefined) {
    id = nextIdentity++;
    symbolIds.set(key, id);
  }
  return id;
}

/**
 * Equality used by Map and Set: `===`, except NaN equals NaN.
 */
export function sameValueZero<K>(a: K, b: K): boolean {
  return a === b || (a !== a && b !== b);
}

/**
 * Hash for any key, consistent with `sameValueZero`.
 *
 * - strings: polynomial hash (base 31, mod 2^32)
 * - integral numbers: |n| mod 2^32, so 0 and -0 agree
 * - other numbers, bigints: hash of their string form
 * - booleans: 1 / 0; null and undefined: 0
 * - objects, functions, symbols: per-reference identity
 */
export function defaultHash(key: unknown): number {
  switch (typeof key) {
    case 'string':
      return polynomialHash(key);
    case 'number':
      if (Number.isInteger(key)) {
        return Math.abs(key) % UINT32_RANGE;
      }
      return polynomialHash(String(key));
    case 'bigint':
      return polynomialHash(key.toString());
    case 'boolean':
      return key ? 1 : 0;
    case 'symbol':
      return symbolIdentity(key);
    case 'undefined':
      return 0;
    case 'function':
      return identityOf(key);
    default:
      return typeof key === 'object' && key !== null ? identityOf(key) : 0;
  }
}
