import { test } from 'node:test';
import assert from 'node:assert';
import {
  analyzeDistribution,
  codePointSum,
  createUniversalHash,
  defaultHash,
  divisionMethodHash,
  djb2Hash,
  fnv1aHash,
  multiplicationMethodHash,
  polynomialHash,
  polynomialRollingHash,
  sameValueZero
} from '../src/hashing/index.js';

test('polynomialHash: base 31', () => {
  assert.strictEqual(polynomialHash(''), 0);
  assert.strictEqual(polynomialHash('a'), 97);
  assert.strictEqual(polynomialHash('abc'), 96354);
});

test('polynomialHash: wraps to 32 bits', () => {
  const hash = polynomialHash('the quick brown fox jumps over the lazy dog');
  assert.ok(Number.isInteger(hash));
  assert.ok(hash >= 0 && hash < 2 ** 32);
});

test('polynomialRollingHash: sum of c * 31^i', () => {
  // 97 + 98 * 31 + 99 * 961
  assert.strictEqual(polynomialRollingHash('abc'), 98274);
  assert.strictEqual(polynomialRollingHash('abc', 2, 1000), (97 + 98 * 2 + 99 * 4) % 1000);
});

test('polynomialRollingHash: rejects parameters that would lose precision', () => {
  assert.throws(() => polynomialRollingHash('abc', 31, 2 ** 32), RangeError);
  assert.throws(() => polynomialRollingHash('abc', 2 ** 30), RangeError);
  assert.throws(() => polynomialRollingHash('abc', 31, 0), RangeError);
  assert.throws(() => polynomialRollingHash('', 1.5), RangeError);
  // largest allowed modulus with a small base
  assert.strictEqual(polynomialRollingHash('a', 31, 2 ** 31), 97);
});

test('djb2Hash: seeded with 5381', () => {
  assert.strictEqual(djb2Hash(''), 5381);
  assert.strictEqual(djb2Hash('a'), 177670);
  assert.strictEqual(djb2Hash('ab'), 5863208);
});

test('fnv1aHash: 32-bit reference values', () => {
  assert.strictEqual(fnv1aHash(''), 0x811c9dc5);
  assert.strictEqual(fnv1aHash('a'), 0xe40c292c);
  assert.strictEqual(fnv1aHash('foobar'), 0xbf9cf968);
});

test('codePointSum: counts astral characters once', () => {
  assert.strictEqual(codePointSum('ab'), 195);
  assert.strictEqual(codePointSum('\u{1F600}'), 0x1f600);
});

test('divisionMethodHash: k mod m', () => {
  assert.strictEqual(divisionMethodHash('abc', 7), 96354 % 7);
  assert.strictEqual(divisionMethodHash(10, 7), 3);
  assert.throws(() => divisionMethodHash('abc', 0), RangeError);
});

test('multiplicationMethodHash: stays inside the table', () => {
  assert.strictEqual(multiplicationMethodHash(0, 13), 0);
  for (let k = 0; k < 50; k++) {
    const hash = multiplicationMethodHash(k, 13);
    assert.ok(Number.isInteger(hash) && hash >= 0 && hash < 13, `hash(${k}) = ${hash}`);
  }
  assert.throws(() => multiplicationMethodHash('abc', -1), RangeError);
});

test('createUniversalHash: (a * k + b) mod p', () => {
  const hash = createUniversalHash({ a: 3, b: 7, prime: 101 });
  assert.strictEqual(hash(10), 37);
  // 'ab' -> 97 + 98 = 195; 3 * 195 + 7 = 592; 592 mod 101 = 87
  assert.strictEqual(hash('ab'), 87);
});

test('createUniversalHash: exact for large keys', () => {
  const hash = createUniversalHash({ a: 1_000_000_006, b: 5, prime: 1_000_000_007 });
  // a = -1 mod p, so h(k) = (5 - k) mod p
  assert.strictEqual(hash(4_000_000_000), Number((5n - 4_000_000_000n + 4n * 1_000_000_007n) % 1_000_000_007n));
});

test('createUniversalHash: validates parameters', () => {
  assert.throws(() => createUniversalHash({ a: 3, b: 7, prime: 100 }), RangeError);
  assert.throws(() => createUniversalHash({ a: 0, b: 7, prime: 101 }), RangeError);
  assert.throws(() => createUniversalHash({ a: 3, b: 101, prime: 101 }), RangeError);
});

test('defaultHash: primitives', () => {
  assert.strictEqual(defaultHash('abc'), 96354);
  assert.strictEqual(defaultHash(42), 42);
  assert.strictEqual(defaultHash(-42), 42);
  assert.strictEqual(defaultHash(0), defaultHash(-0));
  assert.strictEqual(defaultHash(2 ** 32 + 5), 5);
  assert.strictEqual(defaultHash(1.5), polynomialHash('1.5'));
  assert.strictEqual(defaultHash(Number.NaN), polynomialHash('NaN'));
  assert.strictEqual(defaultHash(10n), polynomialHash('10'));
  assert.strictEqual(defaultHash(true), 1);
  assert.strictEqual(defaultHash(false), 0);
  assert.strictEqual(defaultHash(null), 0);
  assert.strictEqual(defaultHash(undefined), 0);
});

test('defaultHash: references hash by identity', () => {
  const first = { id: 1 };
  const second = { id: 1 };
  const fn = (): void => {};
  const sym = Symbol('key');

  assert.strictEqual(defaultHash(first), defaultHash(first));
  assert.notStrictEqual(defaultHash(first), defaultHash(second));
  assert.strictEqual(defaultHash(fn), defaultHash(fn));
  assert.strictEqual(defaultHash(sym), defaultHash(sym));
  assert.notStrictEqual(defaultHash(sym), defaultHash(Symbol('key')));
});

test('sameValueZero: Map key equality', () => {
  assert.strictEqual(sameValueZero(Number.NaN, Number.NaN), true);
  assert.strictEqual(sameValueZero(0, -0), true);
  assert.strictEqual(sameValueZero('a', 'a'), true);
  assert.strictEqual(sameValueZero('a', 'b'), false);
  assert.strictEqual(sameValueZero({}, {}), false);
});

test('analyzeDistribution: uniform spread', () => {
  const report = analyzeDistribution([0, 1, 2, 3, 4, 5, 6], (k) => k, 7);
  assert.deepStrictEqual(report, { counts: [1, 1, 1, 1, 1, 1, 1], mean: 1, stdDev: 0 });
});

test('analyzeDistribution: everything in one bucket', () => {
  const report = analyzeDistribution([0, 7, 14], (k) => k, 7);
  assert.deepStrictEqual(report.counts, [3, 0, 0, 0, 0, 0, 0]);
  assert.strictEqual(report.mean, 3 / 7);
  // ((18/7)^2 + 6 * (3/7)^2) / 7 = 54/49
  assert.ok(Math.abs(report.stdDev - Math.sqrt(54) / 7) < 1e-12);
});

test('analyzeDistribution: rejects hashes outside the contract', () => {
  assert.throws(() => analyzeDistribution(['a', 'b', 'c'], () => -1, 3), TypeError);
  assert.throws(() => analyzeDistribution(['a'], () => 1.5, 3), TypeError);
});

test('analyzeDistribution: rejects bad table sizes', () => {
  assert.throws(() => analyzeDistribution(['a'], polynomialHash, 0), RangeError);
});
