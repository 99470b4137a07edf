import type { GrowthPolicy } from '../types/index.js';

/**
 * String form of a key or value for messages and dumps.
 * Values without a primitive conversion (null-prototype objects, a throwing
 * toString) fall back to their `[object Tag]` form.
 */
export function formatValue(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

/**
 * Trial division up to sqrt(n).
 */
export function isPrime(n: number): boolean {
  if (!Number.isInteger(n) || n < 2) {
    return false;
  }
  if (n % 2 === 0) {
    return n === 2;
  }
  for (let i = 3; i * i <= n; i += 2) {
    if (n % i === 0) {
      return false;
    }
  }
  return true;
}

/**
 * Smallest prime >= n.
 */
export function nextPrime(n: number): number {
  let candidate = Math.max(2, Math.ceil(n));
  while (!isPrime(candidate)) {
    candidate++;
  }
  return candidate;
}

/**
 * Compute the capacity to grow to so that `population` entries stay within the threshold.
 * Always at least doubles the current capacity.
 */
export function growCapacity(
  capacity: number,
  population: number,
  threshold: number,
  policy: GrowthPolicy
): number {
  let next = capacity;
  do {
    next = policy === 'prime' ? nextPrime(next * 2) : next * 2;
  } while (population / next > threshold);
  return next;
}
