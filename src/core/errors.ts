import { formatValue } from './utils.js';

/**
 * Raised by lookups and deletes when the key is absent.
 * This is an expected outcome; use `get` or `contains` to avoid it.
 */
export class KeyNotFoundError<K = unknown> extends Error {
  readonly code = 'NOTFOUND';
  readonly key: K;

  constructor(key: K) {
    super(`Key not found: ${formatValue(key)}`);
    this.name = 'KeyNotFoundError';
    this.key = key;
  }
}
