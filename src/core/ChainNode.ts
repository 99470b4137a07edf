import { formatValue } from './utils.js';

/**
 * Chain Node
 * Holds one key/value pair and the link to the next node in the same bucket.
 * A node is referenced only by its predecessor: the bucket head or the previous node.
 */
export class ChainNode<K, V> {
  key: K;
  value: V;
  next: ChainNode<K, V> | null;

  constructor(key: K, value: V, next: ChainNode<K, V> | null = null) {
    this.key = key;
    this.value = value;
    this.next = next;
  }

  toString(): string {
    return `(${formatValue(this.key)}: ${formatValue(this.value)})`;
  }
}
