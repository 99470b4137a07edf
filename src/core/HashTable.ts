import { ChainNode } from './ChainNode.js';
import { KeyNotFoundError } from './errors.js';
import { growCapacity } from './utils.js';
import { defaultHash, sameValueZero } from '../hashing/index.js';
import type {
  GrowthPolicy,
  HashFunction,
  HashTableOptions,
  HashTableStats,
  KeyEquals
} from '../types/index.js';

const DEFAULT_CAPACITY = 7;
const DEFAULT_LOAD_FACTOR = 0.75;

/**
 * HashTable with separate chaining
 *
 * - buckets[i] is the head of a singly-linked chain of ChainNodes whose keys hash to i
 * - bucket index = hash(key) % capacity
 * - a new key whose insertion would push size / capacity over the threshold first
 *   grows the bucket array (at least doubling it) and relinks every node
 *
 * Resize happens before the new node is linked, so the load factor never exceeds the
 * threshold once insert returns. The table never shrinks.
 */
export class HashTable<K, V> implements Iterable<[K, V]> {
  private buckets: (ChainNode<K, V> | null)[];
  private count: number;
  private readonly threshold: number;
  private readonly growth: GrowthPolicy;
  private readonly hashFn: HashFunction<K>;
  private readonly equals: KeyEquals<K>;

  private stats = {
    hits: 0,
    misses: 0,
    resizes: 0,
  };

  constructor(options: HashTableOptions<K> = {}) {
    const initialCapacity = options.initialCapacity ?? DEFAULT_CAPACITY;
    const threshold = options.loadFactorThreshold ?? DEFAULT_LOAD_FACTOR;
    const growth = options.growth ?? 'double';

    if (!Number.isInteger(initialCapacity) || initialCapacity <= 0) {
      throw new RangeError(`initialCapacity must be a positive integer, got ${initialCapacity}`);
    }
    if (!Number.isFinite(threshold) || threshold <= 0) {
      throw new RangeError(`loadFactorThreshold must be a positive number, got ${threshold}`);
    }
    if (growth !== 'double' && growth !== 'prime') {
      throw new RangeError(`growth must be 'double' or 'prime', got ${String(growth)}`);
    }

    this.buckets = new Array(initialCapacity).fill(null);
    this.count = 0;
    this.threshold = threshold;
    this.growth = growth;
    this.hashFn = options.hash ?? defaultHash;
    this.equals = options.equals ?? sameValueZero;
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.buckets.length;
  }

  get loadFactor(): number {
    return this.count / this.buckets.length;
  }

  get loadFactorThreshold(): number {
    return this.threshold;
  }

  /**
   * Hash a key, enforcing the non-negative safe integer contract.
   */
  private _hash(key: K): number {
    const hash = this.hashFn(key);
    if (!Number.isSafeInteger(hash) || hash < 0) {
      throw new TypeError(`hash function must return a non-negative safe integer, got ${hash}`);
    }
    return hash;
  }

  private _index(key: K): number {
    return this._hash(key) % this.buckets.length;
  }

  private _findNode(key: K): ChainNode<K, V> | null {
    let current = this.buckets[this._index(key)];
    while (current) {
      if (this.equals(current.key, key)) {
        return current;
      }
      current = current.next;
    }
    return null;
  }

  /**
   * Grow so that `population` entries fit under the threshold, relinking every node.
   * All hashes are computed up front: if the hash function throws,
   * the old bucket array is still in place.
   */
  private _resize(population: number): void {
    const newCapacity = growCapacity(this.buckets.length, population, this.threshold, this.growth);

    const nodes: ChainNode<K, V>[] = [];
    const hashes: number[] = [];
    for (const head of this.buckets) {
      for (let node = head; node; node = node.next) {
        nodes.push(node);
        hashes.push(this._hash(node.key));
      }
    }

    const newBuckets: (ChainNode<K, V> | null)[] = new Array(newCapacity).fill(null);
    for (let i = 0; i < nodes.length; i++) {
      const node = nodes[i];
      const index = hashes[i] % newCapacity;
      node.next = newBuckets[index];
      newBuckets[index] = node;
    }

    this.buckets = newBuckets;
    this.stats.resizes++;
  }

  /**
   * Insert or update. Returns the previous value for an existing key, otherwise undefined.
   */
  insert(key: K, value: V): V | undefined {
    let index = this._index(key);

    let tail: ChainNode<K, V> | null = null;
    for (let current = this.buckets[index]; current; current = current.next) {
      if (this.equals(current.key, key)) {
        const previous = current.value;
        current.value = value;
        return previous;
      }
      tail = current;
    }

    if ((this.count + 1) / this.buckets.length > this.threshold) {
      this._resize(this.count + 1);
      index = this._index(key);
      // Chains were rebuilt; find the new tail.
      tail = this.buckets[index];
      while (tail && tail.next) {
        tail = tail.next;
      }
    }

    const node = new ChainNode(key, value);
    if (tail) {
      tail.next = node;
    } else {
      this.buckets[index] = node;
    }
    this.count++;
    return undefined;
  }

  /**
   * Value for key. Throws KeyNotFoundError when absent.
   */
  search(key: K): V {
    const node = this._findNode(key);
    if (!node) {
      this.stats.misses++;
      throw new KeyNotFoundError(key);
    }
    this.stats.hits++;
    return node.value;
  }

  /**
   * Value for key, or undefined when absent.
   */
  get(key: K): V | undefined {
    const node = this._findNode(key);
    if (!node) {
      this.stats.misses++;
      return undefined;
    }
    this.stats.hits++;
    return node.value;
  }

  contains(key: K): boolean {
    const found = this._findNode(key) !== null;
    if (found) {
      this.stats.hits++;
    } else {
      this.stats.misses++;
    }
    return found;
  }

  /**
   * Unlink key and return its value. Throws KeyNotFoundError when absent.
   */
  delete(key: K): V {
    const index = this._index(key);

    let previous: ChainNode<K, V> | null = null;
    for (let current = this.buckets[index]; current; current = current.next) {
      if (this.equals(current.key, key)) {
        if (previous) {
          previous.next = current.next;
        } else {
          this.buckets[index] = current.next;
        }
        current.next = null;
        this.count--;
        return current.value;
      }
      previous = current;
    }

    this.stats.misses++;
    throw new KeyNotFoundError(key);
  }

  /**
   * Drop every entry. Capacity and statistics are kept.
   */
  clear(): void {
    this.buckets = new Array(this.buckets.length).fill(null);
    this.count = 0;
  }

  /**
   * Keys in bucket order, then chain order.
   */
  getAllKeys(): K[] {
    const keys: K[] = [];
    for (const head of this.buckets) {
      for (let node = head; node; node = node.next) {
        keys.push(node.key);
      }
    }
    return keys;
  }

  /**
   * Values in the same order as getAllKeys().
   */
  getAllValues(): V[] {
    const values: V[] = [];
    for (const head of this.buckets) {
      for (let node = head; node; node = node.next) {
        values.push(node.value);
      }
    }
    return values;
  }

  items(): [K, V][] {
    const items: [K, V][] = [];
    for (const head of this.buckets) {
      for (let node = head; node; node = node.next) {
        items.push([node.key, node.value]);
      }
    }
    return items;
  }

  /**
   * Iterates a snapshot, so the table may be mutated mid-loop.
   */
  *entries(): IterableIterator<[K, V]> {
    yield* this.items();
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  /**
   * Chain length of every bucket.
   */
  bucketSizes(): number[] {
    return this.buckets.map((head) => {
      let length = 0;
      for (let node = head; node; node = node.next) {
        length++;
      }
      return length;
    });
  }

  getStats(): HashTableStats {
    const sizes = this.bucketSizes();
    return {
      ...this.stats,
      size: this.count,
      capacity: this.buckets.length,
      loadFactor: this.loadFactor,
      longestChain: sizes.reduce((longest, length) => Math.max(longest, length), 0),
      emptyBuckets: sizes.filter((length) => length === 0).length,
    };
  }

  /**
   * Print the table, one line per non-empty bucket.
   */
  display(log: (line: string) => void = console.log): void {
    log(`Hash Table (size: ${this.count}, capacity: ${this.buckets.length}, load factor: ${this.loadFactor.toFixed(3)})`);
    this.buckets.forEach((head, index) => {
      if (!head) {
        return;
      }
      const chain: string[] = [];
      for (let node: ChainNode<K, V> | null = head; node; node = node.next) {
        chain.push(node.toString());
      }
      log(`  Bucket ${index}: ${chain.join(' -> ')}`);
    });
  }
}
