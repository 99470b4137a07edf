export { HashTable } from './HashTable.js';
export { ChainNode } from './ChainNode.js';
export { KeyNotFoundError } from './errors.js';
export { isPrime, nextPrime, growCapacity, formatValue } from './utils.js';
