/**
 * Core constants for Strata data structures
 */

// Bit-trie parameters (32-way branching)
export const BITS = 5;
export const BRANCH_FACTOR = 1 << BITS; // 32
export const MASK = BRANCH_FACTOR - 1;  // 31

// Sentinel for "key not present"; never stored by any collection
export const NOT_FOUND: unique symbol = Symbol('strata.notFound');
export type NotFound = typeof NOT_FOUND;

// Hash seeds for collection families (keep ordered/unordered hashes apart)
export const SEQ_HASH_SEED = 0x1b873593;
export const MAP_HASH_SEED = 0x2f3b5a91;
export const SET_HASH_SEED = 0x6d4a7c15;

// Lazy count warns past this many realized cells
export const COUNT_WARN_THRESHOLD = 10000;
