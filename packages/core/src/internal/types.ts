/**
 * Core type definitions
 */

// Transient owner: a token held by one bulk build while its nodes are private
export type Owner = object | undefined;

// Bit-trie inner node: fixed-fanout child slots, each empty or a node
export interface InnerNode<T> {
  kind: 'inner';
  owner?: Owner;
  children: Array<TrieNode<T> | undefined>;
}

// Bit-trie leaf node: up to BRANCH_FACTOR stored values
export interface LeafNode<T> {
  kind: 'leaf';
  owner?: Owner;
  values: T[];
}

export type TrieNode<T> = InnerNode<T> | LeafNode<T>;

// Bit-trie persistent vector
export interface Vec<T> {
  count: number;
  // trie depth × BITS, never below BITS
  shift: number;
  root: TrieNode<T>;
  tail: T[];
  treeCount: number;
  tailOwner?: Owner;
}
