/**
 * HAMT - Hash Array Mapped Trie
 * Bitmap-indexed trie for hash maps and hash sets. Keys are compared
 * structurally (`equals`) and hashed consistently with it (`hash`).
 */

import { equals, hash } from '../equiv';
import { BITS, MASK } from './constants';
import { popcount } from './utils';
import type { Owner } from './types';

// ===== Types =====

export interface HLeaf<K, V> {
  kind: 'leaf';
  key: K;
  hash: number;
  value: V;
}

export interface HCollision<K, V> {
  kind: 'collision';
  hash: number;
  entries: HLeaf<K, V>[];
}

export interface HNode<K, V> {
  kind: 'node';
  owner?: Owner;
  bitmap: number;
  children: HChild<K, V>[];
}

export type HChild<K, V> = HLeaf<K, V> | HCollision<K, V> | HNode<K, V>;

export interface HMap<K, V> {
  root: HChild<K, V> | null;
  size: number;
}

export function hamtEmpty<K, V>(): HMap<K, V> {
  return { root: null, size: 0 };
}

function ensureEditableHNode<K, V>(node: HNode<K, V>, owner: Owner): HNode<K, V> {
  if (owner && node.owner === owner) return node;
  return {
    kind: 'node',
    owner,
    bitmap: node.bitmap,
    children: node.children.slice(),
  };
}

function leafOf<K, V>(hash: number, key: K, value: V): HLeaf<K, V> {
  return { kind: 'leaf', key, hash, value };
}

function mergeLeaves<K, V>(
  leaf1: HLeaf<K, V>,
  leaf2: HLeaf<K, V>,
  owner: Owner,
  shift: number
): HNode<K, V> {
  const idx1 = (leaf1.hash >>> shift) & MASK;
  const idx2 = (leaf2.hash >>> shift) & MASK;

  if (idx1 === idx2) {
    return {
      kind: 'node',
      owner,
      bitmap: 1 << idx1,
      children: [mergeLeaves(leaf1, leaf2, owner, shift + BITS)],
    };
  }
  return {
    kind: 'node',
    owner,
    bitmap: (1 << idx1) | (1 << idx2),
    children: idx1 < idx2 ? [leaf1, leaf2] : [leaf2, leaf1],
  };
}

function collisionIndex<K, V>(node: HCollision<K, V>, key: K): number {
  const entries = node.entries;
  for (let i = 0; i < entries.length; i++) {
    if (equals(entries[i].key, key)) return i;
  }
  return -1;
}

// ===== Insert / Remove =====

function hamtInsert<K, V>(
  node: HChild<K, V> | null,
  owner: Owner,
  hash: number,
  key: K,
  value: V,
  shift: number
): { node: HChild<K, V>; added: boolean; changed: boolean } {
  if (!node) {
    return { node: leafOf(hash, key, value), added: true, changed: true };
  }

  if (node.kind === 'leaf') {
    if (node.hash === hash && equals(node.key, key)) {
      if (node.value === value) {
        return { node, added: false, changed: false };
      }
      // The stored key stays; only the value is replaced
      return { node: leafOf(hash, node.key, value), added: false, changed: true };
    }

    if (node.hash === hash) {
      return {
        node: { kind: 'collision', hash, entries: [node, leafOf(hash, key, value)] },
        added: true,
        changed: true,
      };
    }

    return {
      node: mergeLeaves(node, leafOf(hash, key, value), owner, shift),
      added: true,
      changed: true,
    };
  }

  if (node.kind === 'collision') {
    if (node.hash !== hash) {
      // A different hash can live beside the collision bucket one level down
      const holder: HNode<K, V> = {
        kind: 'node',
        owner,
        bitmap: 1 << ((node.hash >>> shift) & MASK),
        children: [node],
      };
      return hamtInsert(holder, owner, hash, key, value, shift);
    }

    const idx = collisionIndex(node, key);
    if (idx >= 0) {
      const existing = node.entries[idx];
      if (existing.value === value) {
        return { node, added: false, changed: false };
      }
      const entries = node.entries.slice();
      entries[idx] = leafOf(hash, existing.key, value);
      return { node: { kind: 'collision', hash, entries }, added: false, changed: true };
    }
    return {
      node: { kind: 'collision', hash, entries: [...node.entries, leafOf(hash, key, value)] },
      added: true,
      changed: true,
    };
  }

  const idx = (hash >>> shift) & MASK;
  const bit = 1 << idx;
  const packedIdx = popcount(node.bitmap & (bit - 1));

  if ((node.bitmap & bit) === 0) {
    const editable = ensureEditableHNode(node, owner);
    editable.children.splice(packedIdx, 0, leafOf(hash, key, value));
    editable.bitmap |= bit;
    return { node: editable, added: true, changed: true };
  }

  const res = hamtInsert(node.children[packedIdx], owner, hash, key, value, shift + BITS);
  if (!res.changed) {
    return { node, added: false, changed: false };
  }

  const editable = ensureEditableHNode(node, owner);
  editable.children[packedIdx] = res.node;
  return { node: editable, added: res.added, changed: true };
}

function hamtRemove<K, V>(
  node: HChild<K, V>,
  owner: Owner,
  hash: number,
  key: K,
  shift: number
): { node: HChild<K, V> | null; removed: boolean } {
  if (node.kind === 'leaf') {
    if (node.hash === hash && equals(node.key, key)) {
      return { node: null, removed: true };
    }
    return { node, removed: false };
  }

  if (node.kind === 'collision') {
    const idx = node.hash === hash ? collisionIndex(node, key) : -1;
    if (idx === -1) return { node, removed: false };
    const entries = node.entries.slice();
    entries.splice(idx, 1);
    if (entries.length === 1) {
      return { node: entries[0], removed: true };
    }
    return { node: { kind: 'collision', hash, entries }, removed: true };
  }

  const idx = (hash >>> shift) & MASK;
  const bit = 1 << idx;
  if ((node.bitmap & bit) === 0) {
    return { node, removed: false };
  }

  const packedIdx = popcount(node.bitmap & (bit - 1));
  const res = hamtRemove(node.children[packedIdx], owner, hash, key, shift + BITS);
  if (!res.removed) return { node, removed: false };

  if (res.node === null) {
    const bitmap = node.bitmap ^ bit;
    if (bitmap === 0) {
      return { node: null, removed: true };
    }
    const children = node.children.slice();
    children.splice(packedIdx, 1);

    // A lone leaf or bucket carries its full hash and can move up
    if (children.length === 1 && children[0].kind !== 'node') {
      return { node: children[0], removed: true };
    }
    return { node: { kind: 'node', owner, bitmap, children }, removed: true };
  }

  const editable = ensureEditableHNode(node, owner);
  editable.children[packedIdx] = res.node;
  return { node: editable, removed: true };
}

// ===== Lookup =====

/**
 * The stored entry for `key`, or `undefined` when absent. Presence is
 * answered by the entry itself, so a stored `undefined` value is still found.
 */
export function hamtFind<K, V>(map: HMap<K, V>, key: K): HLeaf<K, V> | undefined {
  let node = map.root;
  if (!node) return undefined;

  const h = hash(key);
  let shift = 0;

  while (node) {
    if (node.kind === 'leaf') {
      return node.hash === h && equals(node.key, key) ? node : undefined;
    }
    if (node.kind === 'collision') {
      if (node.hash !== h) return undefined;
      const idx = collisionIndex(node, key);
      return idx === -1 ? undefined : node.entries[idx];
    }
    const bit = 1 << ((h >>> shift) & MASK);
    if ((node.bitmap & bit) === 0) return undefined;
    node = node.children[popcount(node.bitmap & (bit - 1))];
    shift += BITS;
  }

  return undefined;
}

// ===== Update =====

export function hamtSet<K, V>(map: HMap<K, V>, owner: Owner, key: K, value: V): HMap<K, V> {
  const res = hamtInsert(map.root, owner, hash(key), key, value, 0);
  if (!res.changed) return map;
  return {
    root: res.node,
    size: map.size + (res.added ? 1 : 0),
  };
}

export function hamtDelete<K, V>(map: HMap<K, V>, owner: Owner, key: K): HMap<K, V> {
  if (!map.root) return map;
  const res = hamtRemove(map.root, owner, hash(key), key, 0);
  if (!res.removed) return map;
  return {
    root: res.node,
    size: map.size - 1,
  };
}

/**
 * Bulk build with a private owner token: nodes created during the build
 * are edited in place, later entries win.
 */
export function hamtFromEntries<K, V>(entries: Iterable<readonly [K, V]>): HMap<K, V> {
  let map = hamtEmpty<K, V>();
  const owner: Owner = {};
  for (const [k, v] of entries) {
    map = hamtSet(map, owner, k, v);
  }
  return map;
}

// ===== Iteration =====

export function* hamtIter<K, V>(map: HMap<K, V>): IterableIterator<readonly [K, V]> {
  const root = map.root;
  if (!root) return;

  const stack: HChild<K, V>[] = [root];
  let node = stack.pop();
  while (node) {
    if (node.kind === 'leaf') {
      yield [node.key, node.value];
    } else if (node.kind === 'collision') {
      for (const leaf of node.entries) {
        yield [leaf.key, leaf.value];
      }
    } else {
      const children = node.children;
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push(children[i]);
      }
    }
    node = stack.pop();
  }
}
