/**
 * Vec - bit-trie persistent vector
 *
 * Elements live in 32-wide leaves under a 32-way trie, plus an unboxed tail
 * of up to 32 trailing elements. Pushes go to the tail and flush into the
 * trie one full leaf at a time, so only the right-hand path is copied.
 */

import { BITS, BRANCH_FACTOR, MASK } from './constants';
import {
  EMPTY_INNER,
  newInner,
  newLeaf,
  requireChild,
  withChildAt,
  withoutLastChild,
  withValueAt,
  childAt,
} from './node';
import type { Owner, TrieNode, Vec } from './types';

export function emptyVec<T>(): Vec<T> {
  return { count: 0, shift: BITS, root: EMPTY_INNER, tail: [], treeCount: 0 };
}

function leafFor<T>(vec: Vec<T>, index: number): T[] {
  if (index >= vec.treeCount) return vec.tail;
  let node: TrieNode<T> = vec.root;
  for (let level = vec.shift; level > 0; level -= BITS) {
    node = requireChild(node, (index >>> level) & MASK);
  }
  if (node.kind !== 'leaf') {
    throw new RangeError(`Trie path for index ${index} does not end in a leaf`);
  }
  return node.values;
}

/**
 * Element at `index`; a RangeError outside `[0, count)`.
 */
export function vecGet<T>(vec: Vec<T>, index: number): T {
  if (index < 0 || index >= vec.count) {
    throw new RangeError(`Vec index ${index} outside [0, ${vec.count})`);
  }
  return leafFor(vec, index)[index & MASK];
}

function newPath<T>(level: number, node: TrieNode<T>, owner: Owner): TrieNode<T> {
  if (level === 0) return node;
  return newInner([newPath(level - BITS, node, owner)], owner);
}

function pushTail<T>(
  parent: TrieNode<T>,
  level: number,
  firstIndex: number,
  leaf: TrieNode<T>,
  owner: Owner
): TrieNode<T> {
  const subidx = (firstIndex >>> level) & MASK;
  if (level === BITS) {
    return withChildAt(parent, subidx, leaf, owner);
  }
  const child = childAt(parent, subidx);
  const updated = child
    ? pushTail(child, level - BITS, firstIndex, leaf, owner)
    : newPath(level - BITS, leaf, owner);
  return withChildAt(parent, subidx, updated, owner);
}

export function vecPush<T>(vec: Vec<T>, owner: Owner, val: T): Vec<T> {
  const tailLen = vec.count - vec.treeCount;

  if (tailLen < BRANCH_FACTOR) {
    let tail: T[];
    if (owner && vec.tailOwner === owner) {
      tail = vec.tail;
      tail.push(val);
    } else {
      tail = vec.tail.slice();
      tail.push(val);
    }
    return {
      count: vec.count + 1,
      shift: vec.shift,
      root: vec.root,
      tail,
      treeCount: vec.treeCount,
      tailOwner: owner,
    };
  }

  // Tail is full: it becomes a leaf of the trie
  const leaf = newLeaf(vec.tailOwner === owner ? vec.tail : vec.tail.slice(), owner);
  let root: TrieNode<T>;
  let shift = vec.shift;

  if (vec.treeCount >>> BITS >= 1 << shift) {
    root = newInner([vec.root, newPath(shift, leaf, owner)], owner);
    shift += BITS;
  } else {
    root = pushTail(vec.root, shift, vec.treeCount, leaf, owner);
  }

  return {
    count: vec.count + 1,
    shift,
    root,
    tail: [val],
    treeCount: vec.treeCount + BRANCH_FACTOR,
    tailOwner: owner,
  };
}

function popTail<T>(node: TrieNode<T>, level: number, lastIndex: number, owner: Owner): TrieNode<T> | undefined {
  const subidx = (lastIndex >>> level) & MASK;
  if (level > BITS) {
    const updated = popTail(requireChild(node, subidx), level - BITS, lastIndex, owner);
    if (updated === undefined) {
      return subidx === 0 ? undefined : withoutLastChild(node, owner);
    }
    return withChildAt(node, subidx, updated, owner);
  }
  return subidx === 0 ? undefined : withoutLastChild(node, owner);
}

/**
 * Removes the last element. The caller has already checked `count > 0`.
 */
export function vecPop<T>(vec: Vec<T>, owner: Owner): { vec: Vec<T>; val: T } {
  const val = vecGet(vec, vec.count - 1);

  if (vec.count === 1) {
    return { vec: emptyVec<T>(), val };
  }

  if (vec.count - vec.treeCount > 1) {
    return {
      vec: {
        count: vec.count - 1,
        shift: vec.shift,
        root: vec.root,
        tail: vec.tail.slice(0, -1),
        treeCount: vec.treeCount,
      },
      val,
    };
  }

  // Tail would be empty: the last trie leaf becomes the tail
  const lastTreeIndex = vec.treeCount - 1;
  const tail = leafFor(vec, lastTreeIndex).slice();
  let root: TrieNode<T> = popTail(vec.root, vec.shift, lastTreeIndex, owner) ?? EMPTY_INNER;
  let shift = vec.shift;

  if (shift > BITS && root.kind === 'inner' && root.children.length === 1) {
    root = requireChild(root, 0);
    shift -= BITS;
  }

  return {
    vec: {
      count: vec.count - 1,
      shift,
      root,
      tail,
      treeCount: vec.treeCount - BRANCH_FACTOR,
    },
    val,
  };
}

function doAssoc<T>(node: TrieNode<T>, level: number, index: number, val: T, owner: Owner): TrieNode<T> {
  if (level === 0) {
    return withValueAt(node, index & MASK, val, owner);
  }
  const subidx = (index >>> level) & MASK;
  const updated = doAssoc(requireChild(node, subidx), level - BITS, index, val, owner);
  return withChildAt(node, subidx, updated, owner);
}

/**
 * Replaces the element at `index`. The caller has already checked the range.
 */
export function vecAssoc<T>(vec: Vec<T>, owner: Owner, index: number, val: T): Vec<T> {
  if (index < 0 || index >= vec.count) {
    throw new RangeError(`Vec index ${index} outside [0, ${vec.count})`);
  }

  if (index >= vec.treeCount) {
    const tail = owner && vec.tailOwner === owner ? vec.tail : vec.tail.slice();
    tail[index & MASK] = val;
    return { ...vec, tail, tailOwner: owner };
  }

  return {
    ...vec,
    root: doAssoc(vec.root, vec.shift, index, val, owner),
  };
}

export function vecFromIterable<T>(items: Iterable<T>): Vec<T> {
  const owner: Owner = {};
  let vec = emptyVec<T>();
  for (const item of items) {
    vec = vecPush(vec, owner, item);
  }
  // Published: drop the transient tail owner
  return { ...vec, tailOwner: undefined };
}

export function* vecIter<T>(vec: Vec<T>, start = 0): IterableIterator<T> {
  let i = start;
  while (i < vec.count) {
    const leaf = leafFor(vec, i);
    const end = Math.min(vec.count, (i | MASK) + 1);
    for (; i < end; i++) {
      yield leaf[i & MASK];
    }
  }
}

export function* vecIterReverse<T>(vec: Vec<T>, start = vec.count - 1): IterableIterator<T> {
  let i = start;
  while (i >= 0) {
    const leaf = leafFor(vec, i);
    const end = i & ~MASK;
    for (; i >= end; i--) {
      yield leaf[i & MASK];
    }
  }
}

export function vecToArray<T>(vec: Vec<T>): T[] {
  return [...vecIter(vec)];
}
