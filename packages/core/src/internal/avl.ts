/**
 * AVL - persistent height-balanced binary search tree
 *
 * Backs sorted maps and sets. Updates copy the search path and rebalance
 * on the way up; every node off that path is shared with the old tree.
 * Keys are ordered only by the tree's comparator.
 */

import { ComparatorError } from '../errors';
import type { Comparator } from '../types';

// ===== Types =====

export interface AvlNode<K, V> {
  readonly key: K;
  readonly value: V;
  readonly left: AvlNode<K, V> | null;
  readonly right: AvlNode<K, V> | null;
  readonly height: number;
}

export interface AvlTree<K, V> {
  readonly root: AvlNode<K, V> | null;
  readonly size: number;
  readonly compare: Comparator<K>;
}

export interface Bound<K> {
  key: K;
  inclusive: boolean;
}

export interface RangeOptions<K> {
  lower?: Bound<K>;
  upper?: Bound<K>;
  reverse?: boolean;
}

export type RangeTest = '<' | '<=' | '>' | '>=';

/**
 * Bounds from `(test, key)` pairs: `>`/`>=` set the lower end, `<`/`<=`
 * the upper end.
 */
export function rangeFromTests<K>(tests: ReadonlyArray<readonly [RangeTest, K]>): Pick<RangeOptions<K>, 'lower' | 'upper'> {
  const range: Pick<RangeOptions<K>, 'lower' | 'upper'> = {};
  for (const [test, key] of tests) {
    switch (test) {
      case '>':
      case '>=':
        range.lower = { key, inclusive: test === '>=' };
        break;
      case '<':
      case '<=':
        range.upper = { key, inclusive: test === '<=' };
        break;
    }
  }
  return range;
}

export function avlEmpty<K, V>(compare: Comparator<K>): AvlTree<K, V> {
  return { root: null, size: 0, compare };
}

/**
 * Comparator result, rejected when it is not a number usable for ordering.
 */
export function order<K>(compare: Comparator<K>, a: K, b: K): number {
  const c = compare(a, b);
  if (typeof c !== 'number' || Number.isNaN(c)) {
    throw new ComparatorError(`Comparator returned ${String(c)}, expected a number`);
  }
  return c;
}

// ===== Balancing =====

function h<K, V>(n: AvlNode<K, V> | null): number {
  return n ? n.height : 0;
}

function mk<K, V>(key: K, value: V, left: AvlNode<K, V> | null, right: AvlNode<K, V> | null): AvlNode<K, V> {
  const lh = h(left);
  const rh = h(right);
  return { key, value, left, right, height: (lh > rh ? lh : rh) + 1 };
}

function balance<K, V>(key: K, value: V, left: AvlNode<K, V> | null, right: AvlNode<K, V> | null): AvlNode<K, V> {
  if (left && h(left) > h(right) + 1) {
    const lr = left.right;
    if (lr && h(lr) > h(left.left)) {
      return mk(lr.key, lr.value, mk(left.key, left.value, left.left, lr.left), mk(key, value, lr.right, right));
    }
    return mk(left.key, left.value, left.left, mk(key, value, left.right, right));
  }

  if (right && h(right) > h(left) + 1) {
    const rl = right.left;
    if (rl && h(rl) > h(right.right)) {
      return mk(rl.key, rl.value, mk(key, value, left, rl.left), mk(right.key, right.value, rl.right, right.right));
    }
    return mk(right.key, right.value, mk(key, value, left, right.left), right.right);
  }

  return mk(key, value, left, right);
}

// ===== Lookup =====

export function avlFind<K, V>(tree: AvlTree<K, V>, key: K): AvlNode<K, V> | undefined {
  let node = tree.root;
  while (node) {
    const c = order(tree.compare, key, node.key);
    if (c === 0) return node;
    node = c < 0 ? node.left : node.right;
  }
  return undefined;
}

export function avlMin<K, V>(tree: AvlTree<K, V>): AvlNode<K, V> | undefined {
  let node = tree.root;
  if (!node) return undefined;
  while (node.left) node = node.left;
  return node;
}

export function avlMax<K, V>(tree: AvlTree<K, V>): AvlNode<K, V> | undefined {
  let node = tree.root;
  if (!node) return undefined;
  while (node.right) node = node.right;
  return node;
}

// ===== Update =====

function insert<K, V>(
  node: AvlNode<K, V> | null,
  key: K,
  value: V,
  compare: Comparator<K>
): { node: AvlNode<K, V>; added: boolean } {
  if (!node) return { node: mk(key, value, null, null), added: true };

  const c = order(compare, key, node.key);
  if (c === 0) {
    // Equal key: the stored key stays, the value is replaced
    if (node.value === value) return { node, added: false };
    return { node: mk(node.key, value, node.left, node.right), added: false };
  }
  if (c < 0) {
    const res = insert(node.left, key, value, compare);
    if (res.node === node.left) return { node, added: false };
    return { node: balance(node.key, node.value, res.node, node.right), added: res.added };
  }
  const res = insert(node.right, key, value, compare);
  if (res.node === node.right) return { node, added: false };
  return { node: balance(node.key, node.value, node.left, res.node), added: res.added };
}

function removeMin<K, V>(node: AvlNode<K, V>): AvlNode<K, V> | null {
  if (!node.left) return node.right;
  return balance(node.key, node.value, removeMin(node.left), node.right);
}

function remove<K, V>(node: AvlNode<K, V> | null, key: K, compare: Comparator<K>): AvlNode<K, V> | null {
  if (!node) return null;
  const c = order(compare, key, node.key);
  if (c < 0) {
    const left = remove(node.left, key, compare);
    return left === node.left ? node : balance(node.key, node.value, left, node.right);
  }
  if (c > 0) {
    const right = remove(node.right, key, compare);
    return right === node.right ? node : balance(node.key, node.value, node.left, right);
  }
  if (!node.left) return node.right;
  if (!node.right) return node.left;
  let successor = node.right;
  while (successor.left) successor = successor.left;
  return balance(successor.key, successor.value, node.left, removeMin(node.right));
}

export function avlSet<K, V>(tree: AvlTree<K, V>, key: K, value: V): AvlTree<K, V> {
  const res = insert(tree.root, key, value, tree.compare);
  if (res.node === tree.root) return tree;
  return { root: res.node, size: tree.size + (res.added ? 1 : 0), compare: tree.compare };
}

export function avlDelete<K, V>(tree: AvlTree<K, V>, key: K): AvlTree<K, V> {
  const root = remove(tree.root, key, tree.compare);
  if (root === tree.root) return tree;
  return { root, size: tree.size - 1, compare: tree.compare };
}

// ===== Iteration =====

function below<K>(compare: Comparator<K>, key: K, bound: Bound<K> | undefined): boolean {
  if (!bound) return false;
  const c = order(compare, key, bound.key);
  return c < 0 || (c === 0 && !bound.inclusive);
}

function above<K>(compare: Comparator<K>, key: K, bound: Bound<K> | undefined): boolean {
  if (!bound) return false;
  const c = order(compare, key, bound.key);
  return c > 0 || (c === 0 && !bound.inclusive);
}

/**
 * In-order walk restricted to `[lower, upper]` (each end optionally
 * exclusive). Seeding the stack skips straight to the first node in range,
 * so starting a walk costs O(log n).
 */
export function* avlIter<K, V>(tree: AvlTree<K, V>, options: RangeOptions<K> = {}): IterableIterator<AvlNode<K, V>> {
  const { lower, upper, reverse = false } = options;
  const compare = tree.compare;
  const stack: AvlNode<K, V>[] = [];

  if (!reverse) {
    let node = tree.root;
    while (node) {
      if (below(compare, node.key, lower)) {
        node = node.right;
      } else {
        stack.push(node);
        node = node.left;
      }
    }
    let top = stack.pop();
    while (top) {
      if (above(compare, top.key, upper)) return;
      yield top;
      for (let n = top.right; n; n = n.left) stack.push(n);
      top = stack.pop();
    }
    return;
  }

  let node = tree.root;
  while (node) {
    if (above(compare, node.key, upper)) {
      node = node.left;
    } else {
      stack.push(node);
      node = node.right;
    }
  }
  let top = stack.pop();
  while (top) {
    if (below(compare, top.key, lower)) return;
    yield top;
    for (let n = top.left; n; n = n.right) stack.push(n);
    top = stack.pop();
  }
}

export function avlHeight<K, V>(tree: AvlTree<K, V>): number {
  return h(tree.root);
}
