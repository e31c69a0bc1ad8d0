/**
 * Trie substrate - fixed-fanout nodes shared between vector versions.
 *
 * Nodes are never changed after publication. The only in-place edits happen
 * while a node is still owned by the transient build that allocated it
 * (`node.owner === owner`), which is how bulk construction avoids copying.
 */

import { BRANCH_FACTOR } from './constants';
import type { InnerNode, LeafNode, Owner, TrieNode } from './types';

export const EMPTY_INNER: InnerNode<never> = { kind: 'inner', children: [] };

export function newLeaf<T>(values: T[], owner?: Owner): LeafNode<T> {
  return { kind: 'leaf', owner, values };
}

export function newInner<T>(children: Array<TrieNode<T> | undefined>, owner?: Owner): InnerNode<T> {
  return { kind: 'inner', owner, children };
}

function checkSlot(index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= BRANCH_FACTOR) {
    throw new RangeError(`Trie slot ${index} outside [0, ${BRANCH_FACTOR})`);
  }
}

function expectInner<T>(node: TrieNode<T>): InnerNode<T> {
  if (node.kind !== 'inner') {
    throw new RangeError('Expected an inner trie node, got a leaf');
  }
  return node;
}

export function childAt<T>(node: TrieNode<T>, index: number): TrieNode<T> | undefined {
  checkSlot(index);
  return expectInner(node).children[index];
}

export function requireChild<T>(node: TrieNode<T>, index: number): TrieNode<T> {
  const child = childAt(node, index);
  if (child === undefined) {
    throw new RangeError(`Trie slot ${index} is empty`);
  }
  return child;
}

export function ensureEditableNode<T>(node: InnerNode<T>, owner: Owner): InnerNode<T> {
  if (owner && node.owner === owner) return node;
  return { kind: 'inner', owner, children: node.children.slice() };
}

function ensureEditableLeaf<T>(node: LeafNode<T>, owner: Owner): LeafNode<T> {
  if (owner && node.owner === owner) return node;
  return { kind: 'leaf', owner, values: node.values.slice() };
}

/**
 * Returns a node equal to `node` except for slot `index`. Every other child
 * is shared by reference.
 */
export function withChildAt<T>(
  node: TrieNode<T>,
  index: number,
  child: TrieNode<T>,
  owner?: Owner
): InnerNode<T> {
  checkSlot(index);
  const inner = expectInner(node);
  if (index > inner.children.length) {
    throw new RangeError(`Trie slot ${index} would leave a gap after ${inner.children.length} children`);
  }
  const editable = ensureEditableNode(inner, owner);
  editable.children[index] = child;
  return editable;
}

export function withoutLastChild<T>(node: TrieNode<T>, owner?: Owner): InnerNode<T> {
  const inner = expectInner(node);
  if (owner && inner.owner === owner) {
    inner.children.pop();
    return inner;
  }
  return { kind: 'inner', owner, children: inner.children.slice(0, -1) };
}

export function withValueAt<T>(node: TrieNode<T>, index: number, value: T, owner?: Owner): LeafNode<T> {
  checkSlot(index);
  if (node.kind !== 'leaf') {
    throw new RangeError('Expected a leaf trie node, got an inner node');
  }
  const editable = ensureEditableLeaf(node, owner);
  editable.values[index] = value;
  return editable;
}
