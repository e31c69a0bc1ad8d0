import { describe, it, expect } from 'vitest';
import { compare } from '../compare';
import { avlDelete, avlEmpty, avlHeight, avlIter, avlSet, rangeFromTests, type AvlNode, type AvlTree } from './avl';

// Height of a subtree, failing on any imbalance or mis-ordering below it
function checkNode(node: AvlNode<number, number> | null, lo: number, hi: number): number {
  if (node === null) return 0;
  expect(node.key).toBeGreaterThan(lo);
  expect(node.key).toBeLessThan(hi);
  const lh = checkNode(node.left, lo, node.key);
  const rh = checkNode(node.right, node.key, hi);
  expect(Math.abs(lh - rh)).toBeLessThanOrEqual(1);
  expect(node.height).toBe(Math.max(lh, rh) + 1);
  return node.height;
}

function build(keys: number[]): AvlTree<number, number> {
  let tree = avlEmpty<number, number>(compare);
  for (const k of keys) tree = avlSet(tree, k, k);
  return tree;
}

function keysOf(tree: AvlTree<number, number>, options = {}): number[] {
  return [...avlIter(tree, options)].map(n => n.key);
}

describe('AVL tree', () => {
  it('should stay balanced under ascending inserts', () => {
    const tree = build(Array.from({ length: 1000 }, (_, i) => i));
    checkNode(tree.root, -Infinity, Infinity);
    expect(tree.size).toBe(1000);
    expect(avlHeight(tree)).toBeLessThanOrEqual(14);
  });

  it('should stay balanced under interleaved inserts and deletes', () => {
    let tree = build(Array.from({ length: 300 }, (_, i) => (i * 7919) % 300));
    for (let i = 0; i < 300; i += 3) tree = avlDelete(tree, i);
    checkNode(tree.root, -Infinity, Infinity);
    expect(tree.size).toBe(200);
    expect(keysOf(tree).slice(0, 4)).toEqual([1, 2, 4, 5]);
  });

  it('should share subtrees off the insert path', () => {
    const before = build([4, 2, 6, 1, 3, 5, 7]);
    const after = avlSet(before, 8, 8);
    expect(after.root?.left).toBe(before.root?.left);
    expect(before.size).toBe(7);
    expect(after.size).toBe(8);
  });

  it('should keep the stored key and replace the value on an equal insert', () => {
    const tree = avlSet(build([1, 2, 3]), 2, 20);
    expect([...avlIter(tree)].map(n => [n.key, n.value])).toEqual([[1, 1], [2, 20], [3, 3]]);
    expect(tree.size).toBe(3);
  });

  it('should return the same tree for a no-op delete', () => {
    const tree = build([1, 2, 3]);
    expect(avlDelete(tree, 9)).toBe(tree);
  });

  it('should walk ranges from either end', () => {
    const tree = build([10, 20, 30, 40, 50]);
    expect(keysOf(tree, rangeFromTests([['>=', 20], ['<', 50]]))).toEqual([20, 30, 40]);
    expect(keysOf(tree, { ...rangeFromTests([['>', 20]]), reverse: true })).toEqual([50, 40, 30]);
    expect(keysOf(tree, rangeFromTests([['<=', 5]]))).toEqual([]);
  });
});
