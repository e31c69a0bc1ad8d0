/**
 * SortedSet - persistent set kept in comparator order
 */

import { compare as defaultCompare } from './compare';
import { hashSetMembers, setEquals } from './equiv';
import {
  avlDelete,
  avlEmpty,
  avlFind,
  avlIter,
  avlMax,
  avlMin,
  avlSet,
  rangeFromTests,
  type AvlTree,
  type RangeOptions,
} from './internal/avl';
import { printItems } from './print';
import { iteratorSeq } from './seq';
import { testsOf, type RangeArgs } from './sorted-map';
import { EQUIV, type Comparator, type ISeq, type SetLike } from './types';

function* membersOf<T>(tree: AvlTree<T, T>, options?: RangeOptions<T>): IterableIterator<T> {
  for (const node of avlIter(tree, options)) yield node.key;
}

export class SortedSet<T> implements SetLike<T> {
  readonly [EQUIV] = true as const;
  readonly kind = 'sorted-set' as const;
  private cachedHash: number | undefined;

  private constructor(private readonly tree: AvlTree<T, T>) {}

  static empty<T>(compare: Comparator<T> = defaultCompare): SortedSet<T> {
    return new SortedSet(avlEmpty<T, T>(compare));
  }

  static from<T>(items: Iterable<T>, compare: Comparator<T> = defaultCompare): SortedSet<T> {
    return SortedSet.empty(compare).conjAll(items);
  }

  private derive(tree: AvlTree<T, T>): SortedSet<T> {
    return tree === this.tree ? this : new SortedSet(tree);
  }

  private conjAll(items: Iterable<T>): SortedSet<T> {
    let tree = this.tree;
    for (const x of items) {
      if (avlFind(tree, x) === undefined) tree = avlSet(tree, x, x);
    }
    return this.derive(tree);
  }

  /** @internal Backing tree, exposed for balance and sharing checks */
  get avl(): AvlTree<T, T> {
    return this.tree;
  }

  get comparator(): Comparator<T> {
    return this.tree.compare;
  }

  get count(): number {
    return this.tree.size;
  }

  isEmpty(): boolean {
    return this.tree.size === 0;
  }

  has(value: T): boolean {
    return avlFind(this.tree, value) !== undefined;
  }

  get(value: T): T | undefined;
  get<D>(value: T, notFound: D): T | D;
  get<D>(value: T, notFound?: D): T | D | undefined {
    const node = avlFind(this.tree, value);
    return node === undefined ? notFound : node.key;
  }

  first(): T | undefined {
    return avlMin(this.tree)?.key;
  }

  last(): T | undefined {
    return avlMax(this.tree)?.key;
  }

  conj(...values: T[]): SortedSet<T> {
    return this.conjAll(values);
  }

  disj(...values: T[]): SortedSet<T> {
    let tree = this.tree;
    for (const x of values) {
      tree = avlDelete(tree, x);
    }
    return this.derive(tree);
  }

  empty(): SortedSet<T> {
    return this.tree.size === 0 ? this : SortedSet.empty(this.tree.compare);
  }

  seq(): ISeq<T> | null {
    return this.rangeView({});
  }

  rseq(): ISeq<T> | null {
    return this.rangeView({ reverse: true });
  }

  subseq(...args: RangeArgs<T>): ISeq<T> | null {
    return this.rangeView(rangeFromTests(testsOf(args)));
  }

  rsubseq(...args: RangeArgs<T>): ISeq<T> | null {
    return this.rangeView({ ...rangeFromTests(testsOf(args)), reverse: true });
  }

  rangeView(options: RangeOptions<T>): ISeq<T> | null {
    if (this.tree.size === 0) return null;
    return iteratorSeq(membersOf(this.tree, options)).seq();
  }

  [Symbol.iterator](): Iterator<T> {
    return membersOf(this.tree);
  }

  equals(other: unknown): boolean {
    return this === other || setEquals(this, other);
  }

  hashCode(): number {
    if (this.cachedHash === undefined) {
      this.cachedHash = hashSetMembers(this);
    }
    return this.cachedHash;
  }

  toString(): string {
    return printItems(this, '#{', '}');
  }
}

export function sortedSet<T>(...items: T[]): SortedSet<T> {
  return SortedSet.from(items);
}

export function sortedSetBy<T>(compare: Comparator<T>, ...items: T[]): SortedSet<T> {
  return SortedSet.from(items, compare);
}

export function isSortedSet(x: unknown): x is SortedSet<unknown> {
  return x instanceof SortedSet;
}
