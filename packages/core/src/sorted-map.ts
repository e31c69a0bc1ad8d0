/**
 * SortedMap - persistent map kept in comparator order
 *
 * Backed by a persistent AVL tree. Iteration, `seq`, `keys` and `vals` are
 * in ascending key order; `rseq`, `rsubseq` and reversed range views walk
 * it backwards. Range views are lazy and start in O(log n).
 */

import { compare as defaultCompare } from './compare';
import { hashMapEntries, isMapLike, mapEquals } from './equiv';
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
  type RangeTest,
} from './internal/avl';
import { printEntries } from './hash-map';
import { iteratorSeq, map as mapSeq } from './seq';
import { EQUIV, type Comparator, type ISeq, type MapEntry, type MapLike, type Nil } from './types';

export type RangeArgs<K> = [RangeTest, K] | [RangeTest, K, RangeTest, K];

function* entriesOf<K, V>(tree: AvlTree<K, V>, options?: RangeOptions<K>): IterableIterator<MapEntry<K, V>> {
  for (const node of avlIter(tree, options)) yield [node.key, node.value];
}

export function testsOf<K>(args: RangeArgs<K>): Array<readonly [RangeTest, K]> {
  return args.length === 2 ? [[args[0], args[1]]] : [[args[0], args[1]], [args[2], args[3]]];
}

export class SortedMap<K, V> implements MapLike<K, V> {
  readonly [EQUIV] = true as const;
  readonly kind = 'sorted-map' as const;
  private cachedHash: number | undefined;

  private constructor(private readonly tree: AvlTree<K, V>) {}

  static empty<K, V>(compare: Comparator<K> = defaultCompare): SortedMap<K, V> {
    return new SortedMap(avlEmpty<K, V>(compare));
  }

  static fromEntries<K, V>(
    entries: Iterable<readonly [K, V]>,
    compare: Comparator<K> = defaultCompare
  ): SortedMap<K, V> {
    let tree = avlEmpty<K, V>(compare);
    for (const [k, v] of entries) {
      tree = avlSet(tree, k, v);
    }
    return new SortedMap(tree);
  }

  private derive(tree: AvlTree<K, V>): SortedMap<K, V> {
    return tree === this.tree ? this : new SortedMap(tree);
  }

  /** @internal Backing tree, exposed for balance and sharing checks */
  get avl(): AvlTree<K, V> {
    return this.tree;
  }

  get comparator(): Comparator<K> {
    return this.tree.compare;
  }

  get count(): number {
    return this.tree.size;
  }

  isEmpty(): boolean {
    return this.tree.size === 0;
  }

  // ===== Reads =====

  get(key: K): V | undefined;
  get<D>(key: K, notFound: D): V | D;
  get<D>(key: K, notFound?: D): V | D | undefined {
    const node = avlFind(this.tree, key);
    return node === undefined ? notFound : node.value;
  }

  find(key: K): MapEntry<K, V> | undefined {
    const node = avlFind(this.tree, key);
    return node === undefined ? undefined : [node.key, node.value];
  }

  has(key: K): boolean {
    return avlFind(this.tree, key) !== undefined;
  }

  first(): MapEntry<K, V> | undefined {
    const node = avlMin(this.tree);
    return node === undefined ? undefined : [node.key, node.value];
  }

  last(): MapEntry<K, V> | undefined {
    const node = avlMax(this.tree);
    return node === undefined ? undefined : [node.key, node.value];
  }

  // ===== Updates =====

  assoc(key: K, value: V): SortedMap<K, V> {
    return this.derive(avlSet(this.tree, key, value));
  }

  dissoc(...keys: K[]): SortedMap<K, V> {
    let tree = this.tree;
    for (const key of keys) {
      tree = avlDelete(tree, key);
    }
    return this.derive(tree);
  }

  conj(...items: Array<MapEntry<K, V> | MapLike<K, V>>): SortedMap<K, V> {
    let tree = this.tree;
    for (const item of items) {
      if (isMapLike(item)) {
        for (const [k, v] of item) tree = avlSet(tree, k, v);
      } else {
        tree = avlSet(tree, item[0], item[1]);
      }
    }
    return this.derive(tree);
  }

  merge(...maps: Array<MapLike<K, V> | Nil>): SortedMap<K, V> {
    const present: Array<MapLike<K, V>> = [];
    for (const m of maps) {
      if (m != null) present.push(m);
    }
    return this.conj(...present);
  }

  /** Empty map with the same comparator. */
  empty(): SortedMap<K, V> {
    return this.tree.size === 0 ? this : SortedMap.empty<K, V>(this.tree.compare);
  }

  // ===== Views =====

  seq(): ISeq<MapEntry<K, V>> | null {
    return this.rangeView({});
  }

  rseq(): ISeq<MapEntry<K, V>> | null {
    return this.rangeView({ reverse: true });
  }

  keys(): ISeq<K> | null {
    return this.tree.size === 0 ? null : mapSeq(([k]) => k, this.seq());
  }

  vals(): ISeq<V> | null {
    return this.tree.size === 0 ? null : mapSeq(([, v]) => v, this.seq());
  }

  /**
   * Ascending entries whose keys pass one test (`'>' | '>=' | '<' | '<='`)
   * or a lower and an upper test, e.g. `subseq('>=', 2, '<', 5)`.
   */
  subseq(...args: RangeArgs<K>): ISeq<MapEntry<K, V>> | null {
    return this.rangeView(rangeFromTests(testsOf(args)));
  }

  /** As `subseq`, in descending order. */
  rsubseq(...args: RangeArgs<K>): ISeq<MapEntry<K, V>> | null {
    return this.rangeView({ ...rangeFromTests(testsOf(args)), reverse: true });
  }

  /**
   * Lazy ordered entries within optional bounds, or `null` when none fall
   * inside them.
   */
  rangeView(options: RangeOptions<K>): ISeq<MapEntry<K, V>> | null {
    if (this.tree.size === 0) return null;
    return iteratorSeq(entriesOf(this.tree, options)).seq();
  }

  [Symbol.iterator](): Iterator<MapEntry<K, V>> {
    return entriesOf(this.tree);
  }

  equals(other: unknown): boolean {
    return this === other || mapEquals(this, other);
  }

  hashCode(): number {
    if (this.cachedHash === undefined) {
      this.cachedHash = hashMapEntries(this);
    }
    return this.cachedHash;
  }

  toString(): string {
    return printEntries(this);
  }
}

/** `sortedMap(k1, v1, k2, v2, ...)` under the default ordering. */
export function sortedMap(...keyvals: unknown[]): SortedMap<unknown, unknown> {
  const entries: Array<MapEntry<unknown, unknown>> = [];
  for (let i = 0; i < keyvals.length; i += 2) {
    entries.push([keyvals[i], keyvals[i + 1]]);
  }
  return SortedMap.fromEntries(entries);
}

export function sortedMapBy<K, V>(compare: Comparator<K>, entries: Iterable<readonly [K, V]> = []): SortedMap<K, V> {
  return SortedMap.fromEntries(entries, compare);
}

export function isSortedMap(x: unknown): x is SortedMap<unknown, unknown> {
  return x instanceof SortedMap;
}
