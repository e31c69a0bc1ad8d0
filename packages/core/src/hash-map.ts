/**
 * PersistentHashMap - unordered persistent map over the HAMT
 *
 * Keys compare structurally: two equal vectors are the same key. Absence is
 * distinct from a stored `null`/`undefined` value: use `find` or `has` to
 * tell them apart, or pass a `notFound` default to `get`.
 */

import { hashMapEntries, isMapLike, mapEquals } from './equiv';
import {
  hamtDelete,
  hamtEmpty,
  hamtFind,
  hamtFromEntries,
  hamtIter,
  hamtSet,
  type HMap,
} from './internal/hamt';
import { printValue } from './print';
import { iteratorSeq, map as mapSeq } from './seq';
import { EQUIV, type ISeq, type MapEntry, type MapLike, type Nil } from './types';

export class PersistentHashMap<K, V> implements MapLike<K, V> {
  readonly [EQUIV] = true as const;
  readonly kind = 'hash-map' as const;
  private cachedHash: number | undefined;

  private static readonly EMPTY: PersistentHashMap<never, never> = new PersistentHashMap<never, never>(hamtEmpty());

  private constructor(private readonly map: HMap<K, V>) {}

  static empty<K, V>(): PersistentHashMap<K, V> {
    return PersistentHashMap.EMPTY;
  }

  static fromEntries<K, V>(entries: Iterable<readonly [K, V]>): PersistentHashMap<K, V> {
    const map = hamtFromEntries(entries);
    return map.size === 0 ? PersistentHashMap.EMPTY : new PersistentHashMap(map);
  }

  private derive(map: HMap<K, V>): PersistentHashMap<K, V> {
    if (map === this.map) return this;
    return map.size === 0 ? PersistentHashMap.EMPTY : new PersistentHashMap(map);
  }

  /** @internal Backing trie, exposed for structural-sharing checks */
  get trie(): HMap<K, V> {
    return this.map;
  }

  get count(): number {
    return this.map.size;
  }

  isEmpty(): boolean {
    return this.map.size === 0;
  }

  // ===== Reads =====

  get(key: K): V | undefined;
  get<D>(key: K, notFound: D): V | D;
  get<D>(key: K, notFound?: D): V | D | undefined {
    const leaf = hamtFind(this.map, key);
    return leaf === undefined ? notFound : leaf.value;
  }

  find(key: K): MapEntry<K, V> | undefined {
    const leaf = hamtFind(this.map, key);
    return leaf === undefined ? undefined : [leaf.key, leaf.value];
  }

  has(key: K): boolean {
    return hamtFind(this.map, key) !== undefined;
  }

  // ===== Updates =====

  assoc(key: K, value: V): PersistentHashMap<K, V> {
    return this.derive(hamtSet(this.map, undefined, key, value));
  }

  dissoc(...keys: K[]): PersistentHashMap<K, V> {
    let map = this.map;
    for (const key of keys) {
      map = hamtDelete(map, undefined, key);
    }
    return this.derive(map);
  }

  /**
   * Adds entries. A map argument contributes all of its entries, later
   * ones replacing earlier values for equal keys.
   */
  conj(...items: Array<MapEntry<K, V> | MapLike<K, V>>): PersistentHashMap<K, V> {
    const owner = {};
    let map = this.map;
    for (const item of items) {
      if (isMapLike(item)) {
        for (const [k, v] of item) map = hamtSet(map, owner, k, v);
      } else {
        map = hamtSet(map, owner, item[0], item[1]);
      }
    }
    return this.derive(map);
  }

  merge(...maps: Array<MapLike<K, V> | Nil>): PersistentHashMap<K, V> {
    const present: Array<MapLike<K, V>> = [];
    for (const m of maps) {
      if (m != null) present.push(m);
    }
    return this.conj(...present);
  }

  empty(): PersistentHashMap<K, V> {
    return PersistentHashMap.EMPTY;
  }

  // ===== Views =====

  seq(): ISeq<MapEntry<K, V>> | null {
    return this.map.size === 0 ? null : iteratorSeq(hamtIter(this.map));
  }

  keys(): ISeq<K> | null {
    return this.map.size === 0 ? null : mapSeq(([k]) => k, this.seq());
  }

  vals(): ISeq<V> | null {
    return this.map.size === 0 ? null : mapSeq(([, v]) => v, this.seq());
  }

  [Symbol.iterator](): Iterator<MapEntry<K, V>> {
    return hamtIter(this.map);
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

export function printEntries(entries: Iterable<MapEntry<unknown, unknown>>): string {
  const parts: string[] = [];
  for (const [k, v] of entries) {
    parts.push(`${printValue(k)} ${printValue(v)}`);
  }
  return '{' + parts.join(', ') + '}';
}

/**
 * `hashMap(k1, v1, k2, v2, ...)`. A trailing key without a value maps
 * to `undefined`.
 */
export function hashMap(...keyvals: unknown[]): PersistentHashMap<unknown, unknown> {
  const entries: Array<MapEntry<unknown, unknown>> = [];
  for (let i = 0; i < keyvals.length; i += 2) {
    entries.push([keyvals[i], keyvals[i + 1]]);
  }
  return PersistentHashMap.fromEntries(entries);
}

export function hashMapFrom<K, V>(entries: Iterable<readonly [K, V]>): PersistentHashMap<K, V> {
  return PersistentHashMap.fromEntries(entries);
}

export function isHashMap(x: unknown): x is PersistentHashMap<unknown, unknown> {
  return x instanceof PersistentHashMap;
}
