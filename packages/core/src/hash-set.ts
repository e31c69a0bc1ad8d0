/**
 * PersistentHashSet - unordered persistent set over the HAMT
 *
 * Each member is stored as both key and value, so `get` hands back the
 * member actually held (the first one added among equal values).
 */

import { hashSetMembers, setEquals } from './equiv';
import {
  hamtDelete,
  hamtEmpty,
  hamtFind,
  hamtIter,
  hamtSet,
  type HMap,
} from './internal/hamt';
import { printItems } from './print';
import { iteratorSeq } from './seq';
import { EQUIV, type ISeq, type SetLike } from './types';

function* members<T>(set: HMap<T, T>): IterableIterator<T> {
  for (const [k] of hamtIter(set)) yield k;
}

export class PersistentHashSet<T> implements SetLike<T> {
  readonly [EQUIV] = true as const;
  readonly kind = 'hash-set' as const;
  private cachedHash: number | undefined;

  private static readonly EMPTY: PersistentHashSet<never> = new PersistentHashSet<never>(hamtEmpty());

  private constructor(private readonly set: HMap<T, T>) {}

  static empty<T>(): PersistentHashSet<T> {
    return PersistentHashSet.EMPTY;
  }

  static from<T>(items: Iterable<T>): PersistentHashSet<T> {
    return PersistentHashSet.empty<T>().conjAll(items);
  }

  private derive(set: HMap<T, T>): PersistentHashSet<T> {
    if (set === this.set) return this;
    return set.size === 0 ? PersistentHashSet.EMPTY : new PersistentHashSet(set);
  }

  private conjAll(items: Iterable<T>): PersistentHashSet<T> {
    const owner = {};
    let set = this.set;
    for (const x of items) {
      // Re-adding an equal member keeps the one already held
      if (hamtFind(set, x) === undefined) set = hamtSet(set, owner, x, x);
    }
    return this.derive(set);
  }

  get count(): number {
    return this.set.size;
  }

  isEmpty(): boolean {
    return this.set.size === 0;
  }

  has(value: T): boolean {
    return hamtFind(this.set, value) !== undefined;
  }

  get(value: T): T | undefined;
  get<D>(value: T, notFound: D): T | D;
  get<D>(value: T, notFound?: D): T | D | undefined {
    const leaf = hamtFind(this.set, value);
    return leaf === undefined ? notFound : leaf.value;
  }

  conj(...values: T[]): PersistentHashSet<T> {
    return this.conjAll(values);
  }

  /** Removing an absent member returns this same set. */
  disj(...values: T[]): PersistentHashSet<T> {
    let set = this.set;
    for (const x of values) {
      set = hamtDelete(set, undefined, x);
    }
    return this.derive(set);
  }

  empty(): PersistentHashSet<T> {
    return PersistentHashSet.EMPTY;
  }

  seq(): ISeq<T> | null {
    return this.set.size === 0 ? null : iteratorSeq(members(this.set));
  }

  [Symbol.iterator](): Iterator<T> {
    return members(this.set);
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

export function hashSet<T>(...items: T[]): PersistentHashSet<T> {
  return PersistentHashSet.from(items);
}

export function set<T>(items: Iterable<T>): PersistentHashSet<T> {
  return PersistentHashSet.from(items);
}

export function isHashSet(x: unknown): x is PersistentHashSet<unknown> {
  return x instanceof PersistentHashSet;
}
