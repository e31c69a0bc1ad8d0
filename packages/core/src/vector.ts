/**
 * PersistentVector - indexed, append-at-end persistent sequence
 *
 * Every update returns a new vector sharing all untouched trie nodes with
 * its predecessor. Reads, `assoc` and `conj` are O(log32 n).
 */

import { hashOrdered, sequentialEquals } from './equiv';
import { EmptyCollectionError, IndexOutOfBoundsError } from './errors';
import type { Vec } from './internal/types';
import {
  emptyVec,
  vecAssoc,
  vecFromIterable,
  vecGet,
  vecIter,
  vecPop,
  vecPush,
  vecToArray,
} from './internal/vec';
import { printItems } from './print';
import { IndexedSeq } from './seq';
import { EQUIV, type Equatable, type ISeq, type MapEntry } from './types';

function isIndex(key: unknown, count: number): key is number {
  return typeof key === 'number' && Number.isInteger(key) && key >= 0 && key < count;
}

export class PersistentVector<T> implements Equatable, Iterable<T> {
  readonly [EQUIV] = true as const;
  readonly kind = 'vector' as const;
  private cachedHash: number | undefined;

  private static readonly EMPTY: PersistentVector<never> = new PersistentVector<never>(emptyVec());

  private constructor(private readonly vec: Vec<T>) {}

  static empty<T>(): PersistentVector<T> {
    return PersistentVector.EMPTY;
  }

  static from<T>(items: Iterable<T>): PersistentVector<T> {
    const vec = vecFromIterable(items);
    return vec.count === 0 ? PersistentVector.EMPTY : new PersistentVector(vec);
  }

  /** @internal Backing trie, exposed for structural-sharing checks */
  get trie(): Vec<T> {
    return this.vec;
  }

  get count(): number {
    return this.vec.count;
  }

  isEmpty(): boolean {
    return this.vec.count === 0;
  }

  // ===== Reads =====

  /**
   * Element at `index`. Without a default an out-of-range index throws
   * IndexOutOfBoundsError; with one, the default is returned instead.
   */
  nth(index: number): T;
  nth<D>(index: number, notFound: D): T | D;
  nth<D>(index: number, ...notFound: [] | [D]): T | D {
    if (isIndex(index, this.vec.count)) return vecGet(this.vec, index);
    if (notFound.length === 0) throw new IndexOutOfBoundsError(index, this.vec.count);
    return notFound[0];
  }

  /**
   * Lookup by key: any non-index key reads as absent.
   */
  get(key: unknown): T | undefined;
  get<D>(key: unknown, notFound: D): T | D;
  get<D>(key: unknown, notFound?: D): T | D | undefined {
    return isIndex(key, this.vec.count) ? vecGet(this.vec, key) : notFound;
  }

  has(key: unknown): boolean {
    return isIndex(key, this.vec.count);
  }

  find(key: unknown): MapEntry<number, T> | undefined {
    return isIndex(key, this.vec.count) ? [key, vecGet(this.vec, key)] : undefined;
  }

  peek(): T | undefined {
    return this.vec.count === 0 ? undefined : vecGet(this.vec, this.vec.count - 1);
  }

  // ===== Updates =====

  /**
   * Replaces the element at `index`; `index === count` appends.
   */
  assoc(index: number, value: T): PersistentVector<T> {
    if (index === this.vec.count) return this.conj(value);
    if (!isIndex(index, this.vec.count)) {
      throw new IndexOutOfBoundsError(index, this.vec.count);
    }
    if (vecGet(this.vec, index) === value) return this;
    return new PersistentVector(vecAssoc(this.vec, undefined, index, value));
  }

  conj(...values: T[]): PersistentVector<T> {
    if (values.length === 0) return this;
    if (values.length === 1) {
      return new PersistentVector(vecPush(this.vec, undefined, values[0]));
    }
    const owner = {};
    let vec = this.vec;
    for (const value of values) {
      vec = vecPush(vec, owner, value);
    }
    return new PersistentVector({ ...vec, tailOwner: undefined });
  }

  pop(): PersistentVector<T> {
    if (this.vec.count === 0) throw new EmptyCollectionError('pop', 'vector');
    if (this.vec.count === 1) return PersistentVector.EMPTY;
    return new PersistentVector(vecPop(this.vec, undefined).vec);
  }

  empty(): PersistentVector<T> {
    return PersistentVector.EMPTY;
  }

  // ===== Views =====

  seq(): ISeq<T> | null {
    if (this.vec.count === 0) return null;
    const vec = this.vec;
    return new IndexedSeq(i => vecGet(vec, i), 0, vec.count);
  }

  rseq(): ISeq<T> | null {
    if (this.vec.count === 0) return null;
    const vec = this.vec;
    return new IndexedSeq(i => vecGet(vec, i), vec.count - 1, -1, -1);
  }

  toArray(): T[] {
    return vecToArray(this.vec);
  }

  [Symbol.iterator](): Iterator<T> {
    return vecIter(this.vec);
  }

  equals(other: unknown): boolean {
    if (this === other) return true;
    if (other instanceof PersistentVector && other.count !== this.count) return false;
    return sequentialEquals(this, other);
  }

  hashCode(): number {
    if (this.cachedHash === undefined) {
      this.cachedHash = hashOrdered(this);
    }
    return this.cachedHash;
  }

  toString(): string {
    return printItems(this, '[', ']');
  }
}

export function vector<T>(...items: T[]): PersistentVector<T> {
  return PersistentVector.from(items);
}

export function vectorFrom<T>(items: Iterable<T>): PersistentVector<T> {
  return PersistentVector.from(items);
}

export function isVector(x: unknown): x is PersistentVector<unknown> {
  return x instanceof PersistentVector;
}
