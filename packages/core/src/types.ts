/**
 * Public contracts shared by every collection kind
 */

// nil: both JS absences read as "nothing"
export type Nil = null | undefined;

export type CollectionKind =
  | 'vector'
  | 'list'
  | 'seq'
  | 'hash-map'
  | 'sorted-map'
  | 'hash-set'
  | 'sorted-set';

export type MapEntry<K, V> = readonly [K, V];

// Anything `seq` turns into a sequence view
export interface Seqable<T> {
  seq(): ISeq<T> | null;
}

export type SeqSource<T> = Seqable<T> | readonly T[] | Nil;

// Marker carried by every value that compares structurally
export const EQUIV: unique symbol = Symbol('strata.equiv');

export interface Equatable {
  readonly [EQUIV]: true;
  readonly kind: CollectionKind;
  equals(other: unknown): boolean;
  hashCode(): number;
  seq(): ISeq<unknown> | null;
  [Symbol.iterator](): Iterator<unknown>;
}

/**
 * A sequential view: a head and a lazily obtained tail.
 *
 * `rest()` never forces the tail, `next()` forces exactly enough of it to
 * answer "is there anything left" and returns `null` when not.
 */
export interface ISeq<T> extends Equatable {
  readonly kind: 'seq' | 'list';
  /** Head and unforced tail, or `null` when empty. Forces this cell only. */
  uncons(): readonly [T, ISeq<T>] | null;
  first(): T | undefined;
  rest(): ISeq<T>;
  next(): ISeq<T> | null;
  seq(): ISeq<T> | null;
  [Symbol.iterator](): Iterator<T>;
}

export interface MapLike<K, V> extends Equatable {
  readonly kind: 'hash-map' | 'sorted-map';
  readonly count: number;
  find(key: K): MapEntry<K, V> | undefined;
  [Symbol.iterator](): Iterator<MapEntry<K, V>>;
}

export interface SetLike<T> extends Equatable {
  readonly kind: 'hash-set' | 'sorted-set';
  readonly count: number;
  has(value: T): boolean;
  [Symbol.iterator](): Iterator<T>;
}

export type Comparator<T> = (a: T, b: T) => number;
