/**
 * Protocol - generic collection operations over every value kind
 *
 * Each operation classifies its argument into one tagged variant and checks
 * the capability table before doing anything. A value whose variant lacks
 * the capability gets a CapabilityError, never a best-effort emulation.
 * Lookups (`get`) stay permissive: absence, out-of-range indices and
 * non-lookup values all answer with the default.
 */

import { DEFAULT_CONFIG, type StrataConfig } from './config';
import { isMapLike } from './equiv';
import { CapabilityError, IndexOutOfBoundsError, RealizationError } from './errors';
import { PersistentHashMap } from './hash-map';
import { PersistentHashSet } from './hash-set';
import { COUNT_WARN_THRESHOLD, NOT_FOUND } from './internal/constants';
import { PersistentList } from './list';
import { createLogger } from './logger';
import { Cons, EMPTY, IndexedSeq, describe, isSeq, nthSeq, seqOf } from './seq';
import { SortedMap, type RangeArgs } from './sorted-map';
import { SortedSet } from './sorted-set';
import type { CollectionKind, ISeq, MapEntry, MapLike, Nil } from './types';
import { PersistentVector } from './vector';

// ===== Capability table =====

export type ValueKind = CollectionKind | 'string' | 'array' | 'nil';

export type Capability =
  | 'Collection'
  | 'Sequence'
  | 'Counted'
  | 'Associative'
  | 'Lookup'
  | 'Indexed'
  | 'Stack'
  | 'Set'
  | 'Sorted'
  | 'Reversible';

const CAPABILITIES: Record<ValueKind, readonly Capability[]> = {
  vector: ['Collection', 'Sequence', 'Counted', 'Associative', 'Lookup', 'Indexed', 'Stack', 'Reversible'],
  list: ['Collection', 'Sequence', 'Counted', 'Indexed', 'Stack'],
  seq: ['Collection', 'Sequence', 'Indexed'],
  'hash-map': ['Collection', 'Sequence', 'Counted', 'Associative', 'Lookup'],
  'sorted-map': ['Collection', 'Sequence', 'Counted', 'Associative', 'Lookup', 'Sorted', 'Reversible'],
  'hash-set': ['Collection', 'Sequence', 'Counted', 'Lookup', 'Set'],
  'sorted-set': ['Collection', 'Sequence', 'Counted', 'Lookup', 'Set', 'Sorted', 'Reversible'],
  string: ['Sequence', 'Counted', 'Lookup', 'Indexed'],
  array: ['Sequence', 'Counted', 'Lookup', 'Indexed'],
  // nil stands in for an empty collection of whatever kind is asked for
  nil: ['Collection', 'Sequence', 'Counted', 'Associative', 'Lookup', 'Indexed', 'Stack', 'Set'],
};

type Classified =
  | { kind: 'nil'; value: Nil }
  | { kind: 'string'; value: string }
  | { kind: 'array'; value: readonly unknown[] }
  | { kind: 'vector'; value: PersistentVector<unknown> }
  | { kind: 'list'; value: PersistentList<unknown> }
  | { kind: 'seq'; value: ISeq<unknown> }
  | { kind: 'hash-map'; value: PersistentHashMap<unknown, unknown> }
  | { kind: 'sorted-map'; value: SortedMap<unknown, unknown> }
  | { kind: 'hash-set'; value: PersistentHashSet<unknown> }
  | { kind: 'sorted-set'; value: SortedSet<unknown> };

function classify(x: unknown): Classified | undefined {
  if (x == null) return { kind: 'nil', value: x };
  if (typeof x === 'string') return { kind: 'string', value: x };
  if (Array.isArray(x)) return { kind: 'array', value: x };
  if (x instanceof PersistentVector) return { kind: 'vector', value: x };
  if (x instanceof PersistentList) return { kind: 'list', value: x };
  if (x instanceof PersistentHashMap) return { kind: 'hash-map', value: x };
  if (x instanceof SortedMap) return { kind: 'sorted-map', value: x };
  if (x instanceof PersistentHashSet) return { kind: 'hash-set', value: x };
  if (x instanceof SortedSet) return { kind: 'sorted-set', value: x };
  if (isSeq(x)) return { kind: 'seq', value: x };
  return undefined;
}

function requireCapability(x: unknown, operation: string, capability: Capability): Classified {
  const c = classify(x);
  if (c === undefined || !CAPABILITIES[c.kind].includes(capability)) {
    throw new CapabilityError(operation, capability, describe(x));
  }
  return c;
}

function isIndex(key: unknown, count: number): key is number {
  return typeof key === 'number' && Number.isInteger(key) && key >= 0 && key < count;
}

export function kindOf(x: unknown): ValueKind | undefined {
  return classify(x)?.kind;
}

export function capabilitiesOf(x: unknown): readonly Capability[] {
  const c = classify(x);
  return c === undefined ? [] : CAPABILITIES[c.kind];
}

export function supports(x: unknown, capability: Capability): boolean {
  return capabilitiesOf(x).includes(capability);
}

// ===== Collection =====

function toEntry(x: unknown): MapEntry<unknown, unknown> | MapLike<unknown, unknown> {
  if (isMapLike(x)) return x;
  if (Array.isArray(x) && x.length === 2) return [x[0], x[1]];
  if (x instanceof PersistentVector && x.count === 2) return [x.nth(0), x.nth(1)];
  throw new CapabilityError('conj', 'MapEntry', describe(x));
}

/**
 * Adds values where the collection grows naturally: the end of a vector,
 * the front of a list or seq, anywhere in a set. Maps take `[key, value]`
 * pairs or whole maps. `conj(nil, ...)` builds a list.
 */
export function conj<T>(coll: PersistentVector<T>, ...xs: T[]): PersistentVector<T>;
export function conj<T>(coll: PersistentList<T>, ...xs: T[]): PersistentList<T>;
export function conj<T>(coll: PersistentHashSet<T>, ...xs: T[]): PersistentHashSet<T>;
export function conj<T>(coll: SortedSet<T>, ...xs: T[]): SortedSet<T>;
export function conj<K, V>(coll: PersistentHashMap<K, V>, ...xs: Array<MapEntry<K, V>>): PersistentHashMap<K, V>;
export function conj<K, V>(coll: SortedMap<K, V>, ...xs: Array<MapEntry<K, V>>): SortedMap<K, V>;
export function conj(coll: unknown, ...xs: unknown[]): unknown;
export function conj(coll: unknown, ...xs: unknown[]): unknown {
  const c = requireCapability(coll, 'conj', 'Collection');
  switch (c.kind) {
    case 'nil':
      return PersistentList.empty<unknown>().conj(...xs);
    case 'vector':
    case 'list':
    case 'hash-set':
    case 'sorted-set':
      return c.value.conj(...xs);
    case 'hash-map':
    case 'sorted-map':
      return c.value.conj(...xs.map(toEntry));
    case 'seq': {
      let out: ISeq<unknown> = c.value;
      for (const x of xs) out = new Cons(x, out);
      return out;
    }
    default:
      throw new CapabilityError('conj', 'Collection', c.kind);
  }
}

/**
 * Number of elements. O(1) for every collection kind; O(n) for a lazy
 * sequence, which is walked (and realized) to the end. The walk gives up
 * with a RealizationError past `config.countLimit` cells and logs a
 * warning once it passes 10 000.
 */
export function count(coll: unknown, config: StrataConfig = DEFAULT_CONFIG): number {
  const c = requireCapability(coll, 'count', 'Sequence');
  switch (c.kind) {
    case 'nil':
      return 0;
    case 'string':
    case 'array':
      return c.value.length;
    case 'seq':
      return countSeq(c.value, config);
    default:
      return c.value.count;
  }
}

function countSeq(s: ISeq<unknown>, config: StrataConfig): number {
  if (s instanceof IndexedSeq) return s.count;
  const logger = createLogger(config.logLevel, 'strata:count');
  let n = 0;
  let cell = s.uncons();
  while (cell !== null) {
    n++;
    if (n > config.countLimit) {
      throw new RealizationError(`count walked past the limit of ${config.countLimit} cells`, 'COUNT_LIMIT');
    }
    if (n === COUNT_WARN_THRESHOLD) {
      logger.warn(`count has realized ${n} cells of a lazy sequence`);
    }
    cell = cell[1].uncons();
  }
  return n;
}

/** True when `seq` would be nil. Forces at most one cell of a lazy sequence. */
export function isEmpty(coll: unknown): boolean {
  requireCapability(coll, 'isEmpty', 'Sequence');
  return seqOf(coll) === null;
}

/** An empty collection of the same kind (and comparator, for sorted ones). */
export function empty(coll: unknown): unknown {
  const c = classify(coll);
  if (c === undefined) return null;
  switch (c.kind) {
    case 'nil':
    case 'string':
      return null;
    case 'array':
      return [];
    case 'seq':
      return EMPTY;
    default:
      return c.value.empty();
  }
}

export { seqOf as seq };

/**
 * Pours every element of `from` into `to` with `conj`.
 */
export function into<C>(to: C, from: unknown): C;
export function into(to: unknown, from: unknown): unknown {
  let out = to;
  const s = seqOf(from);
  if (s === null) return out;
  for (const x of s) out = conj(out, x);
  return out;
}

// ===== Lookup / Associative =====

/**
 * Value stored under `key`, or `notFound`. Vectors, strings and arrays are
 * keyed by index. Absence never throws; a sorted map or set whose comparator
 * rejects `key` raises ComparatorError.
 */
export function get<K, V>(coll: PersistentHashMap<K, V> | SortedMap<K, V>, key: K): V | undefined;
export function get<K, V, D>(coll: PersistentHashMap<K, V> | SortedMap<K, V>, key: K, notFound: D): V | D;
export function get(coll: unknown, key: unknown, notFound?: unknown): unknown;
export function get(coll: unknown, key: unknown, notFound?: unknown): unknown {
  const c = classify(coll);
  if (c === undefined) return notFound;
  switch (c.kind) {
    case 'hash-map':
      return c.value.get(key, notFound);
    case 'sorted-map':
      return c.value.get(key, notFound);
    case 'hash-set':
      return c.value.get(key, notFound);
    case 'sorted-set':
      return c.value.get(key, notFound);
    case 'vector':
      return c.value.get(key, notFound);
    case 'string':
      return isIndex(key, c.value.length) ? c.value.charAt(key) : notFound;
    case 'array':
      return isIndex(key, c.value.length) ? c.value[key] : notFound;
    default:
      return notFound;
  }
}

/** The stored `[key, value]` entry, or `undefined` when absent. */
export function find(coll: unknown, key: unknown): MapEntry<unknown, unknown> | undefined {
  const c = requireCapability(coll, 'find', 'Associative');
  switch (c.kind) {
    case 'hash-map':
    case 'sorted-map':
    case 'vector':
      return c.value.find(key);
    default:
      return undefined;
  }
}

/**
 * Membership by key: map keys, set members, or valid indices of a vector,
 * string or array.
 */
export function contains(coll: unknown, key: unknown): boolean {
  const c = requireCapability(coll, 'contains', 'Lookup');
  switch (c.kind) {
    case 'hash-map':
    case 'sorted-map':
    case 'hash-set':
    case 'sorted-set':
    case 'vector':
      return c.value.has(key);
    case 'string':
    case 'array':
      return isIndex(key, c.value.length);
    default:
      return false;
  }
}

export function assoc(coll: unknown, key: unknown, value: unknown, ...kvs: unknown[]): unknown {
  const c = requireCapability(coll, 'assoc', 'Associative');
  let out: unknown;
  switch (c.kind) {
    case 'nil':
      out = PersistentHashMap.empty<unknown, unknown>().assoc(key, value);
      break;
    case 'hash-map':
    case 'sorted-map':
      out = c.value.assoc(key, value);
      break;
    case 'vector':
      if (typeof key !== 'number') throw new IndexOutOfBoundsError(key, c.value.count);
      out = c.value.assoc(key, value);
      break;
    default:
      throw new CapabilityError('assoc', 'Associative', c.kind);
  }
  return kvs.length === 0 ? out : assoc(out, kvs[0], kvs[1], ...kvs.slice(2));
}

export function dissoc(coll: unknown, ...keys: unknown[]): unknown {
  const c = requireCapability(coll, 'dissoc', 'Associative');
  switch (c.kind) {
    case 'nil':
      return null;
    case 'hash-map':
    case 'sorted-map':
      return c.value.dissoc(...keys);
    default:
      throw new CapabilityError('dissoc', 'key removal', c.kind);
  }
}

/**
 * Follows `keys` through nested lookups; `notFound` as soon as one is absent.
 */
export function getIn(coll: unknown, keys: Iterable<unknown>, notFound?: unknown): unknown {
  let current = coll;
  for (const key of keys) {
    const next = get(current, key, NOT_FOUND);
    if (next === NOT_FOUND) return notFound;
    current = next;
  }
  return current;
}

// ===== Indexed =====

/**
 * Element at `index`. Out of range: `notFound` when given, otherwise an
 * IndexOutOfBoundsError. O(n) on lists and sequences.
 */
export function nth(coll: unknown, index: number): unknown;
export function nth(coll: unknown, index: number, notFound: unknown): unknown;
export function nth(coll: unknown, index: number, ...notFound: [] | [unknown]): unknown {
  const c = requireCapability(coll, 'nth', 'Indexed');
  // An explicit undefined is still a default: decide by argument count
  const fallback = notFound.length === 0 ? NOT_FOUND : notFound[0];
  const given = fallback !== NOT_FOUND;
  switch (c.kind) {
    case 'nil':
      return given ? fallback : undefined;
    case 'vector':
      return given ? c.value.nth(index, fallback) : c.value.nth(index);
    case 'list':
      return given ? c.value.nth(index, fallback) : c.value.nth(index);
    case 'seq':
      return given ? nthSeq(c.value, index, fallback) : nthSeq(c.value, index);
    case 'string':
    case 'array': {
      const length = c.value.length;
      if (isIndex(index, length)) {
        return typeof c.value === 'string' ? c.value.charAt(index) : c.value[index];
      }
      if (!given) throw new IndexOutOfBoundsError(index, length);
      return fallback;
    }
    default:
      throw new CapabilityError('nth', 'Indexed', c.kind);
  }
}

// ===== Stack =====

/** Last element of a vector, first of a list; nil when empty. */
export function peek(coll: unknown): unknown {
  const c = requireCapability(coll, 'peek', 'Stack');
  switch (c.kind) {
    case 'vector':
    case 'list':
      return c.value.peek();
    default:
      return undefined;
  }
}

/** Without the element `peek` returns; EmptyCollectionError when empty. */
export function pop(coll: unknown): unknown {
  const c = requireCapability(coll, 'pop', 'Stack');
  switch (c.kind) {
    case 'vector':
    case 'list':
      return c.value.pop();
    default:
      return null;
  }
}

// ===== Set =====

export function disj(coll: unknown, ...xs: unknown[]): unknown {
  const c = requireCapability(coll, 'disj', 'Set');
  switch (c.kind) {
    case 'hash-set':
    case 'sorted-set':
      return c.value.disj(...xs);
    default:
      return null;
  }
}

// ===== Sorted / Reversible =====

export function rseq(coll: unknown): ISeq<unknown> | null {
  const c = requireCapability(coll, 'rseq', 'Reversible');
  switch (c.kind) {
    case 'vector':
    case 'sorted-map':
    case 'sorted-set':
      return c.value.rseq();
    default:
      throw new CapabilityError('rseq', 'Reversible', c.kind);
  }
}

export function subseq(coll: unknown, ...args: RangeArgs<unknown>): ISeq<unknown> | null {
  const c = requireCapability(coll, 'subseq', 'Sorted');
  switch (c.kind) {
    case 'sorted-map':
    case 'sorted-set':
      return c.value.subseq(...args);
    default:
      throw new CapabilityError('subseq', 'Sorted', c.kind);
  }
}

export function rsubseq(coll: unknown, ...args: RangeArgs<unknown>): ISeq<unknown> | null {
  const c = requireCapability(coll, 'rsubseq', 'Sorted');
  switch (c.kind) {
    case 'sorted-map':
    case 'sorted-set':
      return c.value.rsubseq(...args);
    default:
      throw new CapabilityError('rsubseq', 'Sorted', c.kind);
  }
}
