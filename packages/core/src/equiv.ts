/**
 * Structural equality and hashing across every value kind.
 *
 * - nil (`null`/`undefined`) equals nil
 * - numbers by value, with `0 === -0` and `NaN` equal to itself
 * - sequential values (vectors, lists, seqs, JS arrays) by elements in order
 * - maps by entries, sets by members, regardless of hashed or sorted backing
 * - everything else by identity
 *
 * `hash` agrees with `equals`: ordered hashes for sequential values,
 * commutative hashes for maps and sets.
 */

import { MAP_HASH_SEED, SEQ_HASH_SEED, SET_HASH_SEED } from './internal/constants';
import { hashBigInt, hashNumber, hashSymbol, identityHash, mix32, murmur3 } from './internal/hash';
import { ComparatorError } from './errors';
import { Keyword, Sym } from './keyword';
import { EQUIV, type Equatable, type MapLike, type SetLike } from './types';

export function isEquatable(x: unknown): x is Equatable {
  return typeof x === 'object' && x !== null && EQUIV in x;
}

export function isSequential(x: unknown): x is Iterable<unknown> {
  if (Array.isArray(x)) return true;
  return isEquatable(x) && (x.kind === 'vector' || x.kind === 'list' || x.kind === 'seq');
}

export function isMapLike(x: unknown): x is MapLike<unknown, unknown> {
  return isEquatable(x) && (x.kind === 'hash-map' || x.kind === 'sorted-map');
}

export function isSetLike(x: unknown): x is SetLike<unknown> {
  return isEquatable(x) && (x.kind === 'hash-set' || x.kind === 'sorted-set');
}

// =====================================================
// Equality
// =====================================================

export function equals(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (a == null || b == null) return a == null && b == null;
  if (typeof a === 'number' && typeof b === 'number') {
    return Number.isNaN(a) && Number.isNaN(b);
  }
  if (isEquatable(a)) return a.equals(b);
  if (isEquatable(b)) return b.equals(a);
  if (Array.isArray(a) && Array.isArray(b)) return sequentialEquals(a, b);
  return false;
}

export function sequentialEquals(a: Iterable<unknown>, b: unknown): boolean {
  if (!isSequential(b)) return false;
  const ia = a[Symbol.iterator]();
  const ib = b[Symbol.iterator]();
  while (true) {
    const x = ia.next();
    const y = ib.next();
    if (x.done || y.done) return Boolean(x.done) && Boolean(y.done);
    if (!equals(x.value, y.value)) return false;
  }
}

// A key the probed side's comparator rejects cannot be one of its keys.
function probe<R>(lookup: () => R, absent: R): R {
  try {
    return lookup();
  } catch (e) {
    if (e instanceof ComparatorError) return absent;
    throw e;
  }
}

// Lookups go to the hashed side when there is one; two sorted sides may
// still hold keys the other's comparator rejects.
export function mapEquals(a: MapLike<unknown, unknown>, b: unknown): boolean {
  if (!isMapLike(b) || a.count !== b.count) return false;
  const [walked, probed] = b.kind === 'hash-map' ? [a, b] : [b, a];
  for (const [k, v] of walked) {
    const entry = probe(() => probed.find(k), undefined);
    if (entry === undefined || !equals(v, entry[1])) return false;
  }
  return true;
}

export function setEquals(a: SetLike<unknown>, b: unknown): boolean {
  if (!isSetLike(b) || a.count !== b.count) return false;
  const [walked, probed] = b.kind === 'hash-set' ? [a, b] : [b, a];
  for (const x of walked) {
    if (!probe(() => probed.has(x), false)) return false;
  }
  return true;
}

// =====================================================
// Hashing
// =====================================================

export function hash(x: unknown): number {
  if (x == null) return 0;
  switch (typeof x) {
    case 'string':
      return murmur3(x);
    case 'number':
      return hashNumber(x);
    case 'boolean':
      return x ? 0x27d4eb2d : 0x165667b1;
    case 'bigint':
      return hashBigInt(x);
    case 'symbol':
      return hashSymbol(x);
    case 'object':
      if (isEquatable(x)) return x.hashCode();
      if (x instanceof Keyword || x instanceof Sym) return x.hashCode();
      if (Array.isArray(x)) return hashOrdered(x);
      return identityHash(x);
    case 'function':
      return identityHash(x);
    default:
      return 0x9747b28c;
  }
}

export function hashOrdered(items: Iterable<unknown>): number {
  let h = SEQ_HASH_SEED;
  let n = 0;
  for (const x of items) {
    h = (Math.imul(31, h) + hash(x)) | 0;
    n++;
  }
  return mix32(h ^ n);
}

export function hashMapEntries(entries: Iterable<readonly [unknown, unknown]>): number {
  let sum = 0;
  let n = 0;
  for (const [k, v] of entries) {
    sum = (sum + (Math.imul(hash(k), 31) ^ hash(v))) | 0;
    n++;
  }
  return mix32(sum ^ n ^ MAP_HASH_SEED);
}

export function hashSetMembers(members: Iterable<unknown>): number {
  let sum = 0;
  let n = 0;
  for (const x of members) {
    sum = (sum + hash(x)) | 0;
    n++;
  }
  return mix32(sum ^ n ^ SET_HASH_SEED);
}
