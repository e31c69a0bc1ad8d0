/**
 * Default ordering for sorted collections
 *
 * nil sorts before everything. Otherwise both sides must belong to the same
 * family:
 *
 * - numbers numerically, NaN after every other number and equal to itself
 * - bigints numerically
 * - strings by UTF-16 code units
 * - booleans with `false` first
 * - keywords and symbols by namespace (none first), then name
 * - vectors and arrays by length first, then element by element
 *
 * Anything else, or a mix of families, is a ComparatorError.
 */

import { ComparatorError } from './errors';
import { Keyword, Sym } from './keyword';
import { describe } from './seq';
import type { Comparator } from './types';
import { PersistentVector } from './vector';

type Family = 'number' | 'bigint' | 'string' | 'boolean' | 'keyword' | 'symbol' | 'indexed';

function familyOf(x: unknown): Family | undefined {
  const t = typeof x;
  if (t === 'number' || t === 'bigint' || t === 'string' || t === 'boolean') return t;
  if (x instanceof Keyword) return 'keyword';
  if (x instanceof Sym) return 'symbol';
  if (x instanceof PersistentVector || Array.isArray(x)) return 'indexed';
  return undefined;
}

function sign(a: number | bigint | string, b: number | bigint | string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareNumbers(a: number, b: number): number {
  const aNaN = Number.isNaN(a);
  const bNaN = Number.isNaN(b);
  if (aNaN || bNaN) return aNaN === bNaN ? 0 : aNaN ? 1 : -1;
  return sign(a, b);
}

function compareNames(a: Keyword | Sym, b: Keyword | Sym): number {
  if (a.namespace !== b.namespace) {
    if (a.namespace === undefined) return -1;
    if (b.namespace === undefined) return 1;
    return sign(a.namespace, b.namespace);
  }
  return sign(a.name, b.name);
}

function toIndexed(x: unknown): readonly unknown[] {
  if (x instanceof PersistentVector) return x.toArray();
  return Array.isArray(x) ? x : [];
}

function compareIndexed(a: readonly unknown[], b: readonly unknown[]): number {
  if (a.length !== b.length) return a.length < b.length ? -1 : 1;
  for (let i = 0; i < a.length; i++) {
    const c = compare(a[i], b[i]);
    if (c !== 0) return c;
  }
  return 0;
}

export function compare(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a == null) return b == null ? 0 : -1;
  if (b == null) return 1;

  const family = familyOf(a);
  if (family === undefined || family !== familyOf(b)) {
    throw new ComparatorError(`Cannot compare ${describe(a)} with ${describe(b)}`);
  }

  if (typeof a === 'number' && typeof b === 'number') return compareNumbers(a, b);
  if (typeof a === 'bigint' && typeof b === 'bigint') return sign(a, b);
  if (typeof a === 'string' && typeof b === 'string') return sign(a, b);
  if (typeof a === 'boolean' && typeof b === 'boolean') return a ? 1 : -1;
  if (a instanceof Keyword && b instanceof Keyword) return compareNames(a, b);
  if (a instanceof Sym && b instanceof Sym) return compareNames(a, b);
  return compareIndexed(toIndexed(a), toIndexed(b));
}

/**
 * Comparator from a strict "comes before" predicate: `a` first when
 * `before(a, b)`, `b` first when `before(b, a)`, otherwise equal.
 */
export function comparatorFrom<T>(before: (a: T, b: T) => boolean): Comparator<T> {
  return (a, b) => (before(a, b) ? -1 : before(b, a) ? 1 : 0);
}

export function reverseComparator<T>(cmp: Comparator<T>): Comparator<T> {
  return (a, b) => cmp(b, a);
}
