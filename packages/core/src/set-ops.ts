/**
 * Set algebra over any mix of hashed and sorted sets. Results keep the
 * variant (and comparator) of the first argument.
 */

import type { SetLike } from './types';

export interface PersistentSetOps<T, S> extends SetLike<T> {
  conj(...values: T[]): S;
  disj(...values: T[]): S;
}

export function union<T, S extends PersistentSetOps<T, S>>(first: S, ...others: Array<SetLike<T>>): S {
  let out = first;
  for (const other of others) {
    for (const x of other) out = out.conj(x);
  }
  return out;
}

export function intersection<T, S extends PersistentSetOps<T, S>>(first: S, ...others: Array<SetLike<T>>): S {
  let out = first;
  for (const x of first) {
    if (!others.every(other => other.has(x))) out = out.disj(x);
  }
  return out;
}

export function difference<T, S extends PersistentSetOps<T, S>>(first: S, ...others: Array<SetLike<T>>): S {
  let out = first;
  for (const other of others) {
    for (const x of other) {
      if (out.has(x)) out = out.disj(x);
    }
  }
  return out;
}

/** Every member of `a` is in `b`. */
export function isSubset<T>(a: SetLike<T>, b: SetLike<T>): boolean {
  if (a.count > b.count) return false;
  for (const x of a) {
    if (!b.has(x)) return false;
  }
  return true;
}

export function isSuperset<T>(a: SetLike<T>, b: SetLike<T>): boolean {
  return isSubset(b, a);
}
