/**
 * Sequences - the sequential view every collection can produce, and lazy
 * sequences whose cells are computed on demand and cached.
 *
 * - Cons         → realized head + tail seq
 * - LazySeq      → memoized producer of a seq (may be infinite)
 * - IndexedSeq   → view over anything with O(1) positional access
 * - EMPTY        → the terminal seq
 */

import { hashOrdered, isEquatable, sequentialEquals } from './equiv';
import { CapabilityError, IndexOutOfBoundsError } from './errors';
import { forceCell, isCellRealized, lazyCell, type LazyCell } from './internal/lazy';
import { printItems } from './print';
import { EQUIV, type ISeq, type SeqSource } from './types';

// =====================================================
// Base
// =====================================================

export abstract class ASeq<T> implements ISeq<T> {
  readonly [EQUIV] = true as const;
  private cachedHash: number | undefined;

  get kind(): 'seq' | 'list' {
    return 'seq';
  }

  abstract uncons(): readonly [T, ISeq<T>] | null;

  first(): T | undefined {
    const cell = this.uncons();
    return cell === null ? undefined : cell[0];
  }

  rest(): ISeq<T> {
    const cell = this.uncons();
    return cell === null ? EMPTY : cell[1];
  }

  next(): ISeq<T> | null {
    return this.rest().seq();
  }

  seq(): ISeq<T> | null {
    return this.uncons() === null ? null : this;
  }

  *[Symbol.iterator](): Iterator<T> {
    let cell = this.uncons();
    while (cell !== null) {
      yield cell[0];
      cell = cell[1].uncons();
    }
  }

  equals(other: unknown): boolean {
    return this === other || sequentialEquals(this, other);
  }

  hashCode(): number {
    if (this.cachedHash === undefined) {
      this.cachedHash = hashOrdered(this);
    }
    return this.cachedHash;
  }

  toString(): string {
    return printItems(this, '(', ')');
  }
}

class EmptySeq extends ASeq<never> {
  uncons(): null {
    return null;
  }

  seq(): null {
    return null;
  }
}

export const EMPTY: ISeq<never> = new EmptySeq();

export class Cons<T> extends ASeq<T> {
  constructor(
    private readonly head: T,
    private readonly tail: ISeq<T>
  ) {
    super();
  }

  uncons(): readonly [T, ISeq<T>] {
    return [this.head, this.tail];
  }

  first(): T {
    return this.head;
  }

  rest(): ISeq<T> {
    return this.tail;
  }
}

/**
 * Positional view: elements `at(i)` for `i` walking from `index` towards
 * `end` (exclusive) by `step`.
 */
export class IndexedSeq<T> extends ASeq<T> {
  constructor(
    private readonly at: (i: number) => T,
    private readonly index: number,
    private readonly end: number,
    private readonly step: 1 | -1 = 1
  ) {
    super();
  }

  get count(): number {
    return (this.end - this.index) * this.step;
  }

  uncons(): readonly [T, ISeq<T>] | null {
    if (this.count <= 0) return null;
    return [this.at(this.index), this.rest()];
  }

  rest(): ISeq<T> {
    const nextIndex = this.index + this.step;
    if ((this.end - nextIndex) * this.step <= 0) return EMPTY;
    return new IndexedSeq(this.at, nextIndex, this.end, this.step);
  }

  nth(n: number): T {
    return this.at(this.index + n * this.step);
  }
}

// =====================================================
// LazySeq
// =====================================================

export class LazySeq<T> extends ASeq<T> {
  private readonly cell: LazyCell<ISeq<T> | null>;

  constructor(producer: () => SeqSource<T>) {
    super();
    this.cell = lazyCell(() => seq(producer()));
  }

  isRealized(): boolean {
    return isCellRealized(this.cell);
  }

  uncons(): readonly [T, ISeq<T>] | null {
    const s = forceCell(this.cell);
    return s === null ? null : s.uncons();
  }

  seq(): ISeq<T> | null {
    return forceCell(this.cell);
  }
}

// =====================================================
// Construction
// =====================================================

export function isSeq<T>(x: SeqSource<T>): x is ISeq<T>;
export function isSeq(x: unknown): x is ISeq<unknown>;
export function isSeq(x: unknown): boolean {
  return isEquatable(x) && (x.kind === 'seq' || x.kind === 'list');
}

function indexedSeqOf<T>(items: readonly T[]): ISeq<T> | null {
  if (items.length === 0) return null;
  return new IndexedSeq(i => items[i], 0, items.length);
}

export function stringSeq(s: string): ISeq<string> | null {
  if (s.length === 0) return null;
  return new IndexedSeq(i => s.charAt(i), 0, s.length);
}

/**
 * Sequence view of a collection, or `null` when it is empty or nil.
 */
export function seq<T>(coll: SeqSource<T>): ISeq<T> | null {
  if (coll == null) return null;
  if ('seq' in coll) return coll.seq();
  return indexedSeqOf(coll);
}

/**
 * `seq` over a value of unknown shape. Fails with a capability error when the
 * value has no sequential view.
 */
export function seqOf(x: unknown): ISeq<unknown> | null {
  if (x == null) return null;
  if (typeof x === 'string') return stringSeq(x);
  if (Array.isArray(x)) return indexedSeqOf(x);
  if (isEquatable(x)) return x.seq();
  throw new CapabilityError('seq', 'Sequence', describe(x));
}

export function isSeqable(x: unknown): boolean {
  return x == null || typeof x === 'string' || Array.isArray(x) || isEquatable(x);
}

export function describe(x: unknown): string {
  if (x == null) return 'nil';
  if (isEquatable(x)) return x.kind;
  if (Array.isArray(x)) return 'array';
  if (typeof x === 'object') return x.constructor?.name ?? 'object';
  return typeof x;
}

function asSeq<T>(coll: SeqSource<T>): ISeq<T> {
  if (coll != null && isSeq<T>(coll)) return coll;
  return seq(coll) ?? EMPTY;
}

function uncons<T>(coll: SeqSource<T>): readonly [T, ISeq<T>] | null {
  const s = seq(coll);
  return s === null ? null : s.uncons();
}

export function lazySeq<T>(producer: () => SeqSource<T>): LazySeq<T> {
  return new LazySeq(producer);
}

/**
 * Memoized lazy sequence over a one-shot iterator. Each cell pulls one
 * element the first time it is forced, so the iterator is advanced once
 * per element however often the sequence is walked.
 */
export function iteratorSeq<T>(it: Iterator<T>): ISeq<T> {
  return lazySeq(() => {
    const step = it.next();
    return step.done ? null : new Cons(step.value, iteratorSeq(it));
  });
}

/**
 * Prepends `x` without forcing `coll`.
 */
export function cons<T>(x: T, coll: SeqSource<T>): ISeq<T> {
  return new Cons(x, asSeq(coll));
}

export function listStar<T>(items: readonly T[], coll: SeqSource<T>): ISeq<T> {
  let out = asSeq(coll);
  for (let i = items.length - 1; i >= 0; i--) {
    out = new Cons(items[i], out);
  }
  return out;
}

export function first<T>(coll: SeqSource<T>): T | undefined {
  const cell = uncons(coll);
  return cell === null ? undefined : cell[0];
}

export function rest<T>(coll: SeqSource<T>): ISeq<T> {
  const s = seq(coll);
  return s === null ? EMPTY : s.rest();
}

export function next<T>(coll: SeqSource<T>): ISeq<T> | null {
  const s = seq(coll);
  return s === null ? null : s.next();
}

// =====================================================
// Sequence library
// =====================================================

/**
 * `x, f(x), f(f(x)), ...` - each application happens when its cell is forced.
 */
export function iterate<T>(f: (x: T) => T, x: T): ISeq<T> {
  return new Cons(x, lazySeq(() => iterate(f, f(x))));
}

export function range(end?: number): ISeq<number>;
export function range(start: number, end: number | undefined, step?: number): ISeq<number>;
export function range(a?: number, b?: number, step = 1): ISeq<number> {
  const start = arguments.length === 1 ? 0 : a ?? 0;
  const end = arguments.length === 1 ? a : b;
  const inRange = (n: number): boolean => {
    if (end === undefined || step === 0) return true;
    return step > 0 ? n < end : n > end;
  };
  const from = (n: number): ISeq<number> =>
    lazySeq(() => (inRange(n) ? new Cons(n, from(n + step)) : null));
  return from(start);
}

export function repeat<T>(x: T, n?: number): ISeq<T> {
  if (n === undefined) return lazySeq(() => new Cons(x, repeat(x)));
  return take(n, repeat(x));
}

export function map<T, U>(f: (x: T) => U, coll: SeqSource<T>): ISeq<U> {
  return lazySeq(() => {
    const cell = uncons(coll);
    return cell === null ? null : new Cons(f(cell[0]), map(f, cell[1]));
  });
}

export function filter<T>(pred: (x: T) => boolean, coll: SeqSource<T>): ISeq<T> {
  return lazySeq(() => {
    let cell = uncons(coll);
    while (cell !== null && !pred(cell[0])) {
      cell = cell[1].uncons();
    }
    return cell === null ? null : new Cons(cell[0], filter(pred, cell[1]));
  });
}

export function take<T>(n: number, coll: SeqSource<T>): ISeq<T> {
  return lazySeq(() => {
    if (n <= 0) return null;
    const cell = uncons(coll);
    return cell === null ? null : new Cons(cell[0], take(n - 1, cell[1]));
  });
}

export function takeWhile<T>(pred: (x: T) => boolean, coll: SeqSource<T>): ISeq<T> {
  return lazySeq(() => {
    const cell = uncons(coll);
    return cell === null || !pred(cell[0]) ? null : new Cons(cell[0], takeWhile(pred, cell[1]));
  });
}

export function drop<T>(n: number, coll: SeqSource<T>): ISeq<T> {
  return lazySeq(() => {
    let s = seq(coll);
    for (let i = 0; i < n && s !== null; i++) {
      s = s.next();
    }
    return s;
  });
}

export function concat<T>(...colls: Array<SeqSource<T>>): ISeq<T> {
  if (colls.length === 0) return EMPTY;
  const [head, ...tail] = colls;
  return lazySeq(() => {
    const cell = uncons(head);
    if (cell === null) return concat(...tail);
    return new Cons(cell[0], concat<T>(cell[1], ...tail));
  });
}

/**
 * Element `n` of `coll`, walking from the head. Past the end: `notFound`
 * when given, an IndexOutOfBoundsError otherwise.
 */
export function nthSeq<T>(coll: SeqSource<T>, n: number): T;
export function nthSeq<T, D>(coll: SeqSource<T>, n: number, notFound: D): T | D;
export function nthSeq<T, D>(coll: SeqSource<T>, n: number, ...notFound: [] | [D]): T | D {
  let cell = Number.isInteger(n) && n >= 0 ? uncons(coll) : null;
  let walked = 0;
  while (cell !== null) {
    if (walked === n) return cell[0];
    walked++;
    cell = cell[1].uncons();
  }
  if (notFound.length === 0) throw new IndexOutOfBoundsError(n, walked);
  return notFound[0];
}

export function reduce<T, A>(f: (acc: A, x: T) => A, init: A, coll: SeqSource<T>): A {
  let acc = init;
  let cell = uncons(coll);
  while (cell !== null) {
    acc = f(acc, cell[0]);
    cell = cell[1].uncons();
  }
  return acc;
}

/**
 * Forces every cell of `coll`. Never returns for an infinite sequence.
 */
export function doall<T>(coll: SeqSource<T>): ISeq<T> {
  const s = asSeq(coll);
  let cell = s.uncons();
  while (cell !== null) {
    cell = cell[1].uncons();
  }
  return s;
}

export function seqToArray<T>(coll: SeqSource<T>): T[] {
  return reduce<T, T[]>((acc, x) => {
    acc.push(x);
    return acc;
  }, [], coll);
}

export function isRealized(coll: ISeq<unknown>): boolean {
  return !(coll instanceof LazySeq) || coll.isRealized();
}
