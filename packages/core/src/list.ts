/**
 * PersistentList - singly linked, counted, grows at the front
 */

import { EmptyCollectionError, IndexOutOfBoundsError } from './errors';
import { ASeq } from './seq';
import type { ISeq } from './types';

export class PersistentList<T> extends ASeq<T> {
  private static readonly EMPTY: PersistentList<never> = new PersistentList<never>(null, 0);

  private constructor(
    private readonly cell: readonly [T, PersistentList<T>] | null,
    readonly count: number
  ) {
    super();
  }

  static empty<T>(): PersistentList<T> {
    return PersistentList.EMPTY;
  }

  static from<T>(items: Iterable<T>): PersistentList<T> {
    const values = [...items];
    let list: PersistentList<T> = PersistentList.EMPTY;
    for (let i = values.length - 1; i >= 0; i--) {
      list = new PersistentList<T>([values[i], list], list.count + 1);
    }
    return list;
  }

  get kind(): 'list' {
    return 'list';
  }

  uncons(): readonly [T, PersistentList<T>] | null {
    return this.cell;
  }

  rest(): PersistentList<T> {
    return this.cell === null ? PersistentList.EMPTY : this.cell[1];
  }

  isEmpty(): boolean {
    return this.cell === null;
  }

  /** Prepends each value in turn, so the last one ends up first. */
  conj(...values: T[]): PersistentList<T> {
    let list: PersistentList<T> = this;
    for (const value of values) {
      list = new PersistentList<T>([value, list], list.count + 1);
    }
    return list;
  }

  peek(): T | undefined {
    return this.cell === null ? undefined : this.cell[0];
  }

  pop(): PersistentList<T> {
    if (this.cell === null) throw new EmptyCollectionError('pop', 'list');
    return this.cell[1];
  }

  empty(): PersistentList<T> {
    return PersistentList.EMPTY;
  }

  nth(index: number): T;
  nth<D>(index: number, notFound: D): T | D;
  nth<D>(index: number, ...notFound: [] | [D]): T | D {
    if (Number.isInteger(index) && index >= 0) {
      let cell = this.cell;
      for (let i = 0; cell !== null; i++, cell = cell[1].cell) {
        if (i === index) return cell[0];
      }
    }
    if (notFound.length === 0) throw new IndexOutOfBoundsError(index, this.count);
    return notFound[0];
  }

  seq(): ISeq<T> | null {
    return this.cell === null ? null : this;
  }
}

export function list<T>(...items: T[]): PersistentList<T> {
  return PersistentList.from(items);
}

export function isList(x: unknown): x is PersistentList<unknown> {
  return x instanceof PersistentList;
}
