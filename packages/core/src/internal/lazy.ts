/**
 * LazyCell - single-assignment memoized computation
 *
 * unrealized(producer) → realizing → realized(value)
 *
 * The producer runs at most once per successful realization and is dropped
 * afterwards. A producer that throws leaves the cell unrealized.
 */

import { RealizationError } from '../errors';

export type CellState<R> =
  | { state: 'unrealized'; producer: () => R }
  | { state: 'realizing' }
  | { state: 'realized'; value: R };

export interface LazyCell<R> {
  current: CellState<R>;
}

export function lazyCell<R>(producer: () => R): LazyCell<R> {
  return { current: { state: 'unrealized', producer } };
}

export function isCellRealized<R>(cell: LazyCell<R>): boolean {
  return cell.current.state === 'realized';
}

export function forceCell<R>(cell: LazyCell<R>): R {
  const current = cell.current;
  switch (current.state) {
    case 'realized':
      return current.value;
    case 'realizing':
      throw new RealizationError('Lazy cell forced again while its producer is running', 'LAZY_REENTRANT');
    case 'unrealized': {
      cell.current = { state: 'realizing' };
      try {
        const value = current.producer();
        cell.current = { state: 'realized', value };
        return value;
      } catch (e) {
        cell.current = current;
        throw e;
      }
    }
  }
}
