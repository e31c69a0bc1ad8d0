/**
 * Benchmark: PersistentVector vs Native copy vs Immer
 */

import { bench, describe } from 'vitest';
import { produce as immerProduce } from 'immer';
import { vectorFrom } from '../packages/core/src/index';

// ===== Setup =====
const SIZE = 10000;
const nativeArr = Array.from({ length: SIZE }, (_, i) => i);
const vec = vectorFrom(nativeArr);

describe('Single update at index 5000', () => {
  bench('Native (copy)', () => {
    const copy = nativeArr.slice();
    copy[5000] = -1;
    return copy;
  });

  bench('PersistentVector assoc', () => {
    return vec.assoc(5000, -1);
  });

  bench('Immer produce()', () => {
    return immerProduce(nativeArr, draft => {
      draft[5000] = -1;
    });
  });
});

// ===== Append =====
describe('Append 10 items', () => {
  bench('Native (copy)', () => {
    const copy = nativeArr.slice();
    for (let i = 0; i < 10; i++) copy.push(i);
    return copy;
  });

  bench('PersistentVector conj (one at a time)', () => {
    let v = vec;
    for (let i = 0; i < 10; i++) v = v.conj(i);
    return v;
  });

  bench('PersistentVector conj (batched)', () => {
    return vec.conj(0, 1, 2, 3, 4, 5, 6, 7, 8, 9);
  });

  bench('Immer produce()', () => {
    return immerProduce(nativeArr, draft => {
      for (let i = 0; i < 10; i++) draft.push(i);
    });
  });
});

// ===== Reads =====
describe('Random reads', () => {
  const indices = Array.from({ length: 1000 }, (_, i) => (i * 7919) % SIZE);

  bench('Native', () => {
    let sum = 0;
    for (const i of indices) sum += nativeArr[i];
    return sum;
  });

  bench('PersistentVector nth', () => {
    let sum = 0;
    for (const i of indices) sum += vec.nth(i);
    return sum;
  });
});

// ===== Construction =====
describe('Build from 10k items', () => {
  bench('Native', () => {
    return Array.from(nativeArr);
  });

  bench('vectorFrom', () => {
    return vectorFrom(nativeArr);
  });
});
