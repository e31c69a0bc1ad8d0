/**
 * Benchmark: PersistentHashMap vs Native Map copy vs Immer
 */

import { bench, describe } from 'vitest';
import { enableMapSet, produce as immerProduce } from 'immer';
import { hashMapFrom, keyword, sortedMapBy, vector } from '../packages/core/src/index';

enableMapSet();

// ===== Setup =====
const SIZE = 10000;
const entries = Array.from({ length: SIZE }, (_, i): [string, number] => [`key${i}`, i]);
const nativeMap = new Map(entries);
const map = hashMapFrom(entries);

describe('Single set', () => {
  bench('Native Map (copy)', () => {
    const copy = new Map(nativeMap);
    copy.set('key5000', -1);
    return copy;
  });

  bench('PersistentHashMap assoc', () => {
    return map.assoc('key5000', -1);
  });

  bench('Immer produce()', () => {
    return immerProduce(nativeMap, draft => {
      draft.set('key5000', -1);
    });
  });
});

describe('Lookups', () => {
  bench('Native Map', () => {
    let sum = 0;
    for (let i = 0; i < 1000; i++) sum += nativeMap.get(`key${i * 7}`) ?? 0;
    return sum;
  });

  bench('PersistentHashMap get', () => {
    let sum = 0;
    for (let i = 0; i < 1000; i++) sum += map.get(`key${i * 7}`) ?? 0;
    return sum;
  });
});

describe('Structural keys', () => {
  const byVector = hashMapFrom(Array.from({ length: 1000 }, (_, i): [unknown, number] => [vector<unknown>(keyword('row'), i), i]));

  bench('PersistentHashMap get by vector key', () => {
    let sum = 0;
    for (let i = 0; i < 1000; i += 10) sum += byVector.get(vector<unknown>(keyword('row'), i)) ?? 0;
    return sum;
  });
});

describe('Sorted insert of 1000 keys', () => {
  bench('SortedMap', () => {
    let m = sortedMapBy<number, number>((a, b) => a - b);
    for (let i = 0; i < 1000; i++) m = m.assoc((i * 7919) % 1000, i);
    return m;
  });
});
