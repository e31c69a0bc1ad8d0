/**
 * Tests for SortedMap / SortedSet
 */

import { describe, it, expect } from 'vitest';
import { compare, comparatorFrom, reverseComparator } from './compare';
import { ComparatorError } from './errors';
import { hashMap } from './hash-map';
import { hashSet } from './hash-set';
import { keyword } from './keyword';
import { seqToArray } from './seq';
import { SortedMap, isSortedMap, sortedMap, sortedMapBy } from './sorted-map';
import { SortedSet, isSortedSet, sortedSet, sortedSetBy } from './sorted-set';

describe('SortedMap', () => {
  const m = sortedMap(3, 'c', 1, 'a', 4, 'd', 2, 'b');

  it('should iterate in ascending key order', () => {
    expect([...m]).toEqual([[1, 'a'], [2, 'b'], [3, 'c'], [4, 'd']]);
    expect(seqToArray(m.keys())).toEqual([1, 2, 3, 4]);
    expect(seqToArray(m.vals())).toEqual(['a', 'b', 'c', 'd']);
    expect(isSortedMap(m)).toBe(true);
  });

  it('should walk backwards without re-sorting', () => {
    expect(seqToArray(m.rseq())).toEqual([[4, 'd'], [3, 'c'], [2, 'b'], [1, 'a']]);
  });

  it('should expose its extremes', () => {
    expect(m.first()).toEqual([1, 'a']);
    expect(m.last()).toEqual([4, 'd']);
    expect(sortedMap().first()).toBeUndefined();
  });

  it('should look up like any map', () => {
    expect(m.get(2)).toBe('b');
    expect(m.get(9, 'none')).toBe('none');
    expect(m.find(3)).toEqual([3, 'c']);
    expect(m.has(5)).toBe(false);
  });

  it('should keep the original after updates', () => {
    const m2 = m.assoc(2, 'B').dissoc(1);
    expect(seqToArray(m2.keys())).toEqual([2, 3, 4]);
    expect(m2.get(2)).toBe('B');
    expect(m.get(2)).toBe('b');
    expect(m.count).toBe(4);
    expect(m.dissoc(99)).toBe(m);
    expect(m.assoc(1, 'a')).toBe(m);
  });

  it('should conj pairs and merge maps', () => {
    const merged = sortedMap(1, 'a').conj([0, 'z']).merge(hashMap(5, 'e'), null);
    expect([...merged]).toEqual([[0, 'z'], [1, 'a'], [5, 'e']]);
  });

  describe('range views', () => {
    it('should select with one test', () => {
      expect(seqToArray(m.subseq('>=', 3))).toEqual([[3, 'c'], [4, 'd']]);
      expect(seqToArray(m.subseq('<', 3))).toEqual([[1, 'a'], [2, 'b']]);
    });

    it('should select between two tests', () => {
      expect(seqToArray(m.subseq('>', 1, '<=', 3))).toEqual([[2, 'b'], [3, 'c']]);
      expect(seqToArray(m.rsubseq('>=', 2, '<', 4))).toEqual([[3, 'c'], [2, 'b']]);
    });

    it('should return nil when nothing is in range', () => {
      expect(m.subseq('>', 4)).toBeNull();
      expect(sortedMap().subseq('>', 0)).toBeNull();
    });

    it('should take explicit bounds', () => {
      const view = m.rangeView({
        lower: { key: 2, inclusive: false },
        upper: { key: 4, inclusive: true },
        reverse: true,
      });
      expect(seqToArray(view)).toEqual([[4, 'd'], [3, 'c']]);
    });

    it('should return exactly the keys within bounds', () => {
      let big = SortedMap.empty<number, number>();
      for (let i = 0; i < 500; i++) big = big.assoc((i * 37) % 500, i);
      const inside = seqToArray(big.subseq('>=', 100, '<', 110)).map(([k]) => k);
      expect(inside).toEqual([100, 101, 102, 103, 104, 105, 106, 107, 108, 109]);
    });
  });

  it('should order by a custom comparator', () => {
    const byLength = sortedMapBy(comparatorFrom((x: string, y: string) => x.length < y.length), [
      ['ccc', 3],
      ['a', 1],
      ['bb', 2],
    ]);
    expect(seqToArray(byLength.keys())).toEqual(['a', 'bb', 'ccc']);
    expect(byLength.empty().comparator).toBe(byLength.comparator);
  });

  it('should sort keywords by namespace then name', () => {
    const kw = sortedMap(keyword('b'), 1, keyword('a', 'x'), 2, keyword('a'), 3);
    expect(seqToArray(kw.keys()).map(String)).toEqual([':a', ':b', ':x/a']);
  });

  it('should reject keys the default order cannot compare', () => {
    expect(() => sortedMap(1, 'a', 'b', 'c')).toThrow(ComparatorError);
    expect(() => sortedMap(1, 'a').assoc('z', 1)).toThrow('Cannot compare string with number');
  });

  it('should reject a comparator that returns NaN', () => {
    expect(() => sortedMapBy<number, string>(() => NaN, [[1, 'a'], [2, 'b']])).toThrow(
      'Comparator returned NaN, expected a number'
    );
  });

  it('should equal a hash map with the same entries', () => {
    expect(sortedMap(1, 'a', 2, 'b').equals(hashMap(2, 'b', 1, 'a'))).toBe(true);
    expect(sortedMap(1, 'a').hashCode()).toBe(hashMap(1, 'a').hashCode());
    expect(sortedMap(1, 'a').equals(hashMap('1', 'a'))).toBe(false);
  });

  it('should print in key order', () => {
    expect(m.toString()).toBe('{1 "a", 2 "b", 3 "c", 4 "d"}');
  });
});

describe('SortedSet', () => {
  const s = sortedSet(5, 1, 4, 2, 3, 2);

  it('should keep members sorted and distinct', () => {
    expect([...s]).toEqual([1, 2, 3, 4, 5]);
    expect(s.count).toBe(5);
    expect(s.first()).toBe(1);
    expect(s.last()).toBe(5);
    expect(isSortedSet(s)).toBe(true);
  });

  it('should select ranges in both directions', () => {
    expect(seqToArray(s.subseq('>', 1, '<=', 4))).toEqual([2, 3, 4]);
    expect(seqToArray(s.rsubseq('<', 4))).toEqual([3, 2, 1]);
    expect(seqToArray(s.rseq())).toEqual([5, 4, 3, 2, 1]);
  });

  it('should order by a reversed comparator', () => {
    expect([...sortedSetBy(reverseComparator(compare), 1, 3, 2)]).toEqual([3, 2, 1]);
  });

  it('should treat comparator-equal members as one', () => {
    const byLength = sortedSetBy<string>(comparatorFrom((x: string, y: string) => x.length < y.length), 'bb', 'cc', 'a');
    expect([...byLength]).toEqual(['a', 'bb']);
    expect(byLength.get('zz')).toBe('bb');
  });

  it('should disj idempotently', () => {
    const once = s.disj(3);
    expect(once.disj(3)).toBe(once);
    expect([...once]).toEqual([1, 2, 4, 5]);
    expect([...s]).toEqual([1, 2, 3, 4, 5]);
  });

  it('should keep the comparator when emptied', () => {
    const reversed = sortedSetBy(reverseComparator(compare), 1, 2);
    expect([...reversed.empty().conj(1, 2)]).toEqual([2, 1]);
    expect(SortedSet.empty().count).toBe(0);
  });

  it('should equal a hash set with the same members', () => {
    expect(s.equals(hashSet(1, 2, 3, 4, 5))).toBe(true);
    expect(s.toString()).toBe('#{1 2 3 4 5}');
  });
});
