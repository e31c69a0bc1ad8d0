import { describe, it, expect } from 'vitest';
import { equals, hash } from './equiv';
import { hashMap } from './hash-map';
import { hashSet } from './hash-set';
import { keyword, symbol } from './keyword';
import { list } from './list';
import { range } from './seq';
import { sortedMap } from './sorted-map';
import { sortedSet } from './sorted-set';
import { vector } from './vector';

describe('equals', () => {
  it('should treat null and undefined as the same nil', () => {
    expect(equals(null, undefined)).toBe(true);
    expect(equals(null, 0)).toBe(false);
    expect(equals(false, null)).toBe(false);
  });

  it('should compare numbers by value', () => {
    expect(equals(0, -0)).toBe(true);
    expect(equals(NaN, NaN)).toBe(true);
    expect(equals(1, '1')).toBe(false);
  });

  it('should compare sequential values by elements', () => {
    expect(equals(vector(1, 2, 3), list(1, 2, 3))).toBe(true);
    expect(equals([1, 2, 3], vector(1, 2, 3))).toBe(true);
    expect(equals(range(3), [0, 1, 2])).toBe(true);
    expect(equals([1, [2]], [1, vector(2)])).toBe(true);
    expect(equals(vector(1, 2), vector(2, 1))).toBe(false);
  });

  it('should compare maps and sets regardless of backing', () => {
    expect(equals(hashMap(1, 'a', 2, 'b'), sortedMap(2, 'b', 1, 'a'))).toBe(true);
    expect(equals(sortedMap(1, 'a'), hashMap(1, 'z'))).toBe(false);
    expect(equals(hashSet(3, 1), sortedSet(1, 3))).toBe(true);
    expect(equals(hashSet(1), vector(1))).toBe(false);
  });

  it('should compare a sorted map with a hashed map holding keys its comparator rejects', () => {
    expect(equals(sortedMap(1, 'a'), hashMap('x', 'a'))).toBe(false);
  });

  it('should compare sorted collections whose keys the other side cannot order', () => {
    expect(equals(sortedSet(1), sortedSet('a'))).toBe(false);
    expect(equals(sortedMap(1, 1), sortedMap('a', 1))).toBe(false);
    expect(equals(sortedMap('a', 1), sortedMap(1, 1))).toBe(false);
    expect(equals(sortedSet(vector(1)), sortedSet(2))).toBe(false);
  });

  it('should compare names by identity and plain objects by reference', () => {
    expect(equals(keyword('a', 'ns'), keyword('a', 'ns'))).toBe(true);
    expect(equals(keyword('a'), symbol('a'))).toBe(false);
    const o = {};
    expect(equals(o, o)).toBe(true);
    expect(equals({}, {})).toBe(false);
  });
});

describe('hash', () => {
  it('should agree with equals across kinds', () => {
    expect(hash(vector(1, 2))).toBe(hash([1, 2]));
    expect(hash(list(1, 2))).toBe(hash(range(1, 3)));
    expect(hash(hashMap(1, 'a', 2, 'b'))).toBe(hash(sortedMap(1, 'a', 2, 'b')));
    expect(hash(hashSet('x', 'y'))).toBe(hash(sortedSet('y', 'x')));
    expect(hash(0)).toBe(hash(-0));
    expect(hash(null)).toBe(hash(undefined));
  });

  it('should keep ordered and unordered families apart', () => {
    expect(hash(vector(1, 2))).not.toBe(hash(hashSet(1, 2)));
  });
});
