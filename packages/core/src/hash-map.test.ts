/**
 * Tests for PersistentHashMap and the HAMT underneath it
 */

import { describe, it, expect } from 'vitest';
import { hashMap, hashMapFrom, isHashMap, PersistentHashMap } from './hash-map';
import type { HChild } from './internal/hamt';
import { keyword } from './keyword';
import { seqToArray } from './seq';
import { sortedMap } from './sorted-map';
import { EQUIV, type Equatable } from './types';
import { vector } from './vector';

// Distinct keys that all hash alike
class CollidingKey implements Equatable {
  readonly [EQUIV] = true as const;
  readonly kind = 'vector' as const;

  constructor(readonly id: string) {}

  equals(other: unknown): boolean {
    return other instanceof CollidingKey && other.id === this.id;
  }

  hashCode(): number {
    return 42;
  }

  seq(): null {
    return null;
  }

  *[Symbol.iterator](): Iterator<unknown> {}
}

function childrenOf<K, V>(node: HChild<K, V> | null): Array<HChild<K, V>> {
  if (node === null || node.kind !== 'node') throw new Error('expected a bitmap node');
  return node.children;
}

const a = keyword('a');
const b = keyword('b');

describe('PersistentHashMap', () => {
  describe('lookup', () => {
    const m = hashMap(a, 1, b, null);

    it('should return stored values', () => {
      expect(m.get(a)).toBe(1);
      expect(m.count).toBe(2);
      expect(isHashMap(m)).toBe(true);
    });

    it('should tell absence apart from a stored null', () => {
      expect(m.get(keyword('c'), 'default')).toBe('default');
      expect(m.get(b, 'default')).toBeNull();
      expect(m.get(keyword('c'))).toBeUndefined();
      expect(m.find(b)).toEqual([b, null]);
      expect(m.find(keyword('c'))).toBeUndefined();
      expect(m.has(b)).toBe(true);
    });

    it('should store undefined as a present value', () => {
      const u = hashMap(a, undefined);
      expect(u.has(a)).toBe(true);
      expect(u.get(a, 'default')).toBeUndefined();
      expect(u.count).toBe(1);
    });
  });

  describe('updates', () => {
    it('should keep the old version after assoc', () => {
      const m1 = hashMap(a, 1);
      const m2 = m1.assoc(a, 2);
      expect(m1.get(a)).toBe(1);
      expect(m2.get(a)).toBe(2);
    });

    it('should return the same map when nothing changes', () => {
      const m = hashMap(a, 1);
      expect(m.assoc(a, 1)).toBe(m);
      expect(m.dissoc(b)).toBe(m);
    });

    it('should count only distinct keys', () => {
      let m = PersistentHashMap.empty<number, string>();
      for (let i = 0; i < 200; i++) m = m.assoc(i % 50, `v${i}`);
      expect(m.count).toBe(50);
      m = m.dissoc(0, 1, 1, 999);
      expect(m.count).toBe(48);
      expect(m.get(49)).toBe('v199');
    });

    it('should compare keys structurally and keep the first stored key', () => {
      const key = vector(1, 2);
      const m = hashMap(key, 'a').assoc([1, 2], 'b');
      expect(m.count).toBe(1);
      expect(m.get(vector(1, 2))).toBe('b');
      expect(m.find([1, 2])?.[0]).toBe(key);
    });

    it('should treat -0 and 0 as one key', () => {
      expect(hashMap(0, 'zero').get(-0)).toBe('zero');
    });

    it('should conj pairs and merge maps', () => {
      const m = hashMap(a, 1).conj([b, 2], hashMap(a, 10));
      expect(m.get(a)).toBe(10);
      expect(m.get(b)).toBe(2);
      expect(hashMap(a, 1).merge(null, hashMap(b, 2)).count).toBe(2);
    });

    it('should empty to the shared empty map', () => {
      expect(hashMap(a, 1).dissoc(a)).toBe(PersistentHashMap.empty());
      expect(hashMap(a, 1).empty()).toBe(PersistentHashMap.empty());
    });
  });

  describe('hash collisions', () => {
    const k1 = new CollidingKey('one');
    const k2 = new CollidingKey('two');
    const k3 = new CollidingKey('three');

    it('should keep colliding keys apart', () => {
      const m = hashMapFrom<unknown, number>([[k1, 1], [k2, 2], [k3, 3]]);
      expect(m.count).toBe(3);
      expect(m.get(k1)).toBe(1);
      expect(m.get(new CollidingKey('two'))).toBe(2);
      expect(m.get(k3)).toBe(3);
      expect(m.has(new CollidingKey('four'))).toBe(false);
    });

    it('should remove from a collision bucket down to a single leaf', () => {
      const m = hashMapFrom<unknown, number>([[k1, 1], [k2, 2], [k3, 3]]).dissoc(k2, k1);
      expect(m.count).toBe(1);
      expect(m.get(k3)).toBe(3);
      expect(m.trie.root?.kind).toBe('leaf');
    });

    it('should store other keys beside a collision bucket', () => {
      let m = hashMapFrom<unknown, number>([[k1, 1], [k2, 2]]);
      for (let i = 0; i < 100; i++) m = m.assoc(i, i);
      expect(m.count).toBe(102);
      expect(m.get(k1)).toBe(1);
      expect(m.get(k2)).toBe(2);
      expect(m.get(77)).toBe(77);
      expect(m.dissoc(k1).get(k2)).toBe(2);
    });
  });

  describe('structural sharing', () => {
    it('should share every root child off the update path', () => {
      const m1 = hashMapFrom(Array.from({ length: 1000 }, (_, i) => [i, i] as const));
      const m2 = m1.assoc(500, -1);
      const before = childrenOf(m1.trie.root);
      const after = childrenOf(m2.trie.root);

      expect(after).toHaveLength(before.length);
      expect(after.filter((child, i) => child === before[i])).toHaveLength(before.length - 1);
      expect(m1.get(500)).toBe(500);
    });
  });

  describe('views and equality', () => {
    const m = hashMap(a, 1, b, 2);

    it('should list keys, values and entries', () => {
      expect(seqToArray(m.keys()).length).toBe(2);
      expect(seqToArray(m.vals()).sort()).toEqual([1, 2]);
      expect(seqToArray(m.seq()).length).toBe(2);
      expect(hashMap().seq()).toBeNull();
    });

    it('should equal maps with the same entries in any order or backing', () => {
      expect(m.equals(hashMap(b, 2, a, 1))).toBe(true);
      expect(m.hashCode()).toBe(hashMap(b, 2, a, 1).hashCode());
      expect(hashMap(1, 'x', 2, 'y').equals(sortedMap(2, 'y', 1, 'x'))).toBe(true);
      expect(m.equals(hashMap(a, 1))).toBe(false);
      expect(m.equals(hashMap(a, 1, b, 3))).toBe(false);
    });

    it('should print entries', () => {
      expect(hashMap(a, 'x').toString()).toBe('{:a "x"}');
      expect(hashMap().toString()).toBe('{}');
    });
  });
});
