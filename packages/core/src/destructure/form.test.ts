import { describe, it, expect } from 'vitest';
import { PatternError } from '../errors';
import { hashMap } from '../hash-map';
import { keyword, symbol } from '../keyword';
import { printValue } from '../print';
import { vector } from '../vector';
import { destructure, toRecord } from './compile';
import { patternFromForm } from './form';

const s = (name: string) => symbol(name);

describe('patternFromForm', () => {
  describe('symbols', () => {
    it('should read a simple symbol as a leaf', () => {
      expect(patternFromForm(s('x'))).toEqual({ type: 'leaf', name: 'x' });
    });

    it('should reject a qualified symbol', () => {
      expect(() => patternFromForm(symbol('x', 'ns'))).toThrow('Expected a simple symbol, got ns/x (at $)');
    });
  });

  describe('vector forms', () => {
    it('should read positions, rest and as', () => {
      const form = vector<unknown>(s('a'), s('_'), vector(s('_'), s('b')), s('&'), s('rest'), keyword('as'), s('all'));

      expect(patternFromForm(form)).toEqual({
        type: 'seq',
        items: [
          { type: 'leaf', name: 'a' },
          { type: 'leaf', name: '_' },
          { type: 'seq', items: [{ type: 'leaf', name: '_' }, { type: 'leaf', name: 'b' }] },
        ],
        rest: { type: 'leaf', name: 'rest' },
        as: 'all',
      });
    });

    it('should compile to the same bindings as the builder form', () => {
      const form = vector<unknown>(s('a'), s('_'), vector(s('_'), s('b')), s('&'), s('rest'), keyword('as'), s('all'));
      const source = [10, 20, [1, 2, 3], 30, 40];
      const r = toRecord(destructure(patternFromForm(form), source));

      expect(r.a).toBe(10);
      expect(r.b).toBe(2);
      expect(printValue(r.rest)).toBe('(30 40)');
      expect(r.all).toBe(source);
    });

    it('should report the position of a bad item', () => {
      expect(() => patternFromForm(vector<unknown>(s('a'), vector(42)))).toThrow('Not a binding form: 42 (at $[1][0])');
      expect(() => patternFromForm(vector<unknown>(s('a'), keyword('as')))).toThrow(':as needs a name (at $[1])');
      expect(() => patternFromForm(vector(s('&')))).toThrow('& needs a pattern (at $[0])');
    });

    it('should allow a single rest before any as', () => {
      expect(() => patternFromForm(vector(s('&'), s('a'), s('&'), s('b')))).toThrow('Only one & rest is allowed (at $[2])');
      expect(() => patternFromForm(vector(s('&'), s('r'), s('x')))).toThrow(
        'Positional items must come before & and :as (at $[2])'
      );
    });
  });

  describe('map forms', () => {
    it('should read selectors, shorthands, defaults and as', () => {
      const form = hashMap(
        s('n'), keyword('name'),
        vector(s('x'), s('y')), keyword('point'),
        keyword('keys'), vector<unknown>(s('id'), keyword('kind', 'ns')),
        keyword('strs'), vector(s('label')),
        keyword('syms'), vector(s('q')),
        keyword('or'), hashMap(s('id'), 0),
        keyword('as'), s('whole')
      );
      const pattern = patternFromForm(form);
      if (pattern.type !== 'keys') throw new Error('expected a keys pattern');

      expect(pattern.keys).toEqual(['id', 'ns/kind']);
      expect(pattern.strs).toEqual(['label']);
      expect(pattern.syms).toEqual(['q']);
      expect([...pattern.defaults]).toEqual([['id', 0]]);
      expect(pattern.as).toBe('whole');
      expect(pattern.entries).toHaveLength(2);

      const source = hashMap(
        keyword('name'), 'Ada',
        keyword('point'), vector(1, 2),
        keyword('kind', 'ns'), 'user',
        'label', 'L',
        s('q'), 'Q'
      );
      expect(toRecord(destructure(pattern, source))).toEqual({
        whole: source,
        n: 'Ada',
        x: 1,
        y: 2,
        id: 0,
        kind: 'user',
        label: 'L',
        q: 'Q',
      });
    });

    it('should reject malformed shorthand and default clauses', () => {
      expect(() => patternFromForm(hashMap(keyword('keys'), s('a')))).toThrow(
        'Expected a vector of names, got a (at ${:keys})'
      );
      expect(() => patternFromForm(hashMap(keyword('keys'), vector('a')))).toThrow(
        'Expected a symbol or keyword, got "a" (at ${:keys}[0])'
      );
      expect(() => patternFromForm(hashMap(keyword('or'), vector()))).toThrow(':or takes a map, got [] (at ${:or})');
    });
  });

  it('should refuse values that are not binding forms', () => {
    expect(() => patternFromForm(42)).toThrow(PatternError);
    expect(() => patternFromForm('x')).toThrow('Not a binding form: "x" (at $)');
  });
});
