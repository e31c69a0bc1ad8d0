/**
 * Tests for the destructuring compiler
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { CapabilityError, PatternError } from '../errors';
import { hashMap } from '../hash-map';
import { keyword, symbol } from '../keyword';
import { list } from '../list';
import { printValue } from '../print';
import { range, seqOf } from '../seq';
import { sortedMap } from '../sorted-map';
import { vector } from '../vector';
import { bindArguments, compilePattern, destructure, runPlan, toRecord } from './compile';
import { ignore, keysPattern, seqPattern, sym } from './pattern';

afterEach(() => {
  vi.restoreAllMocks();
});

function bind(...args: Parameters<typeof destructure>): Record<string, unknown> {
  return toRecord(destructure(...args));
}

describe('compilePattern', () => {
  it('should flatten nested patterns into ordered steps over temporaries', () => {
    const plan = compilePattern(seqPattern(['a', seqPattern(['b'])], { rest: 'r' }));
    const lines = plan.steps.map(s => `${s.target}=${s.extract.op}(${s.extract.from})`);

    expect(lines).toEqual([
      'seq__1=seq(input__0)',
      'a=first(seq__1)',
      'seq__2=next(seq__1)',
      'vec__3=first(seq__2)',
      'seq__4=seq(vec__3)',
      'b=first(seq__4)',
      'seq__5=next(seq__2)',
      'r=whole(seq__5)',
    ]);
    expect(plan.steps.filter(s => !s.hidden).map(s => s.target)).toEqual(['a', 'b', 'r']);
  });

  it('should read every step from the input or a temporary', () => {
    const plan = compilePattern(
      seqPattern([keysPattern({ keys: ['x'], as: 'point' }), 'y'], { as: 'all' })
    );
    const hidden = new Set(plan.steps.filter(s => s.hidden).map(s => s.target));
    for (const step of plan.steps) {
      expect(step.extract.from === plan.input || hidden.has(step.extract.from)).toBe(true);
    }
  });

  it('should reject malformed patterns', () => {
    expect(() => compilePattern(seqPattern(['a', 'a']))).toThrow(PatternError);
    expect(() => compilePattern(seqPattern(['a', 'a']))).toThrow("Name 'a' is bound more than once (at $[1])");
    expect(() => compilePattern(sym(''))).toThrow('Binding name must be a non-empty string (at $)');
    expect(() => compilePattern(keysPattern({ keys: ['a'], or: { b: 1 } }))).toThrow(PatternError);
  });

  it('should allow the discard name more than once', () => {
    expect(() => compilePattern(seqPattern([ignore, ignore, 'x']))).not.toThrow();
  });

  it('should log the compiled plan at debug level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    destructure(sym('x'), 1, { config: { logLevel: 'debug', countLimit: Infinity } });
    expect(debug).toHaveBeenCalledWith('[strata:destructure] compiled 1 steps:\n  x = whole(input__0)');
  });

  it('should run one plan against many sources', () => {
    const plan = compilePattern(seqPattern(['h'], { rest: 't' }));
    expect(toRecord(runPlan(plan, [1, 2]))).toMatchObject({ h: 1 });
    expect(toRecord(runPlan(plan, 'xy'))).toMatchObject({ h: 'x' });
  });
});

describe('positional patterns', () => {
  it('should bind nested positions, discards and the rest', () => {
    const pattern = seqPattern(['a', ignore, seqPattern([ignore, 'b'])], { rest: 'rest' });
    const bindings = destructure(pattern, [10, 20, [1, 2, 3], 30, 40]);

    expect(bindings.map(([name]) => name)).toEqual(['a', 'b', 'rest']);
    const r = toRecord(bindings);
    expect(r.a).toBe(10);
    expect(r.b).toBe(2);
    expect(printValue(r.rest)).toBe('(30 40)');
  });

  it('should work over vectors, lists, seqs and strings alike', () => {
    const pattern = seqPattern(['x', 'y']);
    expect(bind(pattern, vector(1, 2))).toEqual({ x: 1, y: 2 });
    expect(bind(pattern, list(1, 2))).toEqual({ x: 1, y: 2 });
    expect(bind(pattern, range(1, 3))).toEqual({ x: 1, y: 2 });
    expect(bind(pattern, 'ab')).toEqual({ x: 'a', y: 'b' });
  });

  it('should bind missing positions to undefined and an empty rest to nil', () => {
    const r = bind(seqPattern(['x', 'y'], { rest: 'more' }), [1]);
    expect(r).toEqual({ x: 1, y: undefined, more: null });
    expect(bind(seqPattern(['x']), null)).toEqual({ x: undefined });
  });

  it('should bind the whole original source with as', () => {
    const source = vector(1, 2, 3);
    const r = bind(seqPattern(['x'], { as: 'all' }), source);
    expect(r.all).toBe(source);
  });

  it('should take a rest from an infinite sequence without walking it', () => {
    const r = bind(seqPattern(['x', 'y'], { rest: 'tail' }), range());
    expect(r.x).toBe(0);
    expect(r.y).toBe(1);
    expect(seqOf(r.tail)?.first()).toBe(2);
  });

  it('should refuse a source with no sequence view', () => {
    expect(() => destructure(seqPattern(['x']), 42)).toThrow(CapabilityError);
    expect(() => destructure(seqPattern(['x']), 42)).toThrow(
      "'destructure' requires Sequence, which number does not support"
    );
  });
});

describe('key patterns', () => {
  const present = keyword('present');
  const missing = keyword('missing');

  it('should fall back to a default only when the key is absent', () => {
    const pattern = keysPattern({ entries: [['k', missing]], or: { k: 'd' } });
    expect(bind(pattern, hashMap(present, 5))).toEqual({ k: 'd' });
    expect(bind(pattern, hashMap(missing, false))).toEqual({ k: false });
    expect(bind(pattern, hashMap(missing, null))).toEqual({ k: null });
    expect(bind(pattern, null)).toEqual({ k: 'd' });
  });

  it('should bind absent keys without a default to undefined', () => {
    expect(bind(keysPattern({ keys: ['gone'] }), hashMap())).toEqual({ gone: undefined });
  });

  it('should desugar each shorthand family to its own selector', () => {
    const source = hashMap(keyword('a'), 1, 'b', 2, symbol('c'), 3, keyword('id', 'user'), 4);
    const pattern = keysPattern({ keys: ['a', 'user/id'], strs: ['b'], syms: ['c'] });
    expect(bind(pattern, source)).toEqual({ a: 1, id: 4, b: 2, c: 3 });
  });

  it('should look up by index in vectors and by key in sorted maps', () => {
    const pattern = keysPattern({ entries: [['first', 0], ['third', 2]] });
    expect(bind(pattern, vector('p', 'q', 'r'))).toEqual({ first: 'p', third: 'r' });
    expect(bind(pattern, sortedMap(0, 'zero'))).toEqual({ first: 'zero', third: undefined });
  });

  it('should destructure nested values found under keys', () => {
    const pattern = keysPattern({
      entries: [[seqPattern(['x', 'y']), keyword('point')]],
      as: 'm',
    });
    const source = hashMap(keyword('point'), vector(3, 4));
    expect(bind(pattern, source)).toEqual({ m: source, x: 3, y: 4 });
  });

  it('should read a sequence as alternating keys and values', () => {
    const pattern = keysPattern({ keys: ['port'] });
    expect(bind(pattern, list<unknown>(keyword('port'), 8080, keyword('host'), 'localhost'))).toEqual({ port: 8080 });
  });

  it('should refuse a source with no lookup', () => {
    expect(() => destructure(keysPattern({ keys: ['a'] }), true)).toThrow(
      "'destructure' requires Lookup, which boolean does not support"
    );
  });
});

describe('bindArguments', () => {
  it('should bind fixed and variadic parameters', () => {
    const r = toRecord(bindArguments(seqPattern(['f'], { rest: 'xs' }), [1, 2, 3]));
    expect(r.f).toBe(1);
    expect(printValue(r.xs)).toBe('(2 3)');
  });

  it('should bind keyword arguments through a key pattern rest', () => {
    const params = seqPattern(['path'], { rest: keysPattern({ keys: ['verbose'], or: { verbose: false } }) });
    expect(toRecord(bindArguments(params, ['/tmp', keyword('verbose'), true]))).toEqual({ path: '/tmp', verbose: true });
    expect(toRecord(bindArguments(params, ['/tmp']))).toEqual({ path: '/tmp', verbose: false });
  });
});
