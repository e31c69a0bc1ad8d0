import { describe, it, expect } from 'vitest';
import {
  CapabilityError,
  CollectionError,
  EmptyCollectionError,
  IndexOutOfBoundsError,
  PatternError,
  isCollectionError,
} from './errors';

describe('errors', () => {
  it('should carry a code on every collection error', () => {
    const e = new IndexOutOfBoundsError(4, 2);
    expect(e).toBeInstanceOf(CollectionError);
    expect(e.code).toBe('INDEX_OUT_OF_BOUNDS');
    expect(e.name).toBe('IndexOutOfBoundsError');
    expect(e.message).toBe('Index 4 out of bounds for count 2');
  });

  it('should describe the missing capability', () => {
    const e = new CapabilityError('nth', 'Indexed', 'hash-map');
    expect(e.message).toBe("'nth' requires Indexed, which hash-map does not support");
    expect(e.capability).toBe('Indexed');
  });

  it('should append the pattern path', () => {
    expect(new PatternError('Bad', '$[0]').message).toBe('Bad (at $[0])');
  });

  it('should narrow with isCollectionError', () => {
    const e: unknown = new EmptyCollectionError('pop', 'list');
    expect(isCollectionError(e)).toBe(true);
    expect(isCollectionError(e, 'EMPTY_COLLECTION')).toBe(true);
    expect(isCollectionError(e, 'PATTERN_INVALID')).toBe(false);
    expect(isCollectionError(new Error('plain'))).toBe(false);
  });
});
