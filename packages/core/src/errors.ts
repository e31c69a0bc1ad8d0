/**
 * Error taxonomy.
 *
 * Lookups recover from absence by returning a default; only structural
 * misuse (an operation with no meaning for the value it was given) throws.
 */

export type CollectionErrorCode =
  | 'INDEX_OUT_OF_BOUNDS'
  | 'CAPABILITY_MISSING'
  | 'COMPARATOR_INVALID'
  | 'PATTERN_INVALID'
  | 'LAZY_REENTRANT'
  | 'COUNT_LIMIT'
  | 'EMPTY_COLLECTION';

export class CollectionError extends Error {
  constructor(message: string, public readonly code: CollectionErrorCode) {
    super(message);
    this.name = 'CollectionError';
  }
}

/** `index` is whatever the caller passed, integer or not. */
export class IndexOutOfBoundsError extends CollectionError {
  constructor(
    public readonly index: unknown,
    public readonly count: number
  ) {
    const shown = typeof index === 'string' ? `"${index}"` : String(index);
    super(`Index ${shown} out of bounds for count ${count}`, 'INDEX_OUT_OF_BOUNDS');
    this.name = 'IndexOutOfBoundsError';
  }
}

export class CapabilityError extends CollectionError {
  constructor(
    public readonly operation: string,
    public readonly capability: string,
    public readonly kind: string
  ) {
    super(`'${operation}' requires ${capability}, which ${kind} does not support`, 'CAPABILITY_MISSING');
    this.name = 'CapabilityError';
  }
}

export class ComparatorError extends CollectionError {
  constructor(message: string) {
    super(message, 'COMPARATOR_INVALID');
    this.name = 'ComparatorError';
  }
}

export class PatternError extends CollectionError {
  constructor(message: string, public readonly path: string) {
    super(`${message} (at ${path})`, 'PATTERN_INVALID');
    this.name = 'PatternError';
  }
}

export class RealizationError extends CollectionError {
  constructor(message: string, code: 'LAZY_REENTRANT' | 'COUNT_LIMIT') {
    super(message, code);
    this.name = 'RealizationError';
  }
}

export class EmptyCollectionError extends CollectionError {
  constructor(public readonly operation: string, kind: string) {
    super(`Can't ${operation} an empty ${kind}`, 'EMPTY_COLLECTION');
    this.name = 'EmptyCollectionError';
  }
}

export function isCollectionError(e: unknown, code?: CollectionErrorCode): e is CollectionError {
  return e instanceof CollectionError && (code === undefined || e.code === code);
}
