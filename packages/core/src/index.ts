/**
 * Strata - persistent collections, a generic operation layer over them,
 * and a destructuring compiler
 *
 * - vector(...)      → bit-partitioned trie vector
 * - list(...)        → linked list, conj at the front
 * - hashMap(...)     → HAMT map, structural keys
 * - hashSet(...)     → HAMT set
 * - sortedMap(...)   → AVL map, ordered by comparator
 * - sortedSet(...)   → AVL set
 * - lazySeq(...)     → memoized, possibly infinite sequence
 * - conj/get/nth/... → one operation set for every kind above
 * - destructure(...) → binding patterns compiled to extraction plans
 */

// Values
export { Keyword, Sym, isKeyword, isSym, keyword, symbol } from './keyword';
export { equals, hash, isEquatable, isMapLike, isSequential, isSetLike } from './equiv';
export { compare, comparatorFrom, reverseComparator } from './compare';
export { printValue } from './print';
export {
  EQUIV,
  type CollectionKind,
  type Comparator,
  type Equatable,
  type ISeq,
  type MapEntry,
  type MapLike,
  type Nil,
  type Seqable,
  type SeqSource,
  type SetLike,
} from './types';

// Collections
export { PersistentVector, isVector, vector, vectorFrom } from './vector';
export { PersistentList, isList, list } from './list';
export { PersistentHashMap, hashMap, hashMapFrom, isHashMap } from './hash-map';
export { PersistentHashSet, hashSet, isHashSet, set } from './hash-set';
export { SortedMap, isSortedMap, sortedMap, sortedMapBy, type RangeArgs } from './sorted-map';
export { SortedSet, isSortedSet, sortedSet, sortedSetBy } from './sorted-set';
export { difference, intersection, isSubset, isSuperset, union, type PersistentSetOps } from './set-ops';

// Sequences
export {
  EMPTY,
  concat,
  cons,
  doall,
  drop,
  filter,
  first,
  isRealized,
  isSeq,
  isSeqable,
  iterate,
  iteratorSeq,
  lazySeq,
  listStar,
  map,
  next,
  nthSeq,
  range,
  reduce,
  repeat,
  rest,
  seqToArray,
  take,
  takeWhile,
} from './seq';
export { forSeq, type Clause, type Env, type ForSeqOptions } from './comprehension';

// Generic operations
export {
  assoc,
  capabilitiesOf,
  conj,
  contains,
  count,
  disj,
  dissoc,
  empty,
  find,
  get,
  getIn,
  into,
  isEmpty,
  kindOf,
  nth,
  peek,
  pop,
  rseq,
  rsubseq,
  seq,
  subseq,
  supports,
  type Capability,
  type ValueKind,
} from './protocol';

// Destructuring
export * from './destructure';

// Errors, configuration, logging
export {
  CapabilityError,
  CollectionError,
  ComparatorError,
  EmptyCollectionError,
  IndexOutOfBoundsError,
  PatternError,
  RealizationError,
  isCollectionError,
  type CollectionErrorCode,
} from './errors';
export { DEFAULT_CONFIG, configFromEnv, resolveConfig, type LogLevel, type StrataConfig } from './config';
export { createLogger, silentLogger, type Logger } from './logger';
