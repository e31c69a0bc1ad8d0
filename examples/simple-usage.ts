/**
 * Simple usage - persistent collections, generic operations, destructuring
 */

import {
  assoc,
  conj,
  destructure,
  forSeq,
  get,
  getIn,
  hashMap,
  keysPattern,
  keyword,
  range,
  seqPattern,
  seqToArray,
  sortedMap,
  sym,
  take,
  toRecord,
  vector,
} from '../packages/core/src/index';

console.log('=== Strata: Persistent Collections ===\n');

// ===== Vectors =====
console.log('1️⃣ Vectors share structure between versions');
const v1 = vector(1, 2, 3);
const v2 = v1.conj(4).assoc(0, 100);
console.log('v1:', String(v1));
console.log('v2:', String(v2));
console.log('✅ v1 unchanged');

// ===== Maps =====
console.log('\n2️⃣ Maps accept structural keys');
const grid = hashMap(vector(0, 0), 'origin', vector(1, 0), 'east');
console.log('get [0 0]:', get(grid, vector(0, 0)));
console.log('with [0 1]:', String(assoc(grid, vector(0, 1), 'north')));

// ===== Sorted =====
console.log('\n3️⃣ Sorted maps keep keys in order');
const scores = sortedMap(30, 'c', 10, 'a', 20, 'b');
console.log('scores:', String(scores));
console.log('>= 20:', String(scores.subseq('>=', 20)));

// ===== Generic operations =====
console.log('\n4️⃣ One operation set for every kind');
console.log('conj vector:', String(conj(vector(1), 2)));
console.log('conj nil:', String(conj(null, 2, 1)));
const config = hashMap(keyword('db'), hashMap(keyword('port'), 5432));
console.log('getIn [:db :port]:', getIn(config, [keyword('db'), keyword('port')]));

// ===== Lazy sequences =====
console.log('\n5️⃣ Lazy sequences realize only what is asked for');
console.log('first 5 of an infinite range:', seqToArray(take(5, range())));

// ===== Destructuring =====
console.log('\n6️⃣ Destructuring');
const bindings = destructure(
  seqPattern(['head', keysPattern({ keys: ['port'], or: { port: 80 } })], { rest: 'more' }),
  vector<unknown>('svc', hashMap(keyword('host'), 'localhost'), 'x', 'y')
);
console.log('bindings:', toRecord(bindings));

// ===== Comprehension =====
console.log('\n7️⃣ Comprehension');
const pairs = forSeq(
  [
    { bind: sym('x'), from: range(3) },
    { bind: sym('y'), from: range(3) },
    { when: env => env.x !== env.y },
  ],
  env => `${String(env.x)}${String(env.y)}`
);
console.log('pairs:', seqToArray(pairs));
