/**
 * Hash primitives shared by HAMT keys, keywords and structural hashing
 */

// Identity hash caches
const OBJ_HASH = new WeakMap<object, number>();
let OBJ_SEQ = 1;
const SYM_HASH = new Map<symbol, number>();
let SYM_SEQ = 1;

// Splitmix32 finalizer
export function mix32(z: number): number {
  z = (z + 0x9e3779b9) | 0;
  z ^= z >>> 16;
  z = Math.imul(z, 0x85ebca6b);
  z ^= z >>> 13;
  z = Math.imul(z, 0xc2b2ae35);
  z ^= z >>> 16;
  return z >>> 0;
}

// Murmur3 32-bit hash for strings
export function murmur3(key: string, seed = 0): number {
  let h = seed ^ key.length;
  let k: number;
  let i = 0;

  while (i + 4 <= key.length) {
    k =
      (key.charCodeAt(i) & 0xff) |
      ((key.charCodeAt(i + 1) & 0xff) << 8) |
      ((key.charCodeAt(i + 2) & 0xff) << 16) |
      ((key.charCodeAt(i + 3) & 0xff) << 24);
    i += 4;
    k = Math.imul(k, 0xcc9e2d51);
    k = (k << 15) | (k >>> 17);
    k = Math.imul(k, 0x1b873593);
    h ^= k;
    h = (h << 13) | (h >>> 19);
    h = (Math.imul(h, 5) + 0xe6546b64) | 0;
  }

  k = 0;
  switch (key.length & 3) {
    case 3:
      k ^= (key.charCodeAt(i + 2) & 0xff) << 16;
    // falls through
    case 2:
      k ^= (key.charCodeAt(i + 1) & 0xff) << 8;
    // falls through
    case 1:
      k ^= key.charCodeAt(i) & 0xff;
      k = Math.imul(k, 0xcc9e2d51);
      k = (k << 15) | (k >>> 17);
      k = Math.imul(k, 0x1b873593);
      h ^= k;
  }

  h ^= key.length;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

export function hashNumber(n: number): number {
  if (Object.is(n, -0)) n = 0;
  return mix32((n | 0) ^ Math.imul((n * 4294967296) | 0, 0x9e3779b1));
}

export function hashBigInt(n: bigint): number {
  let h = 0;
  const s = n.toString();
  for (let i = 0; i < s.length; i += 4) {
    const chunk = s.slice(i, i + 4);
    let v = 0;
    for (let j = 0; j < chunk.length; j++) {
      v = (v << 8) | chunk.charCodeAt(j);
    }
    h = mix32(h ^ v);
  }
  return h;
}

export function hashSymbol(key: symbol): number {
  let id = SYM_HASH.get(key);
  if (id === undefined) {
    id = SYM_SEQ++;
    SYM_HASH.set(key, id);
  }
  return (id * 0x9e3779b1) >>> 0;
}

export function identityHash(key: object): number {
  let id = OBJ_HASH.get(key);
  if (id === undefined) {
    id = OBJ_SEQ++;
    OBJ_HASH.set(key, id);
  }
  return (id * 0x85ebca77) >>> 0;
}
