/**
 * Keywords and symbols - interned, self-evaluating names.
 *
 * Both are interned by qualified name, so `keyword('a') === keyword('a')`
 * and identity comparison is equality.
 */

import { murmur3 } from './internal/hash';

function qualify(name: string, ns: string | undefined): string {
  return ns === undefined ? name : `${ns}/${name}`;
}

const KEYWORDS = new Map<string, Keyword>();
const SYMBOLS = new Map<string, Sym>();

export class Keyword {
  private readonly hash: number;

  private constructor(
    readonly name: string,
    readonly namespace: string | undefined
  ) {
    this.hash = murmur3(':' + qualify(name, namespace), 0x3c6ef372);
  }

  static intern(name: string, ns?: string): Keyword {
    const fqn = qualify(name, ns);
    let kw = KEYWORDS.get(fqn);
    if (kw === undefined) {
      kw = new Keyword(name, ns);
      KEYWORDS.set(fqn, kw);
    }
    return kw;
  }

  hashCode(): number {
    return this.hash;
  }

  toString(): string {
    return ':' + qualify(this.name, this.namespace);
  }
}

export class Sym {
  private readonly hash: number;

  private constructor(
    readonly name: string,
    readonly namespace: string | undefined
  ) {
    this.hash = murmur3(qualify(name, namespace), 0x5bd1e995);
  }

  static intern(name: string, ns?: string): Sym {
    const fqn = qualify(name, ns);
    let sym = SYMBOLS.get(fqn);
    if (sym === undefined) {
      sym = new Sym(name, ns);
      SYMBOLS.set(fqn, sym);
    }
    return sym;
  }

  hashCode(): number {
    return this.hash;
  }

  toString(): string {
    return qualify(this.name, this.namespace);
  }
}

export function keyword(name: string, ns?: string): Keyword {
  return Keyword.intern(name, ns);
}

export function symbol(name: string, ns?: string): Sym {
  return Sym.intern(name, ns);
}

export function isKeyword(x: unknown): x is Keyword {
  return x instanceof Keyword;
}

export function isSym(x: unknown): x is Sym {
  return x instanceof Sym;
}
