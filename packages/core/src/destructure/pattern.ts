/**
 * Binding patterns
 *
 * - leaf  → bind the whole value to a name (`_` extracts and discards)
 * - seq   → positional items, optional `& rest`, optional `:as` whole
 * - keys  → selector → sub-pattern entries, `:keys`/`:strs`/`:syms`
 *           shorthands, `:or` defaults, optional `:as` whole
 */

import { PatternError } from '../errors';

export interface LeafPattern {
  readonly type: 'leaf';
  readonly name: string;
}

export interface SeqPattern {
  readonly type: 'seq';
  readonly items: readonly BindingPattern[];
  readonly rest?: BindingPattern;
  readonly as?: string;
}

export interface KeyEntry {
  readonly selector: unknown;
  readonly pattern: BindingPattern;
}

export interface KeysPattern {
  readonly type: 'keys';
  readonly entries: readonly KeyEntry[];
  /** Names looked up under keyword selectors; `ns/name` for qualified keys */
  readonly keys: readonly string[];
  /** Names looked up under string selectors */
  readonly strs: readonly string[];
  /** Names looked up under symbol selectors */
  readonly syms: readonly string[];
  readonly defaults: ReadonlyMap<string, unknown>;
  readonly as?: string;
}

export type BindingPattern = LeafPattern | SeqPattern | KeysPattern;

export const DISCARD = '_';

// ===== Builders =====

export function sym(name: string): LeafPattern {
  return { type: 'leaf', name };
}

export const ignore: LeafPattern = sym(DISCARD);

type PatternLike = BindingPattern | string;

function toPattern(p: PatternLike): BindingPattern {
  return typeof p === 'string' ? sym(p) : p;
}

export function seqPattern(
  items: readonly PatternLike[],
  options: { rest?: PatternLike; as?: string } = {}
): SeqPattern {
  return {
    type: 'seq',
    items: items.map(toPattern),
    rest: options.rest === undefined ? undefined : toPattern(options.rest),
    as: options.as,
  };
}

export interface KeysPatternOptions {
  entries?: ReadonlyArray<readonly [PatternLike, unknown]>;
  keys?: readonly string[];
  strs?: readonly string[];
  syms?: readonly string[];
  or?: Readonly<Record<string, unknown>>;
  as?: string;
}

/**
 * `entries` pairs a sub-pattern with the selector it is looked up under,
 * in that order, as in `{ entries: [['n', keyword('name')]] }`.
 */
export function keysPattern(options: KeysPatternOptions): KeysPattern {
  return {
    type: 'keys',
    entries: (options.entries ?? []).map(([pattern, selector]) => ({ selector, pattern: toPattern(pattern) })),
    keys: options.keys ?? [],
    strs: options.strs ?? [],
    syms: options.syms ?? [],
    defaults: new Map(Object.entries(options.or ?? {})),
    as: options.as,
  };
}

// ===== Validation =====

/** Local name a shorthand binds: the part after `/` for `ns/name`. */
export function shorthandName(qualified: string): string {
  const slash = qualified.indexOf('/');
  return slash > 0 ? qualified.slice(slash + 1) : qualified;
}

function checkName(name: unknown, path: string, seen: Set<string>): void {
  if (typeof name !== 'string' || name.length === 0) {
    throw new PatternError('Binding name must be a non-empty string', path);
  }
  if (name === DISCARD) return;
  if (seen.has(name)) {
    throw new PatternError(`Name '${name}' is bound more than once`, path);
  }
  seen.add(name);
}

function walk(pattern: BindingPattern, path: string, seen: Set<string>): void {
  switch (pattern.type) {
    case 'leaf':
      checkName(pattern.name, path, seen);
      return;

    case 'seq':
      pattern.items.forEach((item, i) => walk(item, `${path}[${i}]`, seen));
      if (pattern.rest !== undefined) walk(pattern.rest, `${path}[&]`, seen);
      if (pattern.as !== undefined) checkName(pattern.as, `${path}[:as]`, seen);
      return;

    case 'keys': {
      const direct = new Set<string>();
      pattern.entries.forEach((entry, i) => {
        walk(entry.pattern, `${path}{${i}}`, seen);
        if (entry.pattern.type === 'leaf') direct.add(entry.pattern.name);
      });
      for (const family of ['keys', 'strs', 'syms'] as const) {
        for (const qualified of pattern[family]) {
          const name = shorthandName(qualified);
          checkName(name, `${path}{:${family} ${qualified}}`, seen);
          direct.add(name);
        }
      }
      for (const name of pattern.defaults.keys()) {
        if (!direct.has(name) || name === DISCARD) {
          throw new PatternError(`Default given for '${name}', which this pattern does not bind by key`, `${path}{:or}`);
        }
      }
      if (pattern.as !== undefined) checkName(pattern.as, `${path}{:as}`, seen);
      return;
    }
  }
}

/**
 * Throws PatternError for empty names, a name bound twice, or an `:or`
 * default for a name not bound directly by its key pattern.
 */
export function validatePattern(pattern: BindingPattern): void {
  walk(pattern, '$', new Set());
}
