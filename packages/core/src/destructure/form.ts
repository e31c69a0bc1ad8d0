/**
 * Binding patterns from collection literals, in the usual binding-form
 * notation:
 *
 *   [a _ [_ b] & rest :as all]
 *   {n :name, [x y] :point, :keys [id ns/kind], :strs [s], :syms [q],
 *    :or {id 0}, :as whole}
 */

import { PatternError } from '../errors';
import { isMapLike } from '../equiv';
import { Keyword, Sym, keyword } from '../keyword';
import { printValue } from '../print';
import { PersistentVector } from '../vector';
import type { MapLike } from '../types';
import type { BindingPattern, KeyEntry, KeysPattern, SeqPattern } from './pattern';

const AMPERSAND = '&';
const AS = keyword('as');
const OR = keyword('or');
const SHORTHAND_KEYS = new Map([
  [keyword('keys'), 'keys'],
  [keyword('strs'), 'strs'],
  [keyword('syms'), 'syms'],
] as const);

function symbolName(form: unknown, path: string): string {
  if (form instanceof Sym && form.namespace === undefined) return form.name;
  throw new PatternError(`Expected a simple symbol, got ${printValue(form)}`, path);
}

function qualifiedName(form: unknown, path: string): string {
  if (form instanceof Sym || form instanceof Keyword) {
    return form.namespace === undefined ? form.name : `${form.namespace}/${form.name}`;
  }
  throw new PatternError(`Expected a symbol or keyword, got ${printValue(form)}`, path);
}

function seqFromForm(form: PersistentVector<unknown>, path: string): SeqPattern {
  const items: BindingPattern[] = [];
  let rest: BindingPattern | undefined;
  let as: string | undefined;

  const forms = form.toArray();
  for (let i = 0; i < forms.length; i++) {
    const item = forms[i];
    const at = `${path}[${i}]`;
    if (item === AS) {
      if (i + 1 >= forms.length) throw new PatternError(':as needs a name', at);
      as = symbolName(forms[++i], `${path}[${i}]`);
    } else if (item instanceof Sym && item.name === AMPERSAND && item.namespace === undefined) {
      if (rest !== undefined) throw new PatternError('Only one & rest is allowed', at);
      if (i + 1 >= forms.length) throw new PatternError('& needs a pattern', at);
      rest = parse(forms[++i], `${path}[${i}]`);
    } else {
      if (rest !== undefined || as !== undefined) {
        throw new PatternError('Positional items must come before & and :as', at);
      }
      items.push(parse(item, at));
    }
  }

  return { type: 'seq', items, rest, as };
}

function namesIn(form: unknown, path: string): string[] {
  if (!(form instanceof PersistentVector)) {
    throw new PatternError(`Expected a vector of names, got ${printValue(form)}`, path);
  }
  return form.toArray().map((x, i) => qualifiedName(x, `${path}[${i}]`));
}

function keysFromForm(form: MapLike<unknown, unknown>, path: string): KeysPattern {
  const entries: KeyEntry[] = [];
  const shorthands: Record<'keys' | 'strs' | 'syms', string[]> = { keys: [], strs: [], syms: [] };
  const defaults = new Map<string, unknown>();
  let as: string | undefined;

  for (const [k, v] of form) {
    const family = k instanceof Keyword ? SHORTHAND_KEYS.get(k) : undefined;
    if (family !== undefined) {
      shorthands[family].push(...namesIn(v, `${path}{${printValue(k)}}`));
    } else if (k === AS) {
      as = symbolName(v, `${path}{:as}`);
    } else if (k === OR) {
      if (!isMapLike(v)) throw new PatternError(`:or takes a map, got ${printValue(v)}`, `${path}{:or}`);
      for (const [name, value] of v) defaults.set(symbolName(name, `${path}{:or}`), value);
    } else {
      entries.push({ selector: v, pattern: parse(k, `${path}{${printValue(k)}}`) });
    }
  }

  return { type: 'keys', entries, ...shorthands, defaults, as };
}

function parse(form: unknown, path: string): BindingPattern {
  if (form instanceof Sym) return { type: 'leaf', name: symbolName(form, path) };
  if (form instanceof PersistentVector) return seqFromForm(form, path);
  if (isMapLike(form)) return keysFromForm(form, path);
  throw new PatternError(`Not a binding form: ${printValue(form)}`, path);
}

/**
 * Pattern for a binding form built from symbols, vectors and maps. Throws
 * PatternError for anything else.
 */
export function patternFromForm(form: unknown): BindingPattern {
  return parse(form, '$');
}
