/**
 * Readable rendering used by `toString` on every collection
 */

import { isEquatable } from './equiv';
import { Keyword, Sym } from './keyword';

export function printValue(x: unknown): string {
  if (x == null) return 'nil';
  if (typeof x === 'string') return JSON.stringify(x);
  if (x instanceof Keyword || x instanceof Sym) return x.toString();
  if (isEquatable(x)) return x.toString();
  if (Array.isArray(x)) return '[' + x.map(printValue).join(' ') + ']';
  return String(x);
}

export function printItems(items: Iterable<unknown>, open: string, close: string): string {
  const parts: string[] = [];
  for (const x of items) parts.push(printValue(x));
  return open + parts.join(' ') + close;
}
