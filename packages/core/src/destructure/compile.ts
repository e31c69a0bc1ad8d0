/**
 * Destructuring compiler
 *
 * A binding pattern compiles once into a flat, ordered plan of extraction
 * steps. Each step reads the input or an earlier hidden temporary, never a
 * user binding, so every name is bound simultaneously with respect to the
 * source. Running a plan performs the extractions against one value.
 *
 *   [a [b] & r]  →  seq__1 = seq(input)
 *                   a      = first(seq__1)
 *                   seq__2 = next(seq__1)
 *                   vec__3 = first(seq__2)
 *                   seq__4 = seq(vec__3)
 *                   b      = first(seq__4)
 *                   seq__5 = next(seq__2)
 *                   r      = whole(seq__5)
 */

import { DEFAULT_CONFIG, type StrataConfig } from '../config';
import { CapabilityError } from '../errors';
import { hashMapFrom } from '../hash-map';
import { NOT_FOUND } from '../internal/constants';
import { keyword, symbol } from '../keyword';
import { createLogger, silentLogger, type Logger } from '../logger';
import { printValue } from '../print';
import { get, supports } from '../protocol';
import { describe, isSeq, seqOf } from '../seq';
import type { ISeq } from '../types';
import { DISCARD, shorthandName, validatePattern, type BindingPattern, type KeysPattern, type SeqPattern } from './pattern';

// ===== Plan =====

export type Extraction =
  /** The value of `from` itself */
  | { op: 'whole'; from: string }
  /** Sequence view of `from`; nil when empty */
  | { op: 'seq'; from: string }
  /** Head of the sequence in `from`; nil past the end */
  | { op: 'first'; from: string }
  /** Tail of the sequence in `from`; nil when nothing remains */
  | { op: 'next'; from: string }
  /** `from` as a lookup source; a sequence reads as key/value pairs */
  | { op: 'associative'; from: string }
  /** Value under `selector` in `from`, else the default, else nil */
  | { op: 'lookup'; from: string; selector: unknown; default?: { value: unknown } };

export interface PlanStep {
  readonly target: string;
  readonly extract: Extraction;
  /** Compiler temporary: computed but not part of the result */
  readonly hidden: boolean;
}

export interface BindingPlan {
  readonly input: string;
  readonly steps: readonly PlanStep[];
}

export type Bindings = ReadonlyArray<readonly [string, unknown]>;

export interface CompileOptions {
  logger?: Logger;
}

const INPUT = 'input__0';

type Shorthand = readonly ['keys' | 'strs' | 'syms', (name: string, ns: string | undefined) => unknown];

const SHORTHANDS: readonly Shorthand[] = [
  ['keys', (name, ns) => keyword(name, ns)],
  ['strs', (name, ns) => (ns === undefined ? name : `${ns}/${name}`)],
  ['syms', (name, ns) => symbol(name, ns)],
];

class PlanBuilder {
  readonly steps: PlanStep[] = [];
  private counter = 0;

  temp(prefix: string): string {
    this.counter += 1;
    return `${prefix}__${this.counter}`;
  }

  push(target: string, extract: Extraction, hidden: boolean): void {
    this.steps.push({ target, extract, hidden });
  }

  /** Binds `pattern` to whatever `extract` yields. */
  bind(pattern: BindingPattern, extract: Extraction): void {
    switch (pattern.type) {
      case 'leaf':
        if (pattern.name === DISCARD) {
          this.push(this.temp('ignored'), extract, true);
        } else {
          this.push(pattern.name, extract, false);
        }
        return;
      case 'seq': {
        const tmp = this.temp('vec');
        this.push(tmp, extract, true);
        this.seqPattern(pattern, tmp);
        return;
      }
      case 'keys': {
        const tmp = this.temp('map');
        this.push(tmp, extract, true);
        this.keysPattern(pattern, tmp);
        return;
      }
    }
  }

  seqPattern(pattern: SeqPattern, from: string): void {
    if (pattern.as !== undefined) this.push(pattern.as, { op: 'whole', from }, false);

    let cursor = this.temp('seq');
    this.push(cursor, { op: 'seq', from }, true);

    pattern.items.forEach((item, i) => {
      this.bind(item, { op: 'first', from: cursor });
      if (i < pattern.items.length - 1 || pattern.rest !== undefined) {
        const nextCursor = this.temp('seq');
        this.push(nextCursor, { op: 'next', from: cursor }, true);
        cursor = nextCursor;
      }
    });

    if (pattern.rest !== undefined) {
      this.bind(pattern.rest, { op: 'whole', from: cursor });
    }
  }

  keysPattern(pattern: KeysPattern, from: string): void {
    const source = this.temp('map');
    this.push(source, { op: 'associative', from }, true);
    if (pattern.as !== undefined) this.push(pattern.as, { op: 'whole', from }, false);

    const lookup = (name: string, selector: unknown): Extraction =>
      pattern.defaults.has(name)
        ? { op: 'lookup', from: source, selector, default: { value: pattern.defaults.get(name) } }
        : { op: 'lookup', from: source, selector };

    for (const entry of pattern.entries) {
      if (entry.pattern.type === 'leaf') {
        this.bind(entry.pattern, lookup(entry.pattern.name, entry.selector));
      } else {
        this.bind(entry.pattern, { op: 'lookup', from: source, selector: entry.selector });
      }
    }

    for (const [family, selectorOf] of SHORTHANDS) {
      for (const qualified of pattern[family]) {
        const name = shorthandName(qualified);
        const ns = name === qualified ? undefined : qualified.slice(0, qualified.length - name.length - 1);
        this.push(name, lookup(name, selectorOf(name, ns)), false);
      }
    }
  }
}

function describeStep(step: PlanStep): string {
  const e = step.extract;
  const args = e.op === 'lookup' ? `${e.from}, ${printValue(e.selector)}` : e.from;
  const fallback = e.op === 'lookup' && e.default ? ` or ${printValue(e.default.value)}` : '';
  return `${step.target} = ${e.op}(${args})${fallback}`;
}

/**
 * Validates `pattern` and flattens it into a plan. Throws PatternError for a
 * malformed pattern.
 */
export function compilePattern(pattern: BindingPattern, options: CompileOptions = {}): BindingPlan {
  validatePattern(pattern);
  const builder = new PlanBuilder();
  switch (pattern.type) {
    case 'seq':
      builder.seqPattern(pattern, INPUT);
      break;
    case 'keys':
      builder.keysPattern(pattern, INPUT);
      break;
    case 'leaf':
      builder.bind(pattern, { op: 'whole', from: INPUT });
      break;
  }
  const plan: BindingPlan = { input: INPUT, steps: builder.steps };

  const logger = options.logger ?? silentLogger;
  logger.debug(`compiled ${plan.steps.length} steps:\n  ${plan.steps.map(describeStep).join('\n  ')}`);
  return plan;
}

// ===== Execution =====

function asPairs(s: ISeq<unknown> | null): unknown {
  const entries: Array<readonly [unknown, unknown]> = [];
  let cell = s === null ? null : s.uncons();
  while (cell !== null) {
    const key = cell[0];
    const rest = cell[1].uncons();
    entries.push([key, rest === null ? undefined : rest[0]]);
    cell = rest === null ? null : rest[1].uncons();
  }
  return hashMapFrom(entries);
}

function extract(e: Extraction, temps: Map<string, unknown>): unknown {
  const v = temps.get(e.from);
  switch (e.op) {
    case 'whole':
      return v;
    case 'seq':
      if (!supports(v, 'Sequence')) throw new CapabilityError('destructure', 'Sequence', describe(v));
      return seqOf(v);
    case 'first':
      return isSeq(v) ? v.first() : undefined;
    case 'next':
      return isSeq(v) ? v.next() : null;
    case 'associative':
      if (isSeq(v)) return asPairs(v);
      if (!supports(v, 'Lookup')) throw new CapabilityError('destructure', 'Lookup', describe(v));
      return v;
    case 'lookup': {
      const found = get(v, e.selector, NOT_FOUND);
      if (found !== NOT_FOUND) return found;
      return e.default ? e.default.value : undefined;
    }
  }
}

/**
 * Runs `plan` against `source`. Returns the user bindings in plan order;
 * absent keys and missing positions bind to `undefined`.
 */
export function runPlan(plan: BindingPlan, source: unknown): Bindings {
  const temps = new Map<string, unknown>([[plan.input, source]]);
  const bindings: Array<readonly [string, unknown]> = [];
  for (const step of plan.steps) {
    const value = extract(step.extract, temps);
    if (step.hidden) {
      temps.set(step.target, value);
    } else {
      bindings.push([step.target, value]);
    }
  }
  return bindings;
}

export interface DestructureOptions {
  config?: StrataConfig;
}

export function destructure(pattern: BindingPattern, source: unknown, options: DestructureOptions = {}): Bindings {
  const config = options.config ?? DEFAULT_CONFIG;
  const plan = compilePattern(pattern, { logger: createLogger(config.logLevel, 'strata:destructure') });
  return runPlan(plan, source);
}

/**
 * Binds a parameter list against call arguments; `& rest` receives the
 * remaining arguments as a sequence, or as key/value pairs under a key
 * pattern.
 */
export function bindArguments(params: SeqPattern, args: readonly unknown[], options: DestructureOptions = {}): Bindings {
  return destructure(params, args, options);
}

export function toRecord(bindings: Bindings): Record<string, unknown> {
  return Object.fromEntries(bindings);
}
