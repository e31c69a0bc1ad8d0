/**
 * Lazy list comprehension
 *
 *   forSeq([
 *     { bind: sym('x'), from: range(3) },
 *     { bind: sym('y'), from: env => range(Number(env.x)) },
 *     { when: env => env.y !== 1 },
 *   ], env => [env.x, env.y])
 *
 * Generators nest left to right, the rightmost varying fastest. Modifiers
 * apply to the generator before them: `when` skips an element, `while` ends
 * that generator, `let` adds bindings.
 */

import { DEFAULT_CONFIG, type StrataConfig } from './config';
import { compilePattern, runPlan, toRecord, type BindingPlan } from './destructure/compile';
import type { BindingPattern } from './destructure/pattern';
import { PatternError } from './errors';
import { createLogger } from './logger';
import { Cons, concat, lazySeq, seqOf } from './seq';
import type { ISeq, SeqSource } from './types';

export type Env = Readonly<Record<string, unknown>>;

export type Clause =
  | { bind: BindingPattern; from: SeqSource<unknown> | string | ((env: Env) => unknown) }
  | { when: (env: Env) => boolean }
  | { while: (env: Env) => boolean }
  | { let: BindingPattern; value: (env: Env) => unknown };

type Modifier =
  | { type: 'when'; test: (env: Env) => boolean }
  | { type: 'while'; test: (env: Env) => boolean }
  | { type: 'let'; plan: BindingPlan; value: (env: Env) => unknown };

interface Generator {
  plan: BindingPlan;
  source: (env: Env) => unknown;
  modifiers: Modifier[];
}

export interface ForSeqOptions {
  config?: StrataConfig;
}

function bindInto(env: Env, plan: BindingPlan, value: unknown): Env {
  return { ...env, ...toRecord(runPlan(plan, value)) };
}

function compileClauses(clauses: readonly Clause[], config: StrataConfig): Generator[] {
  const logger = createLogger(config.logLevel, 'strata:for');
  const generators: Generator[] = [];

  clauses.forEach((clause, i) => {
    if ('bind' in clause) {
      const from = clause.from;
      generators.push({
        plan: compilePattern(clause.bind, { logger }),
        source: typeof from === 'function' ? from : () => from,
        modifiers: [],
      });
      return;
    }
    const current = generators[generators.length - 1];
    if (current === undefined) {
      throw new PatternError('A comprehension must start with a generator', `$[${i}]`);
    }
    if ('when' in clause) {
      current.modifiers.push({ type: 'when', test: clause.when });
    } else if ('while' in clause) {
      current.modifiers.push({ type: 'while', test: clause.while });
    } else {
      current.modifiers.push({ type: 'let', plan: compilePattern(clause.let, { logger }), value: clause.value });
    }
  });

  if (generators.length === 0) {
    throw new PatternError('A comprehension needs at least one generator', '$');
  }
  return generators;
}

/**
 * Sequence of `body(env)` for every combination of generator bindings that
 * passes the modifiers. Nothing is evaluated until the result is walked.
 */
export function forSeq<R>(clauses: readonly Clause[], body: (env: Env) => R, options: ForSeqOptions = {}): ISeq<R> {
  const generators = compileClauses(clauses, options.config ?? DEFAULT_CONFIG);

  const step = (depth: number, outer: Env, items: ISeq<unknown> | null): ISeq<R> =>
    lazySeq<R>(() => {
      const gen = generators[depth];
      let cell = items === null ? null : items.uncons();

      while (cell !== null) {
        const [item, tail] = cell;
        let env = bindInto(outer, gen.plan, item);
        let keep = true;

        for (const mod of gen.modifiers) {
          if (mod.type === 'let') {
            env = bindInto(env, mod.plan, mod.value(env));
          } else if (mod.type === 'while' && !mod.test(env)) {
            return null;
          } else if (mod.type === 'when' && !mod.test(env)) {
            keep = false;
            break;
          }
        }

        if (keep) {
          if (depth === generators.length - 1) {
            return new Cons(body(env), step(depth, outer, tail));
          }
          const inner = step(depth + 1, env, seqOf(generators[depth + 1].source(env))).seq();
          if (inner !== null) return concat(inner, step(depth, outer, tail));
        }
        cell = tail.uncons();
      }
      return null;
    });

  return lazySeq(() => step(0, {}, seqOf(generators[0].source({}))));
}
