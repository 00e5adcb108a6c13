import { resolveBudget } from './budget';
import { DiceError, isDiceError } from './errors';
import { evaluate } from './evaluator';
import { parseExpression } from './parser';
import { createRandomSource } from './random';
import type { Budget, EvalResult, RandomSource } from './types';

/**
 * Dice expression interpreter entry points.
 *
 * `roll` runs the whole pipeline (lex, parse, evaluate) synchronously.
 * Parsing completes before the first die is drawn, so an expression that
 * fails to parse consumes no entropy.
 *
 * @module dice
 */

export type RollOutcome = { ok: true; result: EvalResult } | { ok: false; error: DiceError };

/**
 * Evaluate a dice expression.
 *
 * @param expression - Untrusted expression text, e.g. `2d6 + 3`.
 * @param budget - Limits; omitted fields use `DEFAULT_BUDGET`.
 * @param random - Entropy; a fresh `Math.random` source when omitted.
 * @throws {DiceError} On any lexing, parsing or evaluation failure.
 */
export function roll(
  expression: string,
  budget: Partial<Budget> = {},
  random: RandomSource = createRandomSource('math'),
): EvalResult {
  const limits = resolveBudget(budget).budget;
  const ast = parseExpression(expression, limits);
  return evaluate(ast, random, limits);
}

/**
 * Like `roll`, but returns interpreter failures as a value. Errors that are
 * not `DiceError`s (bugs, a throwing random source) still propagate.
 */
export function tryRoll(
  expression: string,
  budget: Partial<Budget> = {},
  random?: RandomSource,
): RollOutcome {
  try {
    return { ok: true, result: roll(expression, budget, random) };
  } catch (e) {
    if (isDiceError(e)) return { ok: false, error: e };
    throw e;
  }
}

export { DEFAULT_BUDGET, resolveBudget } from './budget';
export { evaluate } from './evaluator';
export { format, formatNumber, formatRollEvent, renderExpression } from './formatter';
export type { FormatOptions } from './formatter';
export { tokenize } from './lexer';
export { parse, parseExpression } from './parser';
export { listFunctions } from './registry';
export type { FunctionEntry } from './registry';
export {
  createRandomSource,
  cryptoSource,
  isRandomMethod,
  mulberry32,
  RANDOM_METHODS,
  scriptedSource,
} from './random';
export type { RandomMethod } from './random';
export * from './errors';
export type * from './types';
