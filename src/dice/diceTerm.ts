import { MAX_POOL_THRESHOLD, MIN_POOL_THRESHOLD } from './budget';
import { BudgetExceededError, DiceTermError } from './errors';
import type { Budget, DiceCapture, DiceRoll } from './types';

/**
 * Dice term recognizer
 *
 * Turns the raw captures of a `DICE` token into a validated `DiceRoll` leaf
 * and, at evaluation time, classifies pool draws into successes, natural
 * ones and dropped dice.
 *
 * Canonical forms:
 * - standard `XdY`: X dice in `[1, Y]`
 * - ranged `XdY{lo,hi}` / `Xd{lo,hi}`: X dice in `[lo, hi]`
 * - pool `XwodY`: X ten-sided dice, successes at or above threshold Y
 *
 * @module dice/diceTerm
 */

export const POOL_DIE_SIDES = 10;

/**
 * Build the label shown in roll events for a recognized term.
 */
export function diceLabel(
  roll: Pick<DiceRoll, 'kind' | 'count' | 'low' | 'high' | 'threshold'>,
): string {
  switch (roll.kind) {
    case 'standard':
      return `${roll.count}d${roll.high}`;
    case 'ranged':
      return `${roll.count}d{${roll.low},${roll.high}}`;
    case 'pool':
      return `${roll.count}wod${roll.threshold}`;
  }
}

function checkCount(count: number, term: string, budget: Budget): void {
  if (count < 1) throw new DiceTermError('dice count must be at least 1', term);
  if (count > budget.maxTotalDice) {
    throw new BudgetExceededError('maxTotalDice', count, budget.maxTotalDice);
  }
}

/**
 * Validate a captured dice term against the grammar rules and the budget.
 *
 * @param capture - Groups captured by the lexer.
 * @param term - Source text of the term, used in error messages.
 * @param budget - Limits on count and sides.
 * @throws {DiceTermError} Non-positive count or sides, inverted range,
 *   threshold outside `[2, 10]`, or sides that disagree with a range.
 * @throws {BudgetExceededError} Count or sides above the budget.
 */
export function recognizeDice(capture: DiceCapture, term: string, budget: Budget): DiceRoll {
  const count = capture.count ?? 1;
  checkCount(count, term, budget);

  if (capture.kind === 'pool') {
    const threshold = capture.threshold ?? budget.defaultPoolThreshold;
    if (threshold < MIN_POOL_THRESHOLD || threshold > MAX_POOL_THRESHOLD) {
      throw new DiceTermError(
        `threshold must be between ${MIN_POOL_THRESHOLD} and ${MAX_POOL_THRESHOLD}`,
        term,
      );
    }
    const base = { kind: 'pool' as const, count, low: 1, high: POOL_DIE_SIDES, threshold };
    return { type: 'dice', ...base, label: diceLabel(base) };
  }

  if (capture.kind === 'ranged') {
    const low = capture.low ?? 1;
    const high = capture.high ?? low;
    if (low > high) throw new DiceTermError(`range low ${low} exceeds high ${high}`, term);
    const extent = Math.max(Math.abs(low), Math.abs(high));
    if (extent > budget.maxSides) {
      throw new BudgetExceededError('maxSides', extent, budget.maxSides);
    }
    const faces = high - low + 1;
    if (faces > budget.maxSides) throw new BudgetExceededError('maxSides', faces, budget.maxSides);
    if (capture.sides !== null && capture.sides !== faces) {
      throw new DiceTermError(`${capture.sides} sides do not match a range of ${faces}`, term);
    }
    const base = { kind: 'ranged' as const, count, low, high, threshold: null };
    return { type: 'dice', ...base, label: diceLabel(base) };
  }

  const sides = capture.sides ?? 0;
  if (sides < 1) throw new DiceTermError('dice must have at least 1 side', term);
  if (sides > budget.maxSides) throw new BudgetExceededError('maxSides', sides, budget.maxSides);
  const base = { kind: 'standard' as const, count, low: 1, high: sides, threshold: null };
  return { type: 'dice', ...base, label: diceLabel(base) };
}

/**
 * Split pool draws by the success / natural-one rule.
 *
 * Each draw at or above `threshold` is a success (+1); each draw of 1 is a
 * natural one (−1); everything else is dropped.
 */
export function scorePool(
  draws: readonly number[],
  threshold: number,
): { kept: number[]; penalized: number[]; dropped: number[]; subtotal: number } {
  const kept: number[] = [];
  const penalized: number[] = [];
  const dropped: number[] = [];
  let subtotal = 0;
  for (const d of draws) {
    const success = d >= threshold;
    const naturalOne = d === 1;
    if (success) {
      kept.push(d);
      subtotal += 1;
    }
    if (naturalOne) {
      penalized.push(d);
      subtotal -= 1;
    }
    if (!success && !naturalOne) dropped.push(d);
  }
  return { kept, penalized, dropped, subtotal };
}
