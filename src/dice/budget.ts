import type { Budget } from './types';

/**
 * Limits applied when the host does not supply its own.
 */
export const DEFAULT_BUDGET: Readonly<Budget> = Object.freeze({
  maxTotalDice: 1000,
  maxSides: 100000,
  maxAstDepth: 64,
  maxExpansionCount: 512,
  defaultPoolThreshold: 8,
});

export const MIN_POOL_THRESHOLD = 2;
export const MAX_POOL_THRESHOLD = 10;

/**
 * Fill in a partial budget from the defaults. Values that are not positive
 * integers (or a pool threshold outside `[2, 10]`) are replaced by the
 * default and reported through `invalid` so the caller can warn about them.
 *
 * @param partial - Host supplied limits, possibly incomplete.
 * @returns The merged budget and the keys whose values were rejected.
 */
export function resolveBudget(partial: Partial<Budget> = {}): {
  budget: Budget;
  invalid: Array<keyof Budget>;
} {
  const invalid: Array<keyof Budget> = [];
  const pick = (key: keyof Budget, ok: (n: number) => boolean): number => {
    const v = partial[key];
    if (v === undefined) return DEFAULT_BUDGET[key];
    if (!Number.isInteger(v) || !ok(v)) {
      invalid.push(key);
      return DEFAULT_BUDGET[key];
    }
    return v;
  };
  const positive = (n: number) => n > 0;
  const budget: Budget = {
    maxTotalDice: pick('maxTotalDice', positive),
    maxSides: pick('maxSides', positive),
    maxAstDepth: pick('maxAstDepth', positive),
    maxExpansionCount: pick('maxExpansionCount', positive),
    defaultPoolThreshold: pick(
      'defaultPoolThreshold',
      n => n >= MIN_POOL_THRESHOLD && n <= MAX_POOL_THRESHOLD,
    ),
  };
  return { budget, invalid };
}
