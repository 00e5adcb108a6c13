import type { AstNode, EvalResult, RollEvent } from './types';

/**
 * Result formatting
 *
 * Turns an `EvalResult` into display text: the value on the first line,
 * then one line per dice term listing its draws. Kept draws print as-is,
 * natural ones as `1!` and dropped draws struck through as `~3~`.
 *
 * @module dice/formatter
 */

export interface FormatOptions {
  /** Maximum fractional digits printed for non-integral values. */
  decimals?: number;
}

export const DEFAULT_DECIMALS = 2;

/** `toFixed` accepts 0 to 100 digits. */
function clampDecimals(decimals: number): number {
  if (!Number.isFinite(decimals)) return DEFAULT_DECIMALS;
  return Math.min(100, Math.max(0, Math.trunc(decimals)));
}

/**
 * Print a number with at most `decimals` fractional digits, trailing zeros
 * removed. Negative zero prints as `0`.
 */
export function formatNumber(value: number, decimals = DEFAULT_DECIMALS): string {
  let s = Number.isInteger(value) ? String(value) : value.toFixed(clampDecimals(decimals));
  if (s.includes('.')) s = s.replace(/\.?0+$/, '');
  return s === '-0' ? '0' : s;
}

function countOf(values: readonly number[]): Map<number, number> {
  const counts = new Map<number, number>();
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
  return counts;
}

function take(counts: Map<number, number>, v: number): boolean {
  const n = counts.get(v) ?? 0;
  if (n === 0) return false;
  counts.set(v, n - 1);
  return true;
}

/**
 * One breakdown line, e.g. `4wod8 [1!, 8, 9, ~3~] = 1`.
 */
export function formatRollEvent(event: RollEvent, options: FormatOptions = {}): string {
  const kept = countOf(event.kept);
  const penalized = countOf(event.penalized);
  const draws = event.raw.map(d => {
    if (take(kept, d)) return String(d);
    if (take(penalized, d)) return `${d}!`;
    return `~${d}~`;
  });
  return `${event.label} [${draws.join(', ')}] = ${formatNumber(event.subtotal, options.decimals)}`;
}

/**
 * Render a successful evaluation for display.
 *
 * @param result - Output of `evaluate` / `roll`.
 * @param options - Number formatting.
 * @returns The value, then one line per roll event, then one `note:` line
 *   per warning.
 */
export function format(result: EvalResult, options: FormatOptions = {}): string {
  const lines = [formatNumber(result.value, options.decimals)];
  for (const event of result.rolls) lines.push(formatRollEvent(event, options));
  for (const warning of result.warnings) lines.push(`note: ${warning}`);
  return lines.join('\n');
}

/**
 * Print an AST back as a fully parenthesised expression, e.g.
 * `((1 + 2) * 3d6)`.
 */
export function renderExpression(node: AstNode): string {
  switch (node.type) {
    case 'number':
      return String(node.value);
    case 'dice':
      return node.label;
    case 'call':
      return `${node.name}(${node.args.map(renderExpression).join(', ')})`;
    case 'binary':
      return `(${renderExpression(node.left)} ${node.operator} ${renderExpression(node.right)})`;
    case 'unary': {
      const inner = renderExpression(node.operand);
      return node.operand.type === 'unary' ? `${node.operator}(${inner})` : `${node.operator}${inner}`;
    }
  }
}
