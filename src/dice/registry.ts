import { OperandTypeError } from './errors';
import type { BinaryOperator, UnaryOperator } from './types';

/**
 * Function and operator registry
 *
 * The closed allow-list of everything an expression may call. Functions
 * receive only their already-evaluated numeric arguments; there is no
 * lookup by arbitrary name anywhere else in the interpreter.
 *
 * Operator semantics that can fail (division by zero, bitwise on
 * fractions) live in the evaluator; this table only carries what the
 * parser needs to build the tree.
 *
 * @module dice/registry
 */

export interface Arity {
  min: number;
  max: number;
}

export interface FunctionEntry {
  readonly name: string;
  readonly arity: Readonly<Arity>;
  readonly description: string;
  readonly apply: (...args: number[]) => number;
}

export type Associativity = 'left' | 'right';

export interface BinaryOperatorEntry {
  readonly symbol: BinaryOperator;
  readonly precedence: number;
  readonly associativity: Associativity;
}

const exactly = (n: number): Arity => ({ min: n, max: n });
const atLeast = (n: number): Arity => ({ min: n, max: Number.POSITIVE_INFINITY });

/** Largest power of ten a double can hold. */
const MAX_DIGITS = 308;

/** Rounds half away from zero; negative `digits` round to tens, hundreds and so on. */
function roundTo(x: number, digits = 0): number {
  if (!Number.isInteger(digits)) throw new OperandTypeError('round', digits);
  if (digits < 0) {
    const step = 10 ** Math.min(-digits, MAX_DIGITS);
    return Math.sign(x) * Math.round(Math.abs(x) / step) * step;
  }
  const factor = 10 ** Math.min(digits, MAX_DIGITS);
  const scaled = Math.abs(x) * factor;
  if (!Number.isFinite(scaled) || Number.isInteger(scaled)) return x;
  return (Math.sign(x) * Math.round(scaled)) / factor;
}

function logBase(x: number, base?: number): number {
  return base === undefined ? Math.log(x) : Math.log(x) / Math.log(base);
}

const FUNCTION_LIST: FunctionEntry[] = [
  { name: 'abs', arity: exactly(1), description: 'absolute value', apply: Math.abs },
  { name: 'ceil', arity: exactly(1), description: 'round up', apply: Math.ceil },
  { name: 'floor', arity: exactly(1), description: 'round down', apply: Math.floor },
  {
    name: 'round',
    arity: { min: 1, max: 2 },
    description: 'round to nearest, optionally to N decimals',
    apply: (x, digits) => roundTo(x, digits),
  },
  { name: 'trunc', arity: exactly(1), description: 'drop the fractional part', apply: Math.trunc },
  { name: 'sign', arity: exactly(1), description: '-1, 0 or 1', apply: Math.sign },
  { name: 'sqrt', arity: exactly(1), description: 'square root', apply: Math.sqrt },
  { name: 'cbrt', arity: exactly(1), description: 'cube root', apply: Math.cbrt },
  { name: 'exp', arity: exactly(1), description: 'e to the power x', apply: Math.exp },
  {
    name: 'log',
    arity: { min: 1, max: 2 },
    description: 'natural log, or log of x in base b',
    apply: (x, base) => logBase(x, base),
  },
  { name: 'log2', arity: exactly(1), description: 'base-2 logarithm', apply: Math.log2 },
  { name: 'log10', arity: exactly(1), description: 'base-10 logarithm', apply: Math.log10 },
  { name: 'pow', arity: exactly(2), description: 'x to the power y', apply: (x, y) => x ** y },
  { name: 'min', arity: atLeast(1), description: 'smallest argument', apply: Math.min },
  { name: 'max', arity: atLeast(1), description: 'largest argument', apply: Math.max },
  { name: 'hypot', arity: atLeast(1), description: 'Euclidean norm', apply: Math.hypot },
  { name: 'sin', arity: exactly(1), description: 'sine (radians)', apply: Math.sin },
  { name: 'cos', arity: exactly(1), description: 'cosine (radians)', apply: Math.cos },
  { name: 'tan', arity: exactly(1), description: 'tangent (radians)', apply: Math.tan },
  { name: 'asin', arity: exactly(1), description: 'arc sine', apply: Math.asin },
  { name: 'acos', arity: exactly(1), description: 'arc cosine', apply: Math.acos },
  { name: 'atan', arity: exactly(1), description: 'arc tangent', apply: Math.atan },
  { name: 'atan2', arity: exactly(2), description: 'arc tangent of y/x', apply: Math.atan2 },
];

const FUNCTIONS: ReadonlyMap<string, FunctionEntry> = new Map(
  FUNCTION_LIST.map(f => [f.name, Object.freeze(f)]),
);

/** Binding power of the prefix operators `- + ~`. */
export const UNARY_PRECEDENCE = 10;

export const UNARY_OPERATORS: readonly UnaryOperator[] = ['-', '+', '~'];

const BINARY_LIST: BinaryOperatorEntry[] = [
  { symbol: 'or', precedence: 1, associativity: 'left' },
  { symbol: 'and', precedence: 2, associativity: 'left' },
  { symbol: '<', precedence: 3, associativity: 'left' },
  { symbol: '<=', precedence: 3, associativity: 'left' },
  { symbol: '>', precedence: 3, associativity: 'left' },
  { symbol: '>=', precedence: 3, associativity: 'left' },
  { symbol: '==', precedence: 3, associativity: 'left' },
  { symbol: '!=', precedence: 3, associativity: 'left' },
  { symbol: '|', precedence: 4, associativity: 'left' },
  { symbol: '^', precedence: 5, associativity: 'left' },
  { symbol: '&', precedence: 6, associativity: 'left' },
  { symbol: '<<', precedence: 7, associativity: 'left' },
  { symbol: '>>', precedence: 7, associativity: 'left' },
  { symbol: '+', precedence: 8, associativity: 'left' },
  { symbol: '-', precedence: 8, associativity: 'left' },
  { symbol: '*', precedence: 9, associativity: 'left' },
  { symbol: '/', precedence: 9, associativity: 'left' },
  { symbol: '//', precedence: 9, associativity: 'left' },
  { symbol: '%', precedence: 9, associativity: 'left' },
  // binds tighter than a unary operator on its left: -2**2 == -(2**2)
  { symbol: '**', precedence: 11, associativity: 'right' },
];

const BINARY_OPERATORS: ReadonlyMap<string, BinaryOperatorEntry> = new Map(
  BINARY_LIST.map(op => [op.symbol, Object.freeze(op)]),
);

/**
 * Look up an allow-listed function. Names are case-insensitive.
 *
 * @param name - Identifier as written in the expression.
 * @returns The registry entry, or `undefined` when the name is not allowed.
 */
export function getFunction(name: string): FunctionEntry | undefined {
  return FUNCTIONS.get(name.toLowerCase());
}

export function listFunctions(): FunctionEntry[] {
  return [...FUNCTIONS.values()];
}

export function getBinaryOperator(symbol: string): BinaryOperatorEntry | undefined {
  return BINARY_OPERATORS.get(symbol);
}

export function isUnaryOperator(symbol: string): symbol is UnaryOperator {
  return (UNARY_OPERATORS as readonly string[]).includes(symbol);
}

export function acceptsArgCount(arity: Arity, got: number): boolean {
  return got >= arity.min && got <= arity.max;
}

/**
 * Human readable arity, e.g. `1`, `1-2`, `at least 1`.
 */
export function describeArity(arity: Arity): string {
  if (arity.min === arity.max) return String(arity.min);
  if (arity.max === Number.POSITIVE_INFINITY) return `at least ${arity.min}`;
  return `${arity.min}-${arity.max}`;
}
