import { scorePool } from './diceTerm';
import {
  ArityError,
  BudgetExceededError,
  DivisionByZeroError,
  NonFiniteResultError,
  OperandTypeError,
  RandomSourceError,
  UnknownFunctionError,
} from './errors';
import { acceptsArgCount, describeArity, getFunction } from './registry';
import type {
  AstNode,
  BinaryOperator,
  Budget,
  DiceRoll,
  EvalResult,
  RandomSource,
  RollEvent,
  UnaryOperator,
} from './types';

/**
 * AST evaluator
 *
 * Walks the tree post-order, left to right, so dice are drawn in the order
 * they appear in the source. Every die costs exactly one call to the
 * random source. The running dice count is checked against the budget
 * before a term draws anything.
 *
 * The evaluator never returns NaN or an infinity: any operation that would
 * produce one fails with a `DiceError` instead.
 *
 * @module dice/evaluator
 */

/** Shifts past this many bits cannot produce a finite double. */
const MAX_SHIFT = 1100;

function assertNever(x: never): never {
  throw new Error(`Unhandled AST node: ${JSON.stringify(x)}`);
}

function requireInteger(operator: string, ...operands: number[]): void {
  for (const n of operands) {
    if (!Number.isInteger(n)) throw new OperandTypeError(operator, n);
  }
}

const truthy = (n: number) => n !== 0;
const bool = (b: boolean) => (b ? 1 : 0);

function applyUnary(operator: UnaryOperator, x: number): number {
  switch (operator) {
    case '-':
      return -x;
    case '+':
      return x;
    case '~':
      requireInteger(operator, x);
      return Number(~BigInt(x));
  }
}

/** `%` with the sign of the divisor; keeps the exact result of JS `%`. */
function flooredRemainder(a: number, b: number): number {
  const r = a % b;
  return r !== 0 && (r < 0) !== (b < 0) ? r + b : r;
}

function shiftLeft(a: number, b: number): number {
  if (a === 0) return 0;
  if (b > MAX_SHIFT) throw new NonFiniteResultError('<<');
  return Number(BigInt(a) << BigInt(b));
}

function shiftRight(a: number, b: number): number {
  if (b > MAX_SHIFT) return a < 0 ? -1 : 0;
  return Number(BigInt(a) >> BigInt(b));
}

function applyBinary(operator: BinaryOperator, a: number, b: number): number {
  switch (operator) {
    case '+':
      return a + b;
    case '-':
      return a - b;
    case '*':
      return a * b;
    case '/':
      if (b === 0) throw new DivisionByZeroError(operator);
      return a / b;
    case '//':
      if (b === 0) throw new DivisionByZeroError(operator);
      return Math.floor(a / b);
    case '%':
      if (b === 0) throw new DivisionByZeroError(operator);
      return flooredRemainder(a, b);
    case '**':
      if (a === 0 && b < 0) throw new DivisionByZeroError(operator);
      return a ** b;
    case '&':
      requireInteger(operator, a, b);
      return Number(BigInt(a) & BigInt(b));
    case '|':
      requireInteger(operator, a, b);
      return Number(BigInt(a) | BigInt(b));
    case '^':
      requireInteger(operator, a, b);
      return Number(BigInt(a) ^ BigInt(b));
    case '<<':
    case '>>':
      requireInteger(operator, a, b);
      if (b < 0) throw new OperandTypeError(operator, b);
      return operator === '<<' ? shiftLeft(a, b) : shiftRight(a, b);
    case '<':
      return bool(a < b);
    case '<=':
      return bool(a <= b);
    case '>':
      return bool(a > b);
    case '>=':
      return bool(a >= b);
    case '==':
      return bool(a === b);
    case '!=':
      return bool(a !== b);
    case 'and':
      return bool(truthy(a) && truthy(b));
    case 'or':
      return bool(truthy(a) || truthy(b));
  }
}

/**
 * Evaluate a parsed expression.
 *
 * @param ast - Tree produced by `parse`. Hand-built trees are re-validated
 *   for function names and arity.
 * @param random - Entropy for the dice. Not shared across concurrent calls.
 * @param budget - `maxTotalDice` bounds the dice drawn across the tree.
 * @returns The value, one roll event per dice term in source order, and
 *   any precision warnings.
 * @throws {DiceError} On the first failure; no partial result is returned.
 */
export function evaluate(ast: AstNode, random: RandomSource, budget: Budget): EvalResult {
  const rolls: RollEvent[] = [];
  const warnings = new Set<string>();
  let diceUsed = 0;

  const checked = (value: number, operation: string): number => {
    if (!Number.isFinite(value)) throw new NonFiniteResultError(operation);
    if (Number.isInteger(value) && Math.abs(value) > Number.MAX_SAFE_INTEGER) {
      warnings.add(`precision: '${operation}' exceeds safe integer range`);
    }
    return value;
  };

  function draw(low: number, high: number): number {
    const d = random.nextInt(low, high);
    if (!Number.isInteger(d) || d < low || d > high) throw new RandomSourceError([low, high], d);
    return d;
  }

  function rollDice(node: DiceRoll): number {
    if (diceUsed + node.count > budget.maxTotalDice) {
      throw new BudgetExceededError('maxTotalDice', diceUsed + node.count, budget.maxTotalDice);
    }
    diceUsed += node.count;

    const raw: number[] = [];
    for (let i = 0; i < node.count; i++) raw.push(draw(node.low, node.high));

    let event: RollEvent;
    if (node.kind === 'pool' && node.threshold !== null) {
      const scored = scorePool(raw, node.threshold);
      event = { label: node.label, kind: node.kind, low: node.low, high: node.high, raw, ...scored };
    } else {
      const subtotal = raw.reduce((sum, d) => sum + d, 0);
      event = {
        label: node.label,
        kind: node.kind,
        low: node.low,
        high: node.high,
        raw,
        kept: [...raw],
        dropped: [],
        penalized: [],
        subtotal,
      };
    }
    rolls.push(Object.freeze(event));
    return event.subtotal;
  }

  function visit(node: AstNode): number {
    switch (node.type) {
      case 'number':
        return checked(node.value, 'number');
      case 'dice':
        return rollDice(node);
      case 'call': {
        const entry = getFunction(node.name);
        if (!entry) throw new UnknownFunctionError(node.name, -1);
        if (!acceptsArgCount(entry.arity, node.args.length)) {
          throw new ArityError(entry.name, describeArity(entry.arity), node.args.length);
        }
        const args = node.args.map(visit);
        return checked(entry.apply(...args), entry.name);
      }
      case 'binary': {
        const left = visit(node.left);
        const right = visit(node.right);
        return checked(applyBinary(node.operator, left, right), node.operator);
      }
      case 'unary':
        return checked(applyUnary(node.operator, visit(node.operand)), node.operator);
      default:
        return assertNever(node);
    }
  }

  const value = visit(ast);
  return Object.freeze({
    value,
    rolls: Object.freeze(rolls),
    warnings: Object.freeze([...warnings]),
  });
}
