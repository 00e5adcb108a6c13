import { DEFAULT_BUDGET } from '../src/dice/budget';
import {
  ArityError,
  BudgetExceededError,
  DivisionByZeroError,
  NonFiniteResultError,
  OperandTypeError,
  RandomSourceError,
  UnknownFunctionError,
} from '../src/dice/errors';
import { evaluate } from '../src/dice/evaluator';
import { parseExpression } from '../src/dice/parser';
import { scriptedSource } from '../src/dice/random';
import type { Budget, RandomSource } from '../src/dice/types';
import { thrownBy } from './helpers';

const noDice: RandomSource = {
  nextInt() {
    throw new Error('no dice expected');
  },
};

const run = (text: string, random: RandomSource = noDice, budget: Budget = DEFAULT_BUDGET) =>
  evaluate(parseExpression(text, budget), random, budget);

const value = (text: string) => run(text).value;

describe('evaluate dice terms', () => {
  test('1d20 forced to 20', () => {
    const result = run('1d20', scriptedSource([20]));
    expect(result.value).toBe(20);
    expect(result.rolls).toEqual([
      { label: '1d20', kind: 'standard', low: 1, high: 20, raw: [20], kept: [20], dropped: [], penalized: [], subtotal: 20 },
    ]);
  });

  test('3d6 sums every draw', () => {
    expect(run('3d6', scriptedSource([1, 6, 4])).rolls[0]).toMatchObject({ raw: [1, 6, 4], kept: [1, 6, 4], subtotal: 11 });
  });

  test('ranged dice over negative bounds', () => {
    const result = run('2d{-5,-1}', scriptedSource([-3, -1]));
    expect(result.value).toBe(-4);
    expect(result.rolls[0]).toMatchObject({ low: -5, high: -1, subtotal: -4 });
  });

  test('pool dice score successes and natural ones', () => {
    const result = run('4wod8', scriptedSource([1, 8, 9, 3]));
    expect(result.value).toBe(1);
    expect(result.rolls[0]).toMatchObject({
      label: '4wod8',
      raw: [1, 8, 9, 3],
      kept: [8, 9],
      penalized: [1],
      dropped: [3],
      subtotal: 1,
    });
  });

  test('dice are drawn in source order and feed arithmetic', () => {
    const result = run('1d4 + 2d6 * 1d8', scriptedSource([1, 2, 3, 4]));
    expect(result.value).toBe(21);
    expect(result.rolls.map(r => r.label)).toEqual(['1d4', '2d6', '1d8']);
    expect(result.rolls.map(r => r.raw)).toEqual([[1], [2, 3], [4]]);
  });

  test('function arguments roll left to right', () => {
    const result = run('max(1d6, 1d6)', scriptedSource([2, 5]));
    expect(result.value).toBe(5);
    expect(result.rolls.map(r => r.raw)).toEqual([[2], [5]]);
  });

  test('boolean operators still roll both sides', () => {
    const result = run('0 and 1d6', scriptedSource([3]));
    expect(result.value).toBe(0);
    expect(result.rolls).toHaveLength(1);
  });

  test('the dice budget is enforced before a term draws', () => {
    const source = scriptedSource([1, 2, 3, 4, 5, 6]);
    const budget: Budget = { ...DEFAULT_BUDGET, maxTotalDice: 5 };
    const e = thrownBy(() => run('3d6 + 3d6', source, budget));
    expect(e).toBeInstanceOf(BudgetExceededError);
    expect(e).toMatchObject({ limit: 'maxTotalDice', requested: 6, allowed: 5 });
    expect(source.remaining()).toBe(3);
  });

  test('a random source returning out-of-range values is rejected', () => {
    const e = thrownBy(() => run('1d6', { nextInt: () => 7 }));
    expect(e).toBeInstanceOf(RandomSourceError);
    expect(e).toMatchObject({ requested: [1, 6], got: 7 });
    expect(thrownBy(() => run('1d6', { nextInt: () => 2.5 }))).toBeInstanceOf(RandomSourceError);
  });
});

describe('evaluate arithmetic', () => {
  test.each([
    ['(1 + 2) * 3', 9],
    ['2 ** 3 ** 2', 512],
    ['-2 ** 2', -4],
    ['2 ** -1', 0.5],
    ['7 / 2', 3.5],
    ['7 // 2', 3],
    ['-7 // 2', -4],
    ['-7 % 3', 2],
    ['7 % -3', -2],
    ['2 ** 60 % 7', 1],
    ['-(2 ** 60) % 7', 6],
    ['+4 - -4', 8],
    ['(3 + 4) * 2 // 3', 4],
  ])('%s = %p', (text, expected) => {
    expect(value(text)).toBe(expected);
  });

  test.each([
    ['6 & 3', 2],
    ['6 | 3', 7],
    ['6 ^ 3', 5],
    ['~5', -6],
    ['1 << 40', 1099511627776],
    ['-9 >> 1', -5],
    ['2 ** 40 & 2 ** 40', 1099511627776],
    ['1 >> 5000', 0],
    ['0 << 5000', 0],
  ])('bitwise %s = %p', (text, expected) => {
    expect(value(text)).toBe(expected);
  });

  test.each([
    ['3 > 2', 1],
    ['2 >= 3', 0],
    ['1 == 1.0', 1],
    ['1 != 1', 0],
    ['(1 < 2) + (2 < 3)', 2],
    ['1 and 0', 0],
    ['0 or 2', 1],
  ])('comparison %s = %p', (text, expected) => {
    expect(value(text)).toBe(expected);
  });

  test.each([
    ['max(1, 7, 3)', 7],
    ['min(4, -2)', -2],
    ['abs(-3) + floor(2.7) + ceil(1.2)', 7],
    ['round(2.5)', 3],
    ['round(-2.5)', -3],
    ['round(-1.25, 1)', -1.3],
    ['round(1250, -2)', 1300],
    ['round(1.5, 400)', 1.5],
    ['round(1.2345, 1)', 1.2],
    ['pow(2, 10)', 1024],
    ['sqrt(16)', 4],
    ['log2(8)', 3],
    ['trunc(-2.7)', -2],
    ['sign(-8)', -1],
    ['hypot(3, 4)', 5],
  ])('function %s = %p', (text, expected) => {
    expect(value(text)).toBe(expected);
  });

  test('division and modulo by zero fail', () => {
    for (const [text, op] of [['1/0', '/'], ['5 // 0', '//'], ['5 % 0', '%'], ['0 ** -1', '**']]) {
      const e = thrownBy(() => run(text));
      expect(e).toBeInstanceOf(DivisionByZeroError);
      expect(e).toMatchObject({ operator: op });
    }
  });

  test('bitwise operators reject non-integral operands', () => {
    const e = thrownBy(() => run('5 & 2.5'));
    expect(e).toBeInstanceOf(OperandTypeError);
    expect(e).toMatchObject({ code: 'TYPE_ERROR', operator: '&', operand: 2.5 });
    expect(thrownBy(() => run('~1.5'))).toMatchObject({ operator: '~', operand: 1.5 });
    expect(thrownBy(() => run('(7 / 2) | 1'))).toMatchObject({ operator: '|', operand: 3.5 });
    expect(thrownBy(() => run('1 << -1'))).toMatchObject({ operator: '<<', operand: -1 });
    expect(thrownBy(() => run('round(2, 0.5)'))).toMatchObject({ operator: 'round', operand: 0.5 });
  });

  test('results that are not finite real numbers fail', () => {
    expect(thrownBy(() => run('sqrt(-1)'))).toMatchObject({ operation: 'sqrt' });
    expect(thrownBy(() => run('10 ** 400'))).toMatchObject({ operation: '**' });
    expect(thrownBy(() => run('log(0)'))).toBeInstanceOf(NonFiniteResultError);
    expect(thrownBy(() => run('(-8) ** 0.5'))).toBeInstanceOf(NonFiniteResultError);
    expect(thrownBy(() => run('3 << 5000'))).toMatchObject({ operation: '<<' });
  });

  test('integers past the safe range add a precision warning', () => {
    const result = run('2 ** 60');
    expect(result.value).toBe(2 ** 60);
    expect(result.warnings).toEqual(["precision: '**' exceeds safe integer range"]);
    expect(run('2 ** 50').warnings).toEqual([]);
  });
});

describe('evaluate hand-built trees', () => {
  test('re-checks function names and arity', () => {
    expect(
      thrownBy(() => evaluate({ type: 'call', name: 'eval', args: [] }, noDice, DEFAULT_BUDGET)),
    ).toBeInstanceOf(UnknownFunctionError);
    const e = thrownBy(() => evaluate({ type: 'call', name: 'sqrt', args: [] }, noDice, DEFAULT_BUDGET));
    expect(e).toBeInstanceOf(ArityError);
    expect(e).toMatchObject({ functionName: 'sqrt', expected: '1', got: 0 });
  });
});

describe('evaluate result', () => {
  test('is frozen', () => {
    const result = run('1d4', scriptedSource([2]));
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.rolls)).toBe(true);
    expect(Object.isFrozen(result.rolls[0])).toBe(true);
  });

  test('expressions without dice are deterministic', () => {
    expect(run('abs(-3) * (2 + 5) // 4')).toEqual(run('abs(-3) * (2 + 5) // 4'));
  });
});
