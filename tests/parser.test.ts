import { DEFAULT_BUDGET } from '../src/dice/budget';
import {
  ArityError,
  BudgetExceededError,
  DepthExceededError,
  DiceTermError,
  ExpressionSyntaxError,
  UnknownFunctionError,
} from '../src/dice/errors';
import { renderExpression } from '../src/dice/formatter';
import { parseExpression } from '../src/dice/parser';
import type { Budget } from '../src/dice/types';
import { thrownBy } from './helpers';

const shape = (text: string, budget: Budget = DEFAULT_BUDGET) =>
  renderExpression(parseExpression(text, budget));

describe('parseExpression precedence', () => {
  test.each([
    ['1 + 2 * 3', '(1 + (2 * 3))'],
    ['(1 + 2) * 3', '((1 + 2) * 3)'],
    ['1 - 2 - 3', '((1 - 2) - 3)'],
    ['8 / 4 // 2 % 3', '(((8 / 4) // 2) % 3)'],
    ['2 ** 3 ** 2', '(2 ** (3 ** 2))'],
    ['-2 ** 2', '-(2 ** 2)'],
    ['2 ** -1', '(2 ** -1)'],
    ['-2 * 3', '(-2 * 3)'],
    ['- -1', '-(-1)'],
    ['~5 & 3', '(~5 & 3)'],
    ['1 | 2 ^ 3 & 4 << 1 + 1', '(1 | (2 ^ (3 & (4 << (1 + 1)))))'],
    ['1 < 2 and 3 or 0', '(((1 < 2) and 3) or 0)'],
    ['1 == 2 != 3', '((1 == 2) != 3)'],
  ])('%s', (text, expected) => {
    expect(shape(text)).toBe(expected);
  });
});

describe('parseExpression leaves and calls', () => {
  test('dice terms are canonicalized', () => {
    expect(shape('d20')).toBe('1d20');
    expect(shape('2d{-5,-1}')).toBe('2d{-5,-1}');
    expect(shape('5wod')).toBe('5wod8');
    expect(shape('3d6 + 2')).toBe('(3d6 + 2)');
  });

  test('function calls take expressions as arguments', () => {
    expect(shape('max(1, 2d6, 3)')).toBe('max(1, 2d6, 3)');
    expect(shape('ABS(-3)')).toBe('abs(-3)');
    expect(shape('floor((1 + 2) / 2)')).toBe('floor(((1 + 2) / 2))');
  });

  test('builds a typed tree', () => {
    expect(parseExpression('1 + d4', DEFAULT_BUDGET)).toEqual({
      type: 'binary',
      operator: '+',
      left: { type: 'number', value: 1 },
      right: {
        type: 'dice',
        kind: 'standard',
        count: 1,
        low: 1,
        high: 4,
        threshold: null,
        label: '1d4',
      },
    });
  });
});

describe('parseExpression errors', () => {
  test('unknown identifiers fail at parse time', () => {
    const e = thrownBy(() => parseExpression('unknown_fn(1)', DEFAULT_BUDGET));
    expect(e).toBeInstanceOf(UnknownFunctionError);
    expect(e).toMatchObject({ functionName: 'unknown_fn', position: 0 });
    expect(thrownBy(() => parseExpression('x + 1', DEFAULT_BUDGET))).toMatchObject({
      code: 'UNKNOWN_FUNCTION',
      functionName: 'x',
    });
    expect(thrownBy(() => parseExpression('constructor(1)', DEFAULT_BUDGET))).toBeInstanceOf(
      UnknownFunctionError,
    );
  });

  test.each([
    ['abs 3', 4, "'(' after 'abs'", "'3'"],
    ['(1 + 2', 6, "')'", 'end of input'],
    ['1 +', 3, 'an expression', 'end of input'],
    ['1 2', 2, 'an operator or end of input', "'2'"],
    ['max(1 2)', 6, "',' or ')'", "'2'"],
    ['max(1,)', 6, 'an expression', "')'"],
    ['', 0, 'an expression', 'end of input'],
    ['1 + )', 4, 'an expression', "')'"],
    ['2 ~ 3', 2, 'an operator or end of input', "'~'"],
  ])('syntax error in %p', (text, position, expected, found) => {
    const e = thrownBy(() => parseExpression(text, DEFAULT_BUDGET));
    expect(e).toBeInstanceOf(ExpressionSyntaxError);
    expect(e).toMatchObject({ position, expected, found });
  });

  test('argument counts are checked against the registry', () => {
    const e = thrownBy(() => parseExpression('sqrt(1, 2)', DEFAULT_BUDGET));
    expect(e).toBeInstanceOf(ArityError);
    expect(e).toMatchObject({ functionName: 'sqrt', expected: '1', got: 2 });
    expect(thrownBy(() => parseExpression('min()', DEFAULT_BUDGET))).toMatchObject({
      expected: 'at least 1',
      got: 0,
    });
  });

  test('invalid dice terms fail while parsing', () => {
    expect(thrownBy(() => parseExpression('0d6', DEFAULT_BUDGET))).toBeInstanceOf(DiceTermError);
    const e = thrownBy(() => parseExpression('1001d6', DEFAULT_BUDGET));
    expect(e).toBeInstanceOf(BudgetExceededError);
    expect(e).toMatchObject({ limit: 'maxTotalDice', requested: 1001, allowed: 1000 });
    expect(thrownBy(() => parseExpression('1d100001', DEFAULT_BUDGET))).toMatchObject({
      limit: 'maxSides',
    });
  });
});

describe('parseExpression budget', () => {
  const shallow: Budget = { ...DEFAULT_BUDGET, maxAstDepth: 3 };

  test('nesting up to maxAstDepth is accepted', () => {
    expect(shape('((1))', shallow)).toBe('1');
    expect(shape('1 + 2 + 3', shallow)).toBe('((1 + 2) + 3)');
  });

  test('parenthesis nesting past maxAstDepth fails eagerly', () => {
    const e = thrownBy(() => parseExpression('(((1)))', shallow));
    expect(e).toBeInstanceOf(DepthExceededError);
    expect(e).toBeInstanceOf(BudgetExceededError);
    expect(e).toMatchObject({ limit: 'maxAstDepth', requested: 4, allowed: 3 });
  });

  test('tree height past maxAstDepth fails', () => {
    expect(thrownBy(() => parseExpression('1 + 2 + 3 + 4', shallow))).toMatchObject({
      limit: 'maxAstDepth',
      requested: 4,
    });
  });

  test('adversarial nesting is rejected without exhausting the stack', () => {
    const deep = '('.repeat(10000) + '1' + ')'.repeat(10000);
    expect(thrownBy(() => parseExpression(deep, DEFAULT_BUDGET))).toMatchObject({
      limit: 'maxAstDepth',
      requested: 65,
      allowed: 64,
    });
    const unary = '-'.repeat(10000) + '1';
    expect(thrownBy(() => parseExpression(unary, DEFAULT_BUDGET))).toBeInstanceOf(DepthExceededError);
  });

  test('node count past maxExpansionCount fails', () => {
    const small: Budget = { ...DEFAULT_BUDGET, maxExpansionCount: 5 };
    expect(shape('1 + 1 + 1', small)).toBe('((1 + 1) + 1)');
    expect(thrownBy(() => parseExpression('1 + 1 + 1 + 1', small))).toMatchObject({
      limit: 'maxExpansionCount',
      requested: 6,
      allowed: 5,
    });
  });
});
