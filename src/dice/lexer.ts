import { LexError } from './errors';
import type { DiceCapture, Token } from './types';

/**
 * Lexer for dice expressions.
 *
 * Produces a flat token list terminated by `EOF`. Dice terms (`3d6`,
 * `d{1,4}`, `5wod7`) are captured as single `DICE` tokens so the parser
 * never has to look inside them. Whitespace is discarded.
 *
 * @module dice/lexer
 */

const TWO_CHAR_OPERATORS = ['**', '//', '<<', '>>', '<=', '>=', '==', '!='];
const ONE_CHAR_OPERATORS = ['+', '-', '*', '/', '%', '&', '|', '^', '~', '<', '>'];
const WORD_OPERATORS = ['and', 'or'];

const STANDARD_DICE = /(\d*)d(\d*)(?:\{\s*([+-]?\d+)\s*,\s*([+-]?\d+)\s*\})?/iy;
const POOL_DICE = /(\d*)wod(\d*)/iy;
const NUMBER = /\d+(?:\.\d+)?|\.\d+/y;
const IDENT = /[A-Za-z_][A-Za-z0-9_]*/y;

const isIdentChar = (c: string | undefined) => c !== undefined && /[A-Za-z0-9_]/.test(c);

const optionalInt = (s: string | undefined): number | null =>
  s === undefined || s === '' ? null : parseInt(s, 10);

/**
 * Try to read a dice term at `pos`. Returns `null` when the text there is
 * not a complete dice term (it may still be a number or an identifier).
 */
function matchDice(input: string, pos: number): { text: string; dice: DiceCapture } | null {
  POOL_DICE.lastIndex = pos;
  const pool = POOL_DICE.exec(input);
  if (pool && !isIdentChar(input[pos + pool[0].length])) {
    return {
      text: pool[0],
      dice: {
        kind: 'pool',
        count: optionalInt(pool[1]),
        sides: null,
        low: null,
        high: null,
        threshold: optionalInt(pool[2]),
      },
    };
  }

  STANDARD_DICE.lastIndex = pos;
  const std = STANDARD_DICE.exec(input);
  if (!std || isIdentChar(input[pos + std[0].length])) return null;
  const [text, count, sides, low, high] = std;
  const ranged = low !== undefined && high !== undefined;
  if (!ranged && sides === '') return null;
  return {
    text,
    dice: {
      kind: ranged ? 'ranged' : 'standard',
      count: optionalInt(count),
      sides: optionalInt(sides),
      low: optionalInt(low),
      high: optionalInt(high),
      threshold: null,
    },
  };
}

/**
 * Convert expression text into tokens.
 *
 * Multi-character operators are matched before single-character ones, dice
 * terms before plain numbers and identifiers. `and` / `or` (any case) are
 * operators rather than identifiers.
 *
 * @param input - Untrusted expression text.
 * @returns Tokens in source order, ending with an `EOF` token.
 * @throws {LexError} On a character that starts no token.
 */
export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    const c = input[i];

    if (/\s/.test(c)) {
      i++;
      continue;
    }

    const dice = matchDice(input, i);
    if (dice) {
      tokens.push({ kind: 'DICE', text: dice.text, position: i, dice: dice.dice });
      i += dice.text.length;
      continue;
    }

    NUMBER.lastIndex = i;
    const num = NUMBER.exec(input);
    if (num) {
      tokens.push({ kind: 'NUMBER', text: num[0], position: i, value: Number(num[0]) });
      i += num[0].length;
      continue;
    }

    IDENT.lastIndex = i;
    const ident = IDENT.exec(input);
    if (ident) {
      const word = ident[0];
      if (WORD_OPERATORS.includes(word.toLowerCase())) {
        tokens.push({ kind: 'OPERATOR', text: word.toLowerCase(), position: i });
      } else {
        tokens.push({ kind: 'IDENT', text: word, position: i });
      }
      i += word.length;
      continue;
    }

    const two = input.slice(i, i + 2);
    if (TWO_CHAR_OPERATORS.includes(two)) {
      tokens.push({ kind: 'OPERATOR', text: two, position: i });
      i += 2;
      continue;
    }
    if (ONE_CHAR_OPERATORS.includes(c)) {
      tokens.push({ kind: 'OPERATOR', text: c, position: i });
      i++;
      continue;
    }

    if (c === '(') tokens.push({ kind: 'LPAREN', text: c, position: i });
    else if (c === ')') tokens.push({ kind: 'RPAREN', text: c, position: i });
    else if (c === ',') tokens.push({ kind: 'COMMA', text: c, position: i });
    else throw new LexError(i, c);
    i++;
  }

  tokens.push({ kind: 'EOF', text: '', position: input.length });
  return tokens;
}
