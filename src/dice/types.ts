/**
 * Shared data model for the dice expression interpreter.
 *
 * Tokens come out of the lexer, AST nodes out of the parser, and roll
 * events / results out of the evaluator. Everything here is plain data:
 * behaviour lives in the modules that produce or consume it.
 *
 * @module dice/types
 */

/** Kinds of dice term the lexer can capture. */
export type DiceKind = 'standard' | 'ranged' | 'pool';

/**
 * Raw captures of a dice term as written in the source. Fields are `null`
 * when the surface syntax omitted them (e.g. the count in `d20`).
 */
export interface DiceCapture {
  kind: DiceKind;
  count: number | null;
  sides: number | null;
  low: number | null;
  high: number | null;
  threshold: number | null;
}

export type Token =
  | { readonly kind: 'NUMBER'; readonly text: string; readonly position: number; readonly value: number }
  | { readonly kind: 'IDENT'; readonly text: string; readonly position: number }
  | {
      readonly kind: 'DICE';
      readonly text: string;
      readonly position: number;
      readonly dice: Readonly<DiceCapture>;
    }
  | { readonly kind: 'OPERATOR'; readonly text: string; readonly position: number }
  | { readonly kind: 'LPAREN'; readonly text: string; readonly position: number }
  | { readonly kind: 'RPAREN'; readonly text: string; readonly position: number }
  | { readonly kind: 'COMMA'; readonly text: string; readonly position: number }
  | { readonly kind: 'EOF'; readonly text: string; readonly position: number };

export type TokenKind = Token['kind'];

export type UnaryOperator = '-' | '+' | '~';

export type BinaryOperator =
  | '+'
  | '-'
  | '*'
  | '/'
  | '//'
  | '%'
  | '**'
  | '&'
  | '|'
  | '^'
  | '<<'
  | '>>'
  | '<'
  | '<='
  | '>'
  | '>='
  | '=='
  | '!='
  | 'and'
  | 'or';

export interface NumberLiteral {
  readonly type: 'number';
  readonly value: number;
}

/**
 * A fully recognized dice term. Standard dice are stored as the range
 * `[1, sides]` so the evaluator draws every kind the same way; pool dice
 * always span `[1, 10]` and carry their success threshold.
 */
export interface DiceRoll {
  readonly type: 'dice';
  readonly kind: DiceKind;
  readonly count: number;
  readonly low: number;
  readonly high: number;
  readonly threshold: number | null;
  /** Canonical label used in roll events, e.g. `3d6`, `2d{-5,-1}`, `4wod8`. */
  readonly label: string;
}

export interface FunctionCall {
  readonly type: 'call';
  readonly name: string;
  readonly args: readonly AstNode[];
}

export interface BinaryOp {
  readonly type: 'binary';
  readonly operator: BinaryOperator;
  readonly left: AstNode;
  readonly right: AstNode;
}

export interface UnaryOp {
  readonly type: 'unary';
  readonly operator: UnaryOperator;
  readonly operand: AstNode;
}

export type AstNode = NumberLiteral | DiceRoll | FunctionCall | BinaryOp | UnaryOp;

/**
 * Evidence of one dice term's evaluation.
 *
 * `kept` and `dropped` are sub-multisets of `raw`. Pool rolls also list
 * their natural ones in `penalized`; those count against the subtotal.
 */
export interface RollEvent {
  readonly label: string;
  readonly kind: DiceKind;
  readonly low: number;
  readonly high: number;
  readonly raw: readonly number[];
  readonly kept: readonly number[];
  readonly dropped: readonly number[];
  readonly penalized: readonly number[];
  readonly subtotal: number;
}

export interface EvalResult {
  readonly value: number;
  readonly rolls: readonly RollEvent[];
  readonly warnings: readonly string[];
}

/** Request-scoped work limits. */
export interface Budget {
  /** Dice drawn across the whole expression. */
  maxTotalDice: number;
  /** Faces on one die, or magnitude of a range endpoint. */
  maxSides: number;
  /** Parser recursion depth and AST height. */
  maxAstDepth: number;
  /** AST nodes in one expression. */
  maxExpansionCount: number;
  /** Pool threshold used when `XwodY` omits `Y`. */
  defaultPoolThreshold: number;
}

/**
 * Injected entropy. `nextInt` returns a uniformly distributed integer in
 * the inclusive range `[min, max]`.
 */
export interface RandomSource {
  nextInt(min: number, max: number): number;
}
