/**
 * Error taxonomy for the dice interpreter.
 *
 * Every failure raised by the lexer, parser or evaluator is a `DiceError`
 * carrying a stable `code` and the structured context (position, name,
 * offending value) a host needs to build its own message.
 *
 * @module dice/errors
 */

export type DiceErrorCode =
  | 'LEX_ERROR'
  | 'SYNTAX_ERROR'
  | 'UNKNOWN_FUNCTION'
  | 'ARITY_ERROR'
  | 'DICE_TERM_ERROR'
  | 'BUDGET_EXCEEDED'
  | 'DIVISION_BY_ZERO'
  | 'TYPE_ERROR'
  | 'NON_FINITE_RESULT'
  | 'RANDOM_SOURCE_ERROR';

export class DiceError extends Error {
  readonly code: DiceErrorCode;

  constructor(code: DiceErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class LexError extends DiceError {
  constructor(
    readonly position: number,
    readonly character: string,
  ) {
    super('LEX_ERROR', `Unexpected character '${character}' at position ${position}`);
  }
}

/** Token sequence did not match the grammar. */
export class ExpressionSyntaxError extends DiceError {
  constructor(
    readonly position: number,
    readonly expected: string,
    readonly found: string,
  ) {
    super('SYNTAX_ERROR', `Expected ${expected} at position ${position}, found ${found}`);
  }
}

export class UnknownFunctionError extends DiceError {
  constructor(
    readonly functionName: string,
    readonly position: number,
  ) {
    super('UNKNOWN_FUNCTION', `Unknown function '${functionName}' at position ${position}`);
  }
}

export class ArityError extends DiceError {
  constructor(
    readonly functionName: string,
    readonly expected: string,
    readonly got: number,
  ) {
    super(
      'ARITY_ERROR',
      `Function '${functionName}' expects ${expected} argument(s), got ${got}`,
    );
  }
}

export class DiceTermError extends DiceError {
  constructor(
    readonly reason: string,
    readonly term: string,
  ) {
    super('DICE_TERM_ERROR', `Invalid dice term '${term}': ${reason}`);
  }
}

export type BudgetLimit = 'maxTotalDice' | 'maxSides' | 'maxAstDepth' | 'maxExpansionCount';

export class BudgetExceededError extends DiceError {
  constructor(
    readonly limit: BudgetLimit,
    readonly requested: number,
    readonly allowed: number,
  ) {
    super('BUDGET_EXCEEDED', `Limit ${limit} exceeded: ${requested} > ${allowed}`);
  }
}

/** Nesting went past `maxAstDepth`, raised while parsing. */
export class DepthExceededError extends BudgetExceededError {
  constructor(requested: number, allowed: number) {
    super('maxAstDepth', requested, allowed);
  }
}

export class DivisionByZeroError extends DiceError {
  constructor(readonly operator: string) {
    super('DIVISION_BY_ZERO', `Division by zero in '${operator}'`);
  }
}

/** Bitwise operator applied to a non-integral operand. */
export class OperandTypeError extends DiceError {
  constructor(
    readonly operator: string,
    readonly operand: number,
  ) {
    super('TYPE_ERROR', `Operator '${operator}' cannot be applied to ${operand}`);
  }
}

export class NonFiniteResultError extends DiceError {
  constructor(readonly operation: string) {
    super('NON_FINITE_RESULT', `'${operation}' does not produce a finite real number`);
  }
}

export class RandomSourceError extends DiceError {
  constructor(
    readonly requested: readonly [number, number],
    readonly got: number,
  ) {
    super(
      'RANDOM_SOURCE_ERROR',
      `Random source returned ${got} for range [${requested[0]}, ${requested[1]}]`,
    );
  }
}

/**
 * Narrow an unknown thrown value to a `DiceError`.
 */
export function isDiceError(e: unknown): e is DiceError {
  return e instanceof DiceError;
}
