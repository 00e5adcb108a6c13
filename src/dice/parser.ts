import { recognizeDice } from './diceTerm';
import {
  ArityError,
  BudgetExceededError,
  DepthExceededError,
  ExpressionSyntaxError,
  UnknownFunctionError,
} from './errors';
import { tokenize } from './lexer';
import {
  acceptsArgCount,
  describeArity,
  getBinaryOperator,
  getFunction,
  isUnaryOperator,
  UNARY_PRECEDENCE,
} from './registry';
import type { AstNode, Budget, Token, TokenKind } from './types';

/**
 * Precedence-climbing parser.
 *
 * Builds an AST from the lexer's tokens using the operator table in the
 * registry. Work is bounded while parsing: the recursion depth and the
 * height of every node built are checked against `maxAstDepth`, and the
 * number of nodes against `maxExpansionCount`. Unknown function names and
 * wrong argument counts are rejected here, before anything is rolled.
 *
 * @module dice/parser
 */

function describeToken(t: Token): string {
  return t.kind === 'EOF' ? 'end of input' : `'${t.text}'`;
}

/**
 * Parse a token list into an AST.
 *
 * @param tokens - Output of `tokenize`, terminated by `EOF`.
 * @param budget - Depth and size limits.
 * @throws {ExpressionSyntaxError} On a token that does not fit the grammar.
 * @throws {UnknownFunctionError} On an identifier outside the registry.
 * @throws {ArityError} On a call with the wrong number of arguments.
 * @throws {DepthExceededError} When nesting passes `maxAstDepth`.
 * @throws {BudgetExceededError} When the tree grows past `maxExpansionCount`.
 * @throws {DiceTermError} On an invalid dice term.
 */
export function parse(tokens: readonly Token[], budget: Budget): AstNode {
  let pos = 0;
  let depth = 0;
  let nodeCount = 0;
  const heights = new Map<AstNode, number>();

  const peek = (): Token => tokens[Math.min(pos, tokens.length - 1)];
  const next = (): Token => {
    const t = peek();
    if (pos < tokens.length) pos++;
    return t;
  };
  const expect = (kind: TokenKind, expected: string): Token => {
    const t = next();
    if (t.kind !== kind) throw new ExpressionSyntaxError(t.position, expected, describeToken(t));
    return t;
  };

  const heightOf = (n: AstNode): number => heights.get(n) ?? 1;

  function build<T extends AstNode>(node: T, children: readonly AstNode[]): T {
    nodeCount++;
    if (nodeCount > budget.maxExpansionCount) {
      throw new BudgetExceededError('maxExpansionCount', nodeCount, budget.maxExpansionCount);
    }
    const height = 1 + children.reduce((h, c) => Math.max(h, heightOf(c)), 0);
    if (height > budget.maxAstDepth) throw new DepthExceededError(height, budget.maxAstDepth);
    heights.set(node, height);
    return node;
  }

  function parseBinary(minPrecedence: number): AstNode {
    let left = parseUnary();
    for (;;) {
      const t = peek();
      if (t.kind !== 'OPERATOR') break;
      const op = getBinaryOperator(t.text);
      if (!op || op.precedence < minPrecedence) break;
      next();
      const right = parseBinary(
        op.associativity === 'left' ? op.precedence + 1 : op.precedence,
      );
      left = build({ type: 'binary', operator: op.symbol, left, right }, [left, right]);
    }
    return left;
  }

  function parseUnary(): AstNode {
    depth++;
    if (depth > budget.maxAstDepth) throw new DepthExceededError(depth, budget.maxAstDepth);
    try {
      const t = peek();
      if (t.kind === 'OPERATOR' && isUnaryOperator(t.text)) {
        next();
        const operand = parseBinary(UNARY_PRECEDENCE);
        return build({ type: 'unary', operator: t.text, operand }, [operand]);
      }
      return parsePrimary();
    } finally {
      depth--;
    }
  }

  function parseCall(ident: Token): AstNode {
    const entry = getFunction(ident.text);
    if (!entry) throw new UnknownFunctionError(ident.text, ident.position);
    expect('LPAREN', `'(' after '${ident.text}'`);

    const args: AstNode[] = [];
    if (peek().kind === 'RPAREN') {
      next();
    } else {
      for (;;) {
        args.push(parseBinary(0));
        const t = next();
        if (t.kind === 'RPAREN') break;
        if (t.kind !== 'COMMA') {
          throw new ExpressionSyntaxError(t.position, "',' or ')'", describeToken(t));
        }
      }
    }

    if (!acceptsArgCount(entry.arity, args.length)) {
      throw new ArityError(entry.name, describeArity(entry.arity), args.length);
    }
    return build({ type: 'call', name: entry.name, args }, args);
  }

  function parsePrimary(): AstNode {
    const t = next();
    switch (t.kind) {
      case 'NUMBER':
        return build({ type: 'number', value: t.value }, []);
      case 'DICE':
        return build(recognizeDice(t.dice, t.text, budget), []);
      case 'IDENT':
        return parseCall(t);
      case 'LPAREN': {
        const inner = parseBinary(0);
        expect('RPAREN', "')'");
        return inner;
      }
      default:
        throw new ExpressionSyntaxError(t.position, 'an expression', describeToken(t));
    }
  }

  const ast = parseBinary(0);
  const tail = peek();
  if (tail.kind !== 'EOF') {
    throw new ExpressionSyntaxError(tail.position, 'an operator or end of input', describeToken(tail));
  }
  return ast;
}

/**
 * Tokenize and parse expression text in one step.
 */
export function parseExpression(text: string, budget: Budget): AstNode {
  return parse(tokenize(text), budget);
}
