/**
 * Parser Extension: Expression Parsing
 * Binary operators, primaries, grouping and argument lists
 */

import { Parser } from './parser.js';
import { ParseError } from '../error-classes.js';
import { OPERATOR_PRECEDENCE, TOKEN_TYPES } from '../lexer/index.js';
import type { ConfNode } from './kinds.js';
import {
  advance,
  check,
  collectTrivia,
  composite,
  current,
  describeToken,
  expect,
  leaf,
} from './state.js';

declare module './parser.js' {
  interface Parser {
    parseExpression(minPrecedence?: number): ConfNode;
    parsePrimary(): ConfNode;
    parseGrouped(): ConfNode;
    parseArgumentList(): ConfNode;
  }
}

function precedenceOf(value: string): number | undefined {
  return Object.hasOwn(OPERATOR_PRECEDENCE, value)
    ? OPERATOR_PRECEDENCE[value]
    : undefined;
}

// ============================================================
// BINARY EXPRESSIONS
// ============================================================

/**
 * Precedence climbing; operators are left-associative.
 *
 * Trivia after an operand is only kept inside the BinaryExpr when an operator
 * follows it. Otherwise the cursor is rewound so the enclosing node owns it.
 */
Parser.prototype.parseExpression = function (
  this: Parser,
  minPrecedence = 1
): ConfNode {
  let left = this.parsePrimary();

  for (;;) {
    const mark = this.state.pos;
    const before = collectTrivia(this.state);
    const token = current(this.state);
    const precedence =
      token.type === TOKEN_TYPES.OPERATOR
        ? precedenceOf(token.value)
        : undefined;

    if (precedence === undefined || precedence < minPrecedence) {
      this.state.pos = mark;
      return left;
    }

    const operator = leaf(advance(this.state));
    const after = collectTrivia(this.state);
    const right = this.parseExpression(precedence + 1);
    left = composite('BinaryExpr', [
      left,
      ...before,
      operator,
      ...after,
      right,
    ]);
  }
};

// ============================================================
// PRIMARIES
// ============================================================

Parser.prototype.parsePrimary = function (this: Parser): ConfNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.NUMBER:
    case TOKEN_TYPES.STRING:
    case TOKEN_TYPES.IDENTIFIER:
      return leaf(advance(this.state));
    case TOKEN_TYPES.LPAREN:
      return this.parseGrouped();
    default:
      throw new ParseError(
        'LINT-P004',
        { expected: 'expression', found: describeToken(token) },
        token.span
      );
  }
};

/** grouped = "(" expression ")" */
Parser.prototype.parseGrouped = function (this: Parser): ConfNode {
  const children: ConfNode[] = [leaf(advance(this.state))];
  children.push(...collectTrivia(this.state));
  children.push(this.parseExpression());
  children.push(...collectTrivia(this.state));
  children.push(leaf(expect(this.state, TOKEN_TYPES.RPAREN, "')'")));
  return composite('GroupedExpr', children);
};

/** argument-list = "(" [ expression { "," expression } [ "," ] ] ")" */
Parser.prototype.parseArgumentList = function (this: Parser): ConfNode {
  const children: ConfNode[] = [leaf(advance(this.state))];
  children.push(...collectTrivia(this.state));

  while (!check(this.state, TOKEN_TYPES.RPAREN)) {
    children.push(this.parseExpression());
    children.push(...collectTrivia(this.state));
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    children.push(leaf(advance(this.state)));
    children.push(...collectTrivia(this.state));
  }

  children.push(leaf(expect(this.state, TOKEN_TYPES.RPAREN, "')'")));
  return composite('ArgumentList', children);
};
