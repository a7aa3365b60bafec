/**
 * Parser Extension: Document Structure
 * Documents, declarations and attributes
 */

import { Parser } from './parser.js';
import { ParseError } from '../error-classes.js';
import { createNode } from '../syntax-tree.js';
import { TOKEN_TYPES } from '../lexer/index.js';
import type { ConfNode } from './kinds.js';
import {
  advance,
  check,
  collectTrivia,
  composite,
  current,
  describeToken,
  expect,
  isAtEnd,
  leaf,
} from './state.js';

declare module './parser.js' {
  interface Parser {
    parseDocument(): ConfNode;
    parseDeclaration(): ConfNode;
    parseAttribute(): ConfNode;
  }
}

// ============================================================
// DOCUMENT
// ============================================================

/**
 * document = { trivia | declaration }
 * Trivia between declarations belongs to the Document.
 */
Parser.prototype.parseDocument = function (this: Parser): ConfNode {
  const start = current(this.state).span.start;
  const children: ConfNode[] = [];

  for (;;) {
    children.push(...collectTrivia(this.state));
    if (isAtEnd(this.state)) break;

    if (
      check(this.state, TOKEN_TYPES.AT) ||
      check(this.state, TOKEN_TYPES.KEYWORD)
    ) {
      children.push(this.parseDeclaration());
      continue;
    }

    const token = current(this.state);
    throw new ParseError(
      'LINT-P004',
      { expected: 'declaration', found: describeToken(token) },
      token.span
    );
  }

  return createNode(
    'Document',
    { start, end: this.state.eof.span.end },
    children
  );
};

// ============================================================
// DECLARATIONS
// ============================================================

/**
 * declaration = { attribute } "let" identifier "=" expression ";"
 */
Parser.prototype.parseDeclaration = function (this: Parser): ConfNode {
  const children: ConfNode[] = [];

  while (check(this.state, TOKEN_TYPES.AT)) {
    children.push(this.parseAttribute());
    children.push(...collectTrivia(this.state));
  }

  children.push(leaf(expect(this.state, TOKEN_TYPES.KEYWORD, "'let'")));
  children.push(...collectTrivia(this.state));
  children.push(
    leaf(expect(this.state, TOKEN_TYPES.IDENTIFIER, 'declaration name'))
  );
  children.push(...collectTrivia(this.state));
  children.push(leaf(expect(this.state, TOKEN_TYPES.EQUALS, "'='")));
  children.push(...collectTrivia(this.state));
  children.push(this.parseExpression());
  children.push(...collectTrivia(this.state));
  children.push(leaf(expect(this.state, TOKEN_TYPES.SEMICOLON, "';'")));

  return composite('Declaration', children);
};

/**
 * attribute = "@" identifier [ argument-list ]
 * No trivia is allowed inside the head `@name(`.
 */
Parser.prototype.parseAttribute = function (this: Parser): ConfNode {
  const children: ConfNode[] = [leaf(advance(this.state))];
  children.push(
    leaf(expect(this.state, TOKEN_TYPES.IDENTIFIER, 'attribute name'))
  );
  if (check(this.state, TOKEN_TYPES.LPAREN)) {
    children.push(this.parseArgumentList());
  }
  return composite('Attribute', children);
};
