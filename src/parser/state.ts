/**
 * Parser State
 * Token cursor and leaf construction shared by the parser extensions
 */

import { ParseError } from '../error-classes.js';
import type { SourceSpan } from '../source-location.js';
import { createNode } from '../syntax-tree.js';
import {
  TOKEN_TYPES,
  TRIVIA_TYPES,
  type Token,
  type TokenType,
} from '../lexer/index.js';
import type { ConfNode, ConfNodeKind } from './kinds.js';

export interface ParserState {
  readonly tokens: readonly Token[];
  /** Last token; always EOF */
  readonly eof: Token;
  pos: number;
}

/**
 * @throws TypeError if the token list does not end with EOF
 */
export function createParserState(tokens: readonly Token[]): ParserState {
  const eof = tokens[tokens.length - 1];
  if (eof === undefined || eof.type !== TOKEN_TYPES.EOF) {
    throw new TypeError('Token list must end with EOF');
  }
  return { tokens, eof, pos: 0 };
}

// ============================================================
// CURSOR
// ============================================================

export function current(state: ParserState): Token {
  return state.tokens[state.pos] ?? state.eof;
}

export function peek(state: ParserState, offset = 0): Token {
  return state.tokens[state.pos + offset] ?? state.eof;
}

export function check(state: ParserState, type: TokenType): boolean {
  return current(state).type === type;
}

export function isAtEnd(state: ParserState): boolean {
  return check(state, TOKEN_TYPES.EOF);
}

/** Consume the current token; the cursor never moves past EOF */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (token.type !== TOKEN_TYPES.EOF) {
    state.pos++;
  }
  return token;
}

/**
 * Consume a token of the given type.
 * @throws ParseError naming `expected` and the token found instead
 */
export function expect(
  state: ParserState,
  type: TokenType,
  expected: string
): Token {
  const token = current(state);
  if (token.type !== type) {
    throw new ParseError(
      'LINT-P004',
      { expected, found: describeToken(token) },
      token.span
    );
  }
  return advance(state);
}

/** Short description of a token for error messages */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.EOF:
      return 'end of input';
    case TOKEN_TYPES.NEWLINE:
      return 'newline';
    default:
      return `'${token.value}'`;
  }
}

// ============================================================
// NODE CONSTRUCTION
// ============================================================

const LEAF_KINDS: Readonly<Record<TokenType, ConfNodeKind>> = {
  WHITESPACE: 'Whitespace',
  NEWLINE: 'Newline',
  COMMENT: 'Comment',
  IDENTIFIER: 'Identifier',
  KEYWORD: 'Keyword',
  NUMBER: 'NumberLiteral',
  STRING: 'StringLiteral',
  OPERATOR: 'Operator',
  EQUALS: 'Punctuation',
  SEMICOLON: 'Punctuation',
  AT: 'Punctuation',
  LPAREN: 'Punctuation',
  RPAREN: 'Punctuation',
  COMMA: 'Punctuation',
  EOF: 'Punctuation',
};

/** Leaf node for a token; its text is the raw token text */
export function leaf(token: Token): ConfNode {
  return createNode(LEAF_KINDS[token.type], token.span, [], token.value);
}

/**
 * Node spanning its children.
 * @throws TypeError for an empty child list
 */
export function composite(
  kind: ConfNodeKind,
  children: readonly ConfNode[]
): ConfNode {
  const first = children[0];
  const last = children[children.length - 1];
  if (first === undefined || last === undefined) {
    throw new TypeError(`${kind} needs at least one child`);
  }
  const span: SourceSpan = { start: first.span.start, end: last.span.end };
  return createNode(kind, span, children);
}

/** Consume a run of trivia tokens as leaf nodes */
export function collectTrivia(state: ParserState): ConfNode[] {
  const nodes: ConfNode[] = [];
  while (TRIVIA_TYPES.has(current(state).type)) {
    nodes.push(leaf(advance(state)));
  }
  return nodes;
}
