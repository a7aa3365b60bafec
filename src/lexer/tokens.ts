/**
 * Token Types
 * Tokens of the conf language. Trivia (whitespace, newlines, comments) are
 * real tokens so the parser can keep every character in the tree.
 */

import type { SourceSpan } from '../source-location.js';

export const TOKEN_TYPES = {
  WHITESPACE: 'WHITESPACE',
  NEWLINE: 'NEWLINE',
  COMMENT: 'COMMENT',
  IDENTIFIER: 'IDENTIFIER',
  KEYWORD: 'KEYWORD',
  NUMBER: 'NUMBER',
  STRING: 'STRING',
  OPERATOR: 'OPERATOR',
  EQUALS: 'EQUALS',
  SEMICOLON: 'SEMICOLON',
  AT: 'AT',
  LPAREN: 'LPAREN',
  RPAREN: 'RPAREN',
  COMMA: 'COMMA',
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  /** Raw source text of the token */
  readonly value: string;
  readonly span: SourceSpan;
}

/** Reserved words */
export const KEYWORDS: ReadonlySet<string> = new Set(['let']);

/** Binary operators and their precedence (higher binds tighter) */
export const OPERATOR_PRECEDENCE: Readonly<Record<string, number>> = {
  '+': 1,
  '-': 1,
  '*': 2,
  '/': 2,
};

/** Punctuation characters and their token types */
export const PUNCTUATION: Readonly<Record<string, TokenType>> = {
  '=': TOKEN_TYPES.EQUALS,
  ';': TOKEN_TYPES.SEMICOLON,
  '@': TOKEN_TYPES.AT,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  ',': TOKEN_TYPES.COMMA,
};

/** Token types that carry no syntax */
export const TRIVIA_TYPES: ReadonlySet<TokenType> = new Set([
  TOKEN_TYPES.WHITESPACE,
  TOKEN_TYPES.NEWLINE,
  TOKEN_TYPES.COMMENT,
]);
