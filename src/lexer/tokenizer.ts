/**
 * Tokenizer
 * Splits conf source into tokens, trivia included
 */

import { ParseError } from '../error-classes.js';
import {
  isBlank,
  isDigit,
  isNameChar,
  isNameStart,
  Scanner,
} from './scanner.js';
import {
  KEYWORDS,
  OPERATOR_PRECEDENCE,
  PUNCTUATION,
  TOKEN_TYPES,
  type Token,
  type TokenType,
} from './tokens.js';

function readNumber(scanner: Scanner): Token {
  const start = scanner.location();
  scanner.skipWhile(isDigit);
  if (scanner.peek() === '.' && isDigit(scanner.peek(1))) {
    scanner.step();
    scanner.skipWhile(isDigit);
  }
  return scanner.tokenFrom(TOKEN_TYPES.NUMBER, start);
}

function readString(scanner: Scanner): Token {
  const start = scanner.location();
  scanner.step(); // opening quote

  // Strings never span lines; an escape cannot swallow a line break
  while (!scanner.atEnd && scanner.lineBreakAt() === 0) {
    const ch = scanner.peek();
    scanner.step();
    if (ch === '"') {
      return scanner.tokenFrom(TOKEN_TYPES.STRING, start);
    }
    if (ch === '\\' && !scanner.atEnd && scanner.lineBreakAt() === 0) {
      scanner.step();
    }
  }

  throw new ParseError('LINT-P002', {}, { start, end: scanner.location() });
}

function readName(scanner: Scanner): Token {
  const start = scanner.location();
  scanner.skipWhile(isNameChar);
  const token = scanner.tokenFrom(TOKEN_TYPES.IDENTIFIER, start);
  return KEYWORDS.has(token.value)
    ? { ...token, type: TOKEN_TYPES.KEYWORD }
    : token;
}

function singleCharType(ch: string): TokenType | undefined {
  if (Object.hasOwn(OPERATOR_PRECEDENCE, ch)) return TOKEN_TYPES.OPERATOR;
  return Object.hasOwn(PUNCTUATION, ch) ? PUNCTUATION[ch] : undefined;
}

function readToken(scanner: Scanner): Token {
  const start = scanner.location();
  if (scanner.atEnd) {
    return scanner.tokenFrom(TOKEN_TYPES.EOF, start);
  }

  if (scanner.lineBreakAt() > 0) {
    scanner.step();
    return scanner.tokenFrom(TOKEN_TYPES.NEWLINE, start);
  }

  const ch = scanner.peek();

  if (isBlank(ch)) {
    scanner.skipWhile(isBlank);
    return scanner.tokenFrom(TOKEN_TYPES.WHITESPACE, start);
  }
  if (ch === '#') {
    scanner.skipWhile(() => true);
    return scanner.tokenFrom(TOKEN_TYPES.COMMENT, start);
  }
  if (ch === '"') return readString(scanner);
  if (isDigit(ch)) return readNumber(scanner);
  if (isNameStart(ch)) return readName(scanner);

  const type = singleCharType(ch);
  scanner.step();
  if (type !== undefined) {
    return scanner.tokenFrom(type, start);
  }

  throw new ParseError(
    'LINT-P003',
    { char: JSON.stringify(ch) },
    { start, end: scanner.location() }
  );
}

/**
 * Split source into tokens, trivia included.
 * The concatenated token values equal the source; the last token is EOF.
 *
 * @throws ParseError for unterminated strings and invalid characters
 */
export function tokenize(source: string): Token[] {
  const scanner = new Scanner(source);
  const tokens: Token[] = [];

  for (;;) {
    const token = readToken(scanner);
    tokens.push(token);
    if (token.type === TOKEN_TYPES.EOF) {
      return tokens;
    }
  }
}
