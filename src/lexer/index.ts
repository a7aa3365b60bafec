/**
 * Lexer
 * Public entry points for conf tokenization
 */

export { tokenize } from './tokenizer.js';
export {
  TOKEN_TYPES,
  KEYWORDS,
  OPERATOR_PRECEDENCE,
  TRIVIA_TYPES,
  type Token,
  type TokenType,
} from './tokens.js';
