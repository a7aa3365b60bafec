/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging.
 *
 * - parser-document.ts: Document, declarations, attributes
 * - parser-expr.ts: Expressions, precedence climbing, argument lists
 *
 * The tree is lossless: every token, trivia included, becomes a leaf, so each
 * node's children tile its span and the Document spans the whole input.
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokenize(source));
 * const tree = parser.parse();
 * ```
 */

import type { Token } from '../lexer/index.js';
import type { ConfNode } from './kinds.js';
import { type ParserState, createParserState } from './state.js';

export class Parser {
  state: ParserState;

  constructor(tokens: readonly Token[]) {
    this.state = createParserState(tokens);
  }

  /**
   * Parse tokens into a Document tree.
   * @throws ParseError on the first syntax error
   */
  parse(): ConfNode {
    return this.parseDocument();
  }
}
