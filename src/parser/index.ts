/**
 * Conf Parser
 * Main entry point and re-exports
 */

import { ParseError } from '../error-classes.js';
import { tokenize } from '../lexer/index.js';
import type { ParseResult, SourceParser } from '../syntax-tree.js';
import type { ConfNode, ConfNodeKind } from './kinds.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-document.js';
import './parser-expr.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Parse conf source into a lossless tree.
 * Throws ParseError on the first lexical or syntax error.
 */
export function parse(source: string): ConfNode {
  return new Parser(tokenize(source)).parse();
}

/**
 * Parse conf source, returning syntax errors instead of throwing.
 *
 * @example
 * ```typescript
 * const result = parseConf('let retries = 3;\n');
 * if (!result.ok) {
 *   console.log(result.error.message);
 * }
 * ```
 */
export function parseConf(source: string): ParseResult<ConfNodeKind> {
  try {
    return { ok: true, tree: parse(source) };
  } catch (err) {
    if (err instanceof ParseError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

/** Parser capability for createLinter() */
export const confParser: SourceParser<ConfNodeKind> = Object.freeze({
  parse: parseConf,
});

// ============================================================
// RE-EXPORTS
// ============================================================

export {
  CONF_NODE_KINDS,
  EXPRESSION_KINDS,
  TRIVIA_KINDS,
  isTriviaNode,
  type ConfNode,
  type ConfNodeKind,
} from './kinds.js';
export { Parser } from './parser.js';
