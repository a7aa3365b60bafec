/**
 * Node Kinds
 * Closed set of node kinds produced by the conf parser
 */

import type { SyntaxNode } from '../syntax-tree.js';

export const CONF_NODE_KINDS = [
  'Document',
  'Declaration',
  'Attribute',
  'ArgumentList',
  'BinaryExpr',
  'GroupedExpr',
  'Identifier',
  'Keyword',
  'NumberLiteral',
  'StringLiteral',
  'Operator',
  'Punctuation',
  'Comment',
  'Whitespace',
  'Newline',
] as const;

export type ConfNodeKind = (typeof CONF_NODE_KINDS)[number];

/** A node of a conf tree */
export type ConfNode = SyntaxNode<ConfNodeKind>;

/** Kinds that carry no syntax */
export const TRIVIA_KINDS: ReadonlySet<ConfNodeKind> = new Set([
  'Comment',
  'Whitespace',
  'Newline',
]);

/** Kinds that may appear as an operand of a binary expression */
export const EXPRESSION_KINDS: ReadonlySet<ConfNodeKind> = new Set([
  'BinaryExpr',
  'GroupedExpr',
  'Identifier',
  'NumberLiteral',
  'StringLiteral',
]);

export function isTriviaNode(node: { readonly kind: ConfNodeKind }): boolean {
  return TRIVIA_KINDS.has(node.kind);
}
