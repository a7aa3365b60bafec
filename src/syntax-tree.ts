/**
 * Syntax Tree
 * Immutable, position-annotated node tree produced by a language parser.
 */

import type { SourceSpan } from './source-location.js';
import type { ParseError } from './error-classes.js';

// ============================================================
// NODES
// ============================================================

/**
 * A structural unit of a parsed file.
 *
 * `K` is the language's closed set of node kinds. Children are owned by their
 * parent and ordered by start offset. Nodes carry no parent pointer; upward
 * lookups are built per traversal (see check/visitor.ts).
 */
export interface SyntaxNode<K extends string = string> {
  readonly kind: K;
  readonly span: SourceSpan;
  readonly children: readonly SyntaxNode<K>[];
  /** Raw token text for leaf nodes */
  readonly text?: string | undefined;
}

/**
 * Create a frozen node.
 * The children array is copied, so later changes to the caller's array are not seen.
 */
export function createNode<K extends string>(
  kind: K,
  span: SourceSpan,
  children: readonly SyntaxNode<K>[] = [],
  text?: string
): SyntaxNode<K> {
  const node: SyntaxNode<K> = {
    kind,
    span: Object.freeze({
      start: Object.freeze({ ...span.start }),
      end: Object.freeze({ ...span.end }),
    }),
    children: Object.freeze([...children]),
    ...(text !== undefined ? { text } : {}),
  };
  return Object.freeze(node);
}

/** Source text covered by a node */
export function nodeText(node: SyntaxNode, source: string): string {
  return source.slice(node.span.start.offset, node.span.end.offset);
}

/** First direct child of the given kind, or null */
export function findChild<K extends string>(
  node: SyntaxNode<K>,
  kind: K
): SyntaxNode<K> | null {
  return node.children.find((child) => child.kind === kind) ?? null;
}

// ============================================================
// PARSER CONTRACT
// ============================================================

/** Outcome of parsing one source text */
export type ParseResult<K extends string = string> =
  | { readonly ok: true; readonly tree: SyntaxNode<K> }
  | { readonly ok: false; readonly error: ParseError };

/**
 * Parser capability consumed by the linter.
 *
 * A successful tree must satisfy the shape contract checked by
 * checkTreeShape(). Failures are returned, not thrown.
 */
export interface SourceParser<K extends string = string> {
  parse(source: string): ParseResult<K>;
}

// ============================================================
// SHAPE CHECK
// ============================================================

/** Kind of tree shape violation */
export type TreeShapeIssueType =
  | 'inverted-span'
  | 'child-outside-parent'
  | 'sibling-overlap'
  | 'gap'
  | 'root-coverage';

/** A single violation of the tree shape contract */
export interface TreeShapeIssue<K extends string = string> {
  readonly type: TreeShapeIssueType;
  readonly node: SyntaxNode<K>;
  readonly message: string;
}

/**
 * Verify the parser contract on a tree.
 *
 * Checks that no span is inverted, that every child lies within its parent,
 * and that siblings are ordered and disjoint. The children of a node must
 * cover it with no gaps. When `sourceLength` is given the root must also cover
 * `[0, sourceLength)`.
 *
 * @returns All violations found (empty for a well-formed tree)
 */
export function checkTreeShape<K extends string>(
  root: SyntaxNode<K>,
  sourceLength?: number
): TreeShapeIssue<K>[] {
  const issues: TreeShapeIssue<K>[] = [];

  if (
    sourceLength !== undefined &&
    (root.span.start.offset !== 0 || root.span.end.offset !== sourceLength)
  ) {
    issues.push({
      type: 'root-coverage',
      node: root,
      message: `Root spans ${root.span.start.offset}..${root.span.end.offset}, expected 0..${sourceLength}`,
    });
  }

  const stack: SyntaxNode<K>[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;

    const { start, end } = node.span;
    if (start.offset > end.offset) {
      issues.push({
        type: 'inverted-span',
        node,
        message: `${node.kind} starts at ${start.offset} after its end ${end.offset}`,
      });
    }

    let previousEnd = start.offset;
    for (const child of node.children) {
      if (
        child.span.start.offset < start.offset ||
        child.span.end.offset > end.offset
      ) {
        issues.push({
          type: 'child-outside-parent',
          node: child,
          message: `${child.kind} at ${child.span.start.offset}..${child.span.end.offset} lies outside ${node.kind} at ${start.offset}..${end.offset}`,
        });
      }
      if (child.span.start.offset < previousEnd) {
        issues.push({
          type: 'sibling-overlap',
          node: child,
          message: `${child.kind} at ${child.span.start.offset} overlaps the previous sibling ending at ${previousEnd}`,
        });
      } else if (child.span.start.offset > previousEnd) {
        issues.push({
          type: 'gap',
          node,
          message: `${node.kind} has no child covering ${previousEnd}..${child.span.start.offset}`,
        });
      }
      previousEnd = Math.max(previousEnd, child.span.end.offset);
      stack.push(child);
    }

    if (node.children.length > 0 && previousEnd < end.offset) {
      issues.push({
        type: 'gap',
        node,
        message: `${node.kind} has no child covering ${previousEnd}..${end.offset}`,
      });
    }
  }

  return issues;
}
