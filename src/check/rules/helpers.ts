/**
 * Shared Helper Functions
 * Common utilities used across conf rules.
 */

import { findChild } from '../../syntax-tree.js';
import {
  isTriviaNode,
  type ConfNode,
  type ConfNodeKind,
} from '../../parser/kinds.js';
import type { RuleParams } from '../types.js';
import { visitTree } from '../visitor.js';

/** Declared name of a Declaration node, or null if it has none */
export function declarationName(node: ConfNode): ConfNode | null {
  return findChild(node, 'Identifier');
}

/** Whether any node in the subtree has the given kind */
export function containsKind(node: ConfNode, kind: ConfNodeKind): boolean {
  let found = false;
  visitTree(node, (child) => {
    if (child.kind === kind) found = true;
  });
  return found;
}

/**
 * Trivia on each side of the child at `index`, up to the nearest
 * non-trivia siblings. Returns null when either neighbor is missing.
 */
export function surroundingTrivia(
  children: readonly ConfNode[],
  index: number
): {
  previous: ConfNode;
  next: ConfNode;
  before: ConfNode[];
  after: ConfNode[];
} | null {
  let p = index - 1;
  while (p >= 0 && isTrivia(children[p])) p--;
  let n = index + 1;
  while (n < children.length && isTrivia(children[n])) n++;

  const previous = children[p];
  const next = children[n];
  if (previous === undefined || next === undefined) {
    return null;
  }
  return {
    previous,
    next,
    before: children.slice(p + 1, index),
    after: children.slice(index + 1, n),
  };
}

function isTrivia(node: ConfNode | undefined): boolean {
  return node !== undefined && isTriviaNode(node);
}

// ============================================================
// PARAMETERS
// ============================================================

/** Integer parameter, or the fallback when unset or mistyped */
export function intParam(
  params: RuleParams,
  key: string,
  fallback: number
): number {
  const value = params[key];
  return typeof value === 'number' && Number.isInteger(value)
    ? value
    : fallback;
}

/** Problem with an integer parameter outside `[min, max]`, or null */
export function checkIntParam(
  params: RuleParams,
  key: string,
  min: number,
  max = Number.MAX_SAFE_INTEGER
): string | null {
  const value = params[key];
  if (
    typeof value !== 'number' ||
    !Number.isInteger(value) ||
    value < min ||
    value > max
  ) {
    const range =
      max === Number.MAX_SAFE_INTEGER
        ? `>= ${min}`
        : `between ${min} and ${max}`;
    return `${key} must be an integer ${range}`;
  }
  return null;
}

/** String list parameter; non-string entries are dropped */
export function stringListParam(params: RuleParams, key: string): string[] {
  const value = params[key];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}
