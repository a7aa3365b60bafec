/**
 * Structure Rules
 * Expression shape and declaration attributes.
 */

import { spanText } from '../../source-location.js';
import { findChild } from '../../syntax-tree.js';
import {
  EXPRESSION_KINDS,
  type ConfNode,
  type ConfNodeKind,
} from '../../parser/kinds.js';
import type { Rule, RuleContext, RuleParams, RuleReport } from '../types.js';
import { containsKind, declarationName, stringListParam } from './helpers.js';

// ============================================================
// REDUNDANT_GROUPING RULE
// ============================================================

/** Parents in which a grouped expression never changes precedence */
const UNGROUPED_CONTEXTS: ReadonlySet<ConfNodeKind> = new Set([
  'Declaration',
  'ArgumentList',
]);

/**
 * Parentheses around a whole declaration value or a whole argument are
 * redundant. The fix unwraps one level; nested groups take one pass each.
 * No fix is offered when the group contains a comment.
 */
export const REDUNDANT_GROUPING: Rule<ConfNodeKind> = {
  code: 'REDUNDANT_GROUPING',
  version: '1.0.0',
  description: 'No parentheses around a complete value',
  category: 'structure',
  severity: 'info',
  enabled: true,
  fixable: true,
  nodeTypes: ['GroupedExpr'],

  evaluate(node: ConfNode, context: RuleContext<ConfNodeKind>): RuleReport[] {
    const parent = context.parent(node);
    if (parent === null || !UNGROUPED_CONTEXTS.has(parent.kind)) {
      return [];
    }

    const inner = node.children.find((child) =>
      EXPRESSION_KINDS.has(child.kind)
    );
    if (inner === undefined) {
      return [];
    }

    return [
      {
        span: node.span,
        message: 'Redundant parentheses around expression',
        fix: containsKind(node, 'Comment')
          ? null
          : {
              description: 'Remove parentheses',
              range: node.span,
              replacement: spanText(inner.span, context.source),
            },
      },
    ];
  },
};

// ============================================================
// ATTRIBUTE_ALLOWLIST RULE
// ============================================================

/**
 * Only attributes named in `allowed` may be used. An empty list allows any.
 * Disabled by default.
 */
export const ATTRIBUTE_ALLOWLIST: Rule<ConfNodeKind> = {
  code: 'ATTRIBUTE_ALLOWLIST',
  version: '1.0.0',
  description: 'Attributes come from a configured list',
  category: 'structure',
  severity: 'error',
  enabled: false,
  fixable: false,
  nodeTypes: ['Attribute'],
  defaults: { allowed: [] },

  validateParams(params: RuleParams): string[] {
    const allowed = params['allowed'];
    if (
      !Array.isArray(allowed) ||
      !allowed.every((item) => typeof item === 'string')
    ) {
      return ['allowed must be a list of attribute names'];
    }
    return [];
  },

  evaluate(node: ConfNode, context: RuleContext<ConfNodeKind>): RuleReport[] {
    const allowed = stringListParam(context.params, 'allowed');
    const name = findChild(node, 'Identifier')?.text;
    if (allowed.length === 0 || name === undefined || allowed.includes(name)) {
      return [];
    }

    const declaration = context
      .ancestors(node)
      .find((ancestor) => ancestor.kind === 'Declaration');
    const target =
      declaration === undefined
        ? undefined
        : declarationName(declaration)?.text;

    return [
      {
        span: node.span,
        message:
          target === undefined
            ? `Unknown attribute '@${name}'`
            : `Unknown attribute '@${name}' on '${target}'`,
      },
    ];
  },
};
