/**
 * Formatting Rules
 * Whitespace and layout conventions. Fixes here only touch trivia.
 */

import { LineIndex } from '../../source-location.js';
import type { ConfNode, ConfNodeKind } from '../../parser/kinds.js';
import type { Rule, RuleContext, RuleParams, RuleReport } from '../types.js';
import { checkIntParam, intParam, surroundingTrivia } from './helpers.js';

// ============================================================
// SPACING_OPERATOR RULE
// ============================================================

/** The operator child of a BinaryExpr, or the `=` of a Declaration */
function operatorIndex(node: ConfNode): number {
  if (node.kind === 'BinaryExpr') {
    return node.children.findIndex((child) => child.kind === 'Operator');
  }
  return node.children.findIndex(
    (child) => child.kind === 'Punctuation' && child.text === '='
  );
}

function isSingleSpace(run: readonly ConfNode[]): boolean {
  const only = run[0];
  return run.length === 1 && only?.kind === 'Whitespace' && only.text === ' ';
}

/**
 * Binary operators and the `=` of a declaration have exactly one space on
 * each side.
 *
 * Operators next to a line break or a comment are left alone, since the
 * surrounding layout is deliberate there.
 */
export const SPACING_OPERATOR: Rule<ConfNodeKind> = {
  code: 'SPACING_OPERATOR',
  version: '1.0.0',
  description: 'Operators have exactly one space on each side',
  category: 'formatting',
  severity: 'info',
  enabled: true,
  fixable: true,
  nodeTypes: ['BinaryExpr', 'Declaration'],

  evaluate(node: ConfNode, context: RuleContext<ConfNodeKind>): RuleReport[] {
    const index = operatorIndex(node);
    const operator = node.children[index];
    const around = surroundingTrivia(node.children, index);
    if (operator === undefined || around === null) {
      return [];
    }

    const { previous, next, before, after } = around;
    if ([...before, ...after].some((child) => child.kind !== 'Whitespace')) {
      return [];
    }
    if (isSingleSpace(before) && isSingleSpace(after)) {
      return [];
    }

    const op = operator.text ?? '';
    return [
      {
        span: operator.span,
        message: `Operator '${op}' should have exactly one space on each side`,
        fix: {
          description: `Put one space around '${op}'`,
          range: context.spanAt(
            previous.span.end.offset,
            next.span.start.offset
          ),
          replacement: ` ${op} `,
        },
      },
    ];
  },
};

// ============================================================
// TRAILING_WHITESPACE RULE
// ============================================================

/**
 * No whitespace at the end of a line or of the file.
 */
export const TRAILING_WHITESPACE: Rule<ConfNodeKind> = {
  code: 'TRAILING_WHITESPACE',
  version: '1.0.0',
  description: 'Lines do not end with whitespace',
  category: 'formatting',
  severity: 'warning',
  enabled: true,
  fixable: true,
  nodeTypes: ['Whitespace'],

  evaluate(node: ConfNode, context: RuleContext<ConfNodeKind>): RuleReport[] {
    const siblings = context.siblings(node);
    const next = siblings[context.siblingIndex(node) + 1];
    const atEndOfFile =
      next === undefined && context.parent(node) === context.tree;

    if (next?.kind !== 'Newline' && !atEndOfFile) {
      return [];
    }

    return [
      {
        span: node.span,
        message: 'Trailing whitespace',
        fix: {
          description: 'Remove trailing whitespace',
          range: node.span,
          replacement: '',
        },
      },
    ];
  },
};

// ============================================================
// INDENT_TABS RULE
// ============================================================

const DEFAULT_TAB_WIDTH = 2;

/**
 * Indentation uses spaces. The fix expands each tab to `tabWidth` spaces.
 *
 * Whitespace-only lines are left to TRAILING_WHITESPACE.
 */
export const INDENT_TABS: Rule<ConfNodeKind> = {
  code: 'INDENT_TABS',
  version: '1.0.0',
  description: 'Indentation uses spaces, not tabs',
  category: 'formatting',
  severity: 'warning',
  enabled: true,
  fixable: true,
  nodeTypes: ['Whitespace'],
  defaults: { tabWidth: DEFAULT_TAB_WIDTH },

  validateParams(params: RuleParams): string[] {
    const problem = checkIntParam(params, 'tabWidth', 1, 16);
    return problem === null ? [] : [problem];
  },

  evaluate(node: ConfNode, context: RuleContext<ConfNodeKind>): RuleReport[] {
    const text = node.text ?? '';
    if (!text.includes('\t')) {
      return [];
    }

    const index = context.siblingIndex(node);
    const siblings = context.siblings(node);
    const previous = siblings[index - 1];
    const next = siblings[index + 1];
    const atLineStart =
      previous?.kind === 'Newline' ||
      (index === 0 && context.parent(node) === context.tree);

    if (!atLineStart || next === undefined || next.kind === 'Newline') {
      return [];
    }

    const tabWidth = intParam(context.params, 'tabWidth', DEFAULT_TAB_WIDTH);
    return [
      {
        span: node.span,
        message: 'Indentation uses tabs',
        fix: {
          description: `Replace tabs with ${tabWidth} spaces`,
          range: node.span,
          replacement: text.replaceAll('\t', ' '.repeat(tabWidth)),
        },
      },
    ];
  },
};

// ============================================================
// MAX_LINE_LENGTH RULE
// ============================================================

const DEFAULT_MAX_LINE_LENGTH = 100;

/**
 * Lines are at most `max` characters long, line terminator excluded.
 * The reported span covers the part of the line past the limit.
 */
export const MAX_LINE_LENGTH: Rule<ConfNodeKind> = {
  code: 'MAX_LINE_LENGTH',
  version: '1.0.0',
  description: 'Lines stay within the configured length',
  category: 'formatting',
  severity: 'warning',
  enabled: true,
  fixable: false,
  nodeTypes: ['Document'],
  defaults: { max: DEFAULT_MAX_LINE_LENGTH },

  validateParams(params: RuleParams): string[] {
    const problem = checkIntParam(params, 'max', 1);
    return problem === null ? [] : [problem];
  },

  evaluate(_node: ConfNode, context: RuleContext<ConfNodeKind>): RuleReport[] {
    const max = intParam(context.params, 'max', DEFAULT_MAX_LINE_LENGTH);
    const lines = new LineIndex(context.source);
    const reports: RuleReport[] = [];

    for (let line = 1; line <= lines.lineCount; line++) {
      const length = lines.lineText(line).length;
      if (length <= max) continue;

      const start = lines.lineStart(line);
      reports.push({
        span: context.spanAt(start + max, start + length),
        message: `Line exceeds ${max} characters (${length})`,
      });
    }

    return reports;
  },
};
