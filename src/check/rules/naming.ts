/**
 * Naming Convention Rules
 * Declaration names and their uniqueness.
 */

import type { SourceLocation } from '../../source-location.js';
import type { ConfNode, ConfNodeKind } from '../../parser/kinds.js';
import { ScratchSlot } from '../scratch.js';
import type { Rule, RuleContext, RuleReport } from '../types.js';
import { declarationName } from './helpers.js';

// ============================================================
// NAMING VALIDATION
// ============================================================

/**
 * Check if a name follows snake_case convention.
 * Valid: user_name, max_retries, x, _private
 * Invalid: userName, MaxRetries, user__name, name_
 */
export function isSnakeCase(name: string): boolean {
  if (!name) return false;

  // Lowercase letters, digits and underscores; starts with a letter or underscore
  if (!/^[a-z_][a-z0-9_]*$/.test(name)) return false;

  if (name.includes('__')) return false;

  // Trailing underscore, unless the whole name is `_`
  if (name.length > 1 && name.endsWith('_')) return false;

  return true;
}

/**
 * Convert a name to snake_case.
 * Handles camelCase, PascalCase and runs of capitals.
 */
export function toSnakeCase(name: string): string {
  return (
    name
      // Consecutive uppercase (HTTPServer -> HTTP_Server)
      .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
      // camelCase -> camel_Case
      .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
      .toLowerCase()
      .replace(/_+/g, '_')
      .replace(/^_+|_+$/g, '')
  );
}

// ============================================================
// NAMING_SNAKE_CASE RULE
// ============================================================

/**
 * Declaration names use snake_case.
 * Not fixable: renaming a declaration would break its references.
 */
export const NAMING_SNAKE_CASE: Rule<ConfNodeKind> = {
  code: 'NAMING_SNAKE_CASE',
  version: '1.0.0',
  description: 'Declaration names use snake_case',
  category: 'naming',
  severity: 'warning',
  enabled: true,
  fixable: false,
  nodeTypes: ['Declaration'],

  evaluate(node: ConfNode): RuleReport[] {
    const name = declarationName(node);
    const text = name?.text;
    if (name === null || text === undefined || isSnakeCase(text)) {
      return [];
    }

    return [
      {
        span: name.span,
        message: `Declaration '${text}' should use snake_case (e.g., '${toSnakeCase(text)}')`,
      },
    ];
  },
};

// ============================================================
// DUPLICATE_DECLARATION RULE
// ============================================================

/** First declaration site of each name in the current file */
const DECLARED = new ScratchSlot(() => new Map<string, SourceLocation>());

/**
 * A name may be declared once per file.
 * Every later declaration is reported against the first one.
 */
export const DUPLICATE_DECLARATION: Rule<ConfNodeKind> = {
  code: 'DUPLICATE_DECLARATION',
  version: '1.0.0',
  description: 'Each name is declared at most once per file',
  category: 'naming',
  severity: 'error',
  enabled: true,
  fixable: false,
  nodeTypes: ['Declaration'],

  evaluate(node: ConfNode, context: RuleContext<ConfNodeKind>): RuleReport[] {
    const name = declarationName(node);
    const text = name?.text;
    if (name === null || text === undefined) {
      return [];
    }

    const declared = context.scratch(DECLARED);
    const first = declared.get(text);
    if (first === undefined) {
      declared.set(text, name.span.start);
      return [];
    }

    return [
      {
        span: name.span,
        message: `'${text}' is already declared at line ${first.line}`,
      },
    ];
  },
};
