/**
 * Conf Rule Catalog
 * Barrel export for the built-in conf rules.
 */

import type { ConfNodeKind } from '../../parser/kinds.js';
import type { Rule } from '../types.js';
import { COMMENT_SPACING } from './comments.js';
import {
  INDENT_TABS,
  MAX_LINE_LENGTH,
  SPACING_OPERATOR,
  TRAILING_WHITESPACE,
} from './formatting.js';
import { DUPLICATE_DECLARATION, NAMING_SNAKE_CASE } from './naming.js';
import { ATTRIBUTE_ALLOWLIST, REDUNDANT_GROUPING } from './structure.js';

// ============================================================
// RE-EXPORT INDIVIDUAL RULES
// ============================================================

export { COMMENT_SPACING } from './comments.js';
export {
  INDENT_TABS,
  MAX_LINE_LENGTH,
  SPACING_OPERATOR,
  TRAILING_WHITESPACE,
} from './formatting.js';
export {
  DUPLICATE_DECLARATION,
  NAMING_SNAKE_CASE,
  isSnakeCase,
  toSnakeCase,
} from './naming.js';
export { ATTRIBUTE_ALLOWLIST, REDUNDANT_GROUPING } from './structure.js';

// ============================================================
// CATALOG
// ============================================================

/**
 * All built-in conf rules, in registration order.
 * At each node, subscribed rules run in this order.
 */
export const CONF_RULES: readonly Rule<ConfNodeKind>[] = Object.freeze([
  // Naming
  NAMING_SNAKE_CASE,
  DUPLICATE_DECLARATION,

  // Structure
  ATTRIBUTE_ALLOWLIST,
  REDUNDANT_GROUPING,

  // Formatting
  SPACING_OPERATOR,
  TRAILING_WHITESPACE,
  INDENT_TABS,
  MAX_LINE_LENGTH,

  // Comments
  COMMENT_SPACING,
]);

/** Built-in rules in a category */
export function getRulesByCategory(category: string): Rule<ConfNodeKind>[] {
  return CONF_RULES.filter((rule) => rule.category === category);
}
