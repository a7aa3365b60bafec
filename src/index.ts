/**
 * lintel
 * Rule-evaluation engine, conf reference language and built-in rules
 */

// ============================================================
// STRUCTURAL MODEL
// ============================================================
export {
  LineIndex,
  formatLocation,
  isSpanInRange,
  spanContains,
  spanText,
  type SourceLocation,
  type SourceSpan,
} from './source-location.js';
export {
  checkTreeShape,
  createNode,
  findChild,
  nodeText,
  type ParseResult,
  type SourceParser,
  type SyntaxNode,
  type TreeShapeIssue,
  type TreeShapeIssueType,
} from './syntax-tree.js';

// ============================================================
// ENGINE
// ============================================================
export * from './check/index.js';

// ============================================================
// CONF LANGUAGE
// ============================================================
export {
  tokenize,
  TOKEN_TYPES,
  type Token,
  type TokenType,
} from './lexer/index.js';
export {
  parse,
  parseConf,
  confParser,
  CONF_NODE_KINDS,
  type ConfNode,
  type ConfNodeKind,
} from './parser/index.js';
export {
  CONF_RULES,
  getRulesByCategory,
  NAMING_SNAKE_CASE,
  DUPLICATE_DECLARATION,
  SPACING_OPERATOR,
  TRAILING_WHITESPACE,
  INDENT_TABS,
  COMMENT_SPACING,
  REDUNDANT_GROUPING,
  MAX_LINE_LENGTH,
  ATTRIBUTE_ALLOWLIST,
} from './check/rules/index.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';
export {
  LintError,
  ParseError,
  DuplicateRuleError,
  ConfigError,
  FixConflictError,
  RuleExecutionError,
  type LintErrorData,
} from './error-classes.js';
