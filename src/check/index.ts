/**
 * Check Module - Rule-Evaluation Engine
 * Public API for the linter core.
 */

// ============================================================
// PUBLIC TYPES
// ============================================================
export type {
  Rule,
  RuleContext,
  RuleReport,
  RuleParams,
  RuleSettings,
  RuleState,
  Severity,
  RunStatus,
  Finding,
  Fix,
  Edit,
  Diagnostic,
  DiagnosticRecord,
  DiagnosticSortKey,
  LintConfig,
  LintCallbacks,
  ParseErrorEvent,
  RuleErrorEvent,
  FixIterationEvent,
  FixConflictEvent,
  FixRejectedEvent,
} from './types.js';

// ============================================================
// RULE REGISTRY
// ============================================================
export {
  RuleRegistry,
  type ActiveRule,
  type ResolvedRuleSet,
} from './registry.js';
export { ScratchSlot } from './scratch.js';

// ============================================================
// CONFIGURATION
// ============================================================
export {
  createDefaultConfig,
  normalizeConfig,
  assertValidConfig,
  isRuleState,
  isSeverity,
} from './config.js';

// ============================================================
// TRAVERSAL AND VALIDATION
// ============================================================
export {
  visitTree,
  indexTree,
  type EnterCallback,
  type TraversalIndex,
} from './visitor.js';
export {
  validateTree,
  INTERNAL_ERROR,
  type ValidateOptions,
} from './validator.js';

// ============================================================
// DIAGNOSTICS
// ============================================================
export {
  canonicalize,
  compareDiagnostics,
  createDiagnostic,
  parseErrorDiagnostic,
  annotateDiagnostic,
  runStatus,
  toDiagnosticRecord,
  SYNTAX_ERROR,
} from './diagnostics.js';

// ============================================================
// FIX APPLICATION
// ============================================================
export {
  applyEdits,
  collectEdits,
  editsConflict,
  type ApplyResult,
} from './fixer.js';

// ============================================================
// LINTER
// ============================================================
export {
  createLinter,
  DEFAULT_MAX_ITERATIONS,
  type Linter,
  type LinterOptions,
  type LintOptions,
  type LintResult,
  type FixOptions,
  type FixResult,
  type SourceFile,
} from './linter.js';
