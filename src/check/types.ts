/**
 * Check Types
 * Type definitions for the rule-evaluation engine.
 */

import type { SourceLocation, SourceSpan } from '../source-location.js';
import type { SyntaxNode } from '../syntax-tree.js';
import type {
  FixConflictError,
  ParseError,
  RuleExecutionError,
} from '../error-classes.js';
import type { ScratchSlot } from './scratch.js';

// ============================================================
// SEVERITY AND RULE STATE
// ============================================================

/** Diagnostic severity levels */
export type Severity = 'error' | 'warning' | 'info';

/** Shorthand rule state accepted in configuration documents */
export type RuleState = 'on' | 'off' | 'warn';

/** Overall outcome of linting one file */
export type RunStatus = 'clean' | 'violations' | 'parse-failed';

// ============================================================
// RULE OUTPUT
// ============================================================

/**
 * Fix suggestion attached to a rule report.
 * Replaces `range` with `replacement`; a zero-width range is an insertion.
 */
export interface Fix {
  /** Human-readable description of what the fix does */
  readonly description: string;
  /** Source range to replace */
  readonly range: SourceSpan;
  /** Replacement text */
  readonly replacement: string;
}

/** What a rule returns for one violation */
export interface RuleReport {
  readonly span: SourceSpan;
  readonly message: string;
  readonly fix?: Fix | null | undefined;
}

/** A report stamped with the rule that produced it, before canonicalization */
export interface Finding {
  readonly code: string;
  readonly severity: Severity;
  readonly span: SourceSpan;
  readonly message: string;
  readonly fix: Fix | null;
}

/** A fix carrying the code of the rule that proposed it */
export interface Edit extends Fix {
  readonly code: string;
}

// ============================================================
// DIAGNOSTIC DATA
// ============================================================

/** Sort key: file, start offset, rule code */
export type DiagnosticSortKey = readonly [
  file: string,
  offset: number,
  code: string,
];

/**
 * A canonical, reportable violation.
 * Diagnostics are frozen once constructed.
 */
export interface Diagnostic {
  /** Caller-supplied file path, or null for anonymous text */
  readonly file: string | null;
  /** Rule code (e.g., NAMING_SNAKE_CASE) */
  readonly code: string;
  readonly severity: Severity;
  /** Human-readable description */
  readonly message: string;
  readonly span: SourceSpan;
  /** Start of span */
  readonly location: SourceLocation;
  /** Source line containing the issue, trimmed */
  readonly context: string;
  readonly fix: Edit | null;
  /** Annotations added after the fact (e.g., unapplied fixes) */
  readonly notes: readonly string[];
  readonly sortKey: DiagnosticSortKey;
  /** Identity for deduplication: code, span and message */
  readonly dedupKey: string;
}

/** Plain fields for external reporters */
export interface DiagnosticRecord {
  readonly file: string | null;
  readonly startLine: number;
  readonly startColumn: number;
  readonly endLine: number;
  readonly endColumn: number;
  readonly severity: Severity;
  readonly code: string;
  readonly message: string;
}

// ============================================================
// CONFIGURATION
// ============================================================

/** Rule-specific parameters */
export type RuleParams = Readonly<Record<string, unknown>>;

/** Per-rule configuration; omitted fields fall back to the rule's defaults */
export interface RuleSettings {
  readonly enabled?: boolean | undefined;
  readonly severity?: Severity | undefined;
  readonly params?: RuleParams | undefined;
}

/**
 * Configuration for one run.
 * Immutable for the duration of the run.
 */
export interface LintConfig {
  readonly rules: Readonly<Record<string, RuleSettings>>;
}

// ============================================================
// RULE CONTRACT
// ============================================================

/**
 * Read-only view handed to a rule for each node it evaluates.
 * Lookups are valid for the current traversal only.
 */
export interface RuleContext<K extends string = string> {
  readonly source: string;
  readonly file: string | null;
  readonly tree: SyntaxNode<K>;
  /** Rule defaults merged with configured parameters */
  readonly params: RuleParams;
  /** Parent of a node, or null for the root */
  parent(node: SyntaxNode<K>): SyntaxNode<K> | null;
  /** Ancestors of a node, nearest first */
  ancestors(node: SyntaxNode<K>): readonly SyntaxNode<K>[];
  /** Index of a node among its parent's children (0 for the root, -1 outside the tree) */
  siblingIndex(node: SyntaxNode<K>): number;
  /** The node's parent's children, or just the node itself for the root */
  siblings(node: SyntaxNode<K>): readonly SyntaxNode<K>[];
  /** Span for `[start, end)` in the current source */
  spanAt(start: number, end: number): SourceSpan;
  /** Per-traversal state for this rule, created on first access */
  scratch<T>(slot: ScratchSlot<T>): T;
}

/**
 * Validation rule interface.
 * Rules are stateless - all context passed via RuleContext.
 * Rules return reports; a throw is contained by the engine and reported as
 * INTERNAL_ERROR. Fixes must not change meaning.
 */
export interface Rule<K extends string = string> {
  /** Unique rule code (e.g., NAMING_SNAKE_CASE) */
  readonly code: string;
  readonly version: string;
  readonly description: string;
  /** Free-form grouping label */
  readonly category: string;
  /** Default severity level */
  readonly severity: Severity;
  /** Whether the rule runs when configuration does not mention it */
  readonly enabled: boolean;
  /** Whether fixes from this rule may be applied automatically */
  readonly fixable: boolean;
  /** Node kinds this rule applies to */
  readonly nodeTypes: readonly K[];
  /** Parameter defaults, overridden by configuration */
  readonly defaults?: RuleParams | undefined;

  /** Problems with the merged parameters; non-empty fails configuration */
  validateParams?(params: RuleParams): string[];

  /** Evaluate one node of a subscribed kind */
  evaluate(node: SyntaxNode<K>, context: RuleContext<K>): RuleReport[];
}

// ============================================================
// OBSERVABILITY
// ============================================================

/** Event emitted when a file fails to parse */
export interface ParseErrorEvent {
  readonly file: string | null;
  readonly error: ParseError;
}

/** Event emitted when a rule invocation fails */
export interface RuleErrorEvent {
  readonly file: string | null;
  readonly code: string;
  readonly kind: string;
  readonly error: RuleExecutionError;
}

/** Event emitted after each fix iteration */
export interface FixIterationEvent {
  readonly file: string | null;
  /** Iteration number (1-based) */
  readonly iteration: number;
  readonly applied: number;
  readonly conflicts: number;
}

/** Event emitted for each conflicting pair of edits */
export interface FixConflictEvent {
  readonly file: string | null;
  readonly iteration: number;
  readonly error: FixConflictError;
}

/** Event emitted when applied fixes produce text that no longer parses */
export interface FixRejectedEvent {
  readonly file: string | null;
  readonly iteration: number;
  readonly codes: readonly string[];
  readonly error: ParseError;
}

/** Callbacks for monitoring a run; the engine never logs on its own */
export interface LintCallbacks {
  /** Called for configuration entries that name unknown rules */
  onConfigWarning?: (message: string) => void;
  onParseError?: (event: ParseErrorEvent) => void;
  onRuleError?: (event: RuleErrorEvent) => void;
  onFixIteration?: (event: FixIterationEvent) => void;
  onFixConflict?: (event: FixConflictEvent) => void;
  onFixRejected?: (event: FixRejectedEvent) => void;
}
