/**
 * Error Classes
 * Structured error types with registry-based error IDs
 */

import type { SourceLocation, SourceSpan } from './source-location.js';
import type { Edit } from './check/types.js';
import { ERROR_REGISTRY, renderMessage } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface LintErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all library errors.
 * The message is rendered from the registry template for `errorId`.
 */
export class LintError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context: Record<string, unknown>;

  constructor(
    errorId: string,
    context: Record<string, unknown> = {},
    location?: SourceLocation,
    options?: { cause?: unknown }
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }

    const message = renderMessage(definition.messageTemplate, context);
    const locationStr = location
      ? ` at ${location.line}:${location.column}`
      : '';
    super(`${message}${locationStr}`, options);
    this.name = 'LintError';
    this.errorId = errorId;
    this.location = location;
    this.context = context;
  }

  /** Get structured error data for custom formatting */
  toData(): LintErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      location: this.location,
      context: this.context,
    };
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/**
 * Source text could not be turned into a tree.
 * Recoverable per file: the file's status becomes 'parse-failed'.
 */
export class ParseError extends LintError {
  override readonly location: SourceLocation;
  readonly span: SourceSpan;

  constructor(
    errorId: string,
    context: Record<string, unknown>,
    span: SourceSpan,
    options?: { cause?: unknown }
  ) {
    if (ERROR_REGISTRY.get(errorId)?.category !== 'parse') {
      throw new TypeError(`Expected parse error ID, got: ${errorId}`);
    }
    super(errorId, context, span.start, options);
    this.name = 'ParseError';
    this.location = span.start;
    this.span = span;
  }
}

/** Two rules were registered under the same code */
export class DuplicateRuleError extends LintError {
  readonly code: string;

  constructor(code: string) {
    super('LINT-C001', { code });
    this.name = 'DuplicateRuleError';
    this.code = code;
  }
}

/**
 * Configuration cannot be used.
 * Fatal to the run: raised before any file is processed.
 */
export class ConfigError extends LintError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    if (ERROR_REGISTRY.get(errorId)?.category !== 'config') {
      throw new TypeError(`Expected config error ID, got: ${errorId}`);
    }
    super(errorId, context, undefined, options);
    this.name = 'ConfigError';
  }
}

/**
 * Two proposed edits overlap, or start at the same point where one is an insertion.
 * `first` is the edit that starts earlier in sorted order.
 */
export class FixConflictError extends LintError {
  readonly first: Edit;
  readonly second: Edit;
  /** Region claimed by both edits (a point for insertions) */
  readonly span: SourceSpan;

  constructor(first: Edit, second: Edit, span: SourceSpan) {
    super('LINT-F001', { first: first.code, second: second.code }, span.start);
    this.name = 'FixConflictError';
    this.first = first;
    this.second = second;
    this.span = span;
  }
}

/** A rule threw or returned an unusable report while evaluating a node */
export class RuleExecutionError extends LintError {
  readonly code: string;

  constructor(
    errorId: 'LINT-R001' | 'LINT-R002',
    code: string,
    context: Record<string, unknown>,
    location: SourceLocation,
    options?: { cause?: unknown }
  ) {
    super(errorId, { code, ...context }, location, options);
    this.name = 'RuleExecutionError';
    this.code = code;
  }
}
