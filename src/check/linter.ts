/**
 * Linter
 * Per-file pipeline: parse, evaluate, canonicalize, and the bounded fix loop.
 */

import { LineIndex } from '../source-location.js';
import {
  checkTreeShape,
  type ParseResult,
  type SourceParser,
} from '../syntax-tree.js';
import { ParseError, type FixConflictError } from '../error-classes.js';
import {
  annotateDiagnostic,
  canonicalize,
  parseErrorDiagnostic,
  runStatus,
} from './diagnostics.js';
import { applyEdits, collectEdits } from './fixer.js';
import { RuleRegistry, type ResolvedRuleSet } from './registry.js';
import type {
  Diagnostic,
  Edit,
  LintCallbacks,
  LintConfig,
  Rule,
  RunStatus,
} from './types.js';
import { validateTree } from './validator.js';

/** Fix iterations used when the caller does not set a cap */
export const DEFAULT_MAX_ITERATIONS = 10;

// ============================================================
// TYPES
// ============================================================

/** Options for creating a linter */
export interface LinterOptions<K extends string> {
  readonly parser: SourceParser<K>;
  /** Rule catalog, as a list or a prepared registry */
  readonly rules: readonly Rule<K>[] | RuleRegistry<K>;
  /** Defaults to every rule at its default settings */
  readonly config?: LintConfig | undefined;
  readonly callbacks?: LintCallbacks | undefined;
  /** Check the parser's tree shape contract before evaluating rules */
  readonly verifyTree?: boolean | undefined;
}

/** Result of linting one text */
export interface LintResult {
  readonly file: string | null;
  readonly diagnostics: readonly Diagnostic[];
  readonly status: RunStatus;
}

/** Options for a single lint call */
export interface LintOptions {
  /** Path reported in diagnostics; not read by the linter */
  readonly file?: string | null | undefined;
}

/** Options for a fix call */
export interface FixOptions extends LintOptions {
  /** Upper bound on fix passes (default 10) */
  readonly maxIterations?: number | undefined;
}

/** Result of the fix loop */
export interface FixResult {
  readonly file: string | null;
  readonly correctedText: string;
  /** Diagnostics of the corrected text */
  readonly remainingDiagnostics: readonly Diagnostic[];
  /** Number of passes whose edits were applied */
  readonly iterationsUsed: number;
  readonly status: RunStatus;
  /** Conflicts still blocking fixes in the corrected text */
  readonly conflicts: readonly FixConflictError[];
  readonly changed: boolean;
}

/** A text to lint, with the path used in its diagnostics */
export interface SourceFile {
  readonly path: string;
  readonly text: string;
}

/**
 * Configured pipeline for one run.
 * Immutable; one linter may process any number of files.
 */
export interface Linter<K extends string = string> {
  readonly ruleSet: ResolvedRuleSet<K>;
  /** Configuration entries naming unknown rules */
  readonly warnings: readonly string[];
  lint(text: string, options?: LintOptions): LintResult;
  /** Lint several texts independently; results follow input order */
  lintFiles(files: readonly SourceFile[]): LintResult[];
  fix(text: string, options?: FixOptions): FixResult;
}

// ============================================================
// FACTORY
// ============================================================

/**
 * Create a linter. All configuration problems surface here, before any file
 * is processed.
 *
 * @throws DuplicateRuleError if the rule list repeats a code
 * @throws ConfigError if configuration or rule parameters are invalid
 *
 * @example
 * ```typescript
 * const linter = createLinter({ parser: confParser, rules: CONF_RULES });
 * const { diagnostics, status } = linter.lint(text, { file: 'app.conf' });
 * ```
 */
export function createLinter<K extends string>(
  options: LinterOptions<K>
): Linter<K> {
  const registry =
    options.rules instanceof RuleRegistry
      ? options.rules
      : new RuleRegistry(options.rules);
  const ruleSet = registry.resolve(options.config ?? { rules: {} });

  for (const warning of ruleSet.warnings) {
    options.callbacks?.onConfigWarning?.(warning);
  }

  return new LinterImpl(
    options.parser,
    ruleSet,
    options.callbacks ?? {},
    options.verifyTree ?? false
  );
}

// ============================================================
// IMPLEMENTATION
// ============================================================

class LinterImpl<K extends string> implements Linter<K> {
  constructor(
    private readonly parser: SourceParser<K>,
    readonly ruleSet: ResolvedRuleSet<K>,
    private readonly callbacks: LintCallbacks,
    private readonly verifyTree: boolean
  ) {
    Object.freeze(this);
  }

  get warnings(): readonly string[] {
    return this.ruleSet.warnings;
  }

  lint(text: string, options: LintOptions = {}): LintResult {
    const file = options.file ?? null;
    const parsed = this.parse(text);

    if (!parsed.ok) {
      this.callbacks.onParseError?.({ file, error: parsed.error });
      return Object.freeze({
        file,
        diagnostics: Object.freeze([
          parseErrorDiagnostic(parsed.error, text, file),
        ]),
        status: 'parse-failed' as const,
      });
    }

    const findings = validateTree(parsed.tree, text, this.ruleSet, {
      file,
      callbacks: this.callbacks,
    });
    const diagnostics = canonicalize(findings, this.ruleSet, text, file);

    return Object.freeze({
      file,
      diagnostics: Object.freeze(diagnostics),
      status: runStatus(diagnostics),
    });
  }

  lintFiles(files: readonly SourceFile[]): LintResult[] {
    return files.map((source) => this.lint(source.text, { file: source.path }));
  }

  /**
   * Lint, apply eligible edits, and repeat on the rewritten text.
   *
   * Stops when no edits remain, when every edit conflicts, when the text stops
   * parsing, or after `maxIterations` passes. A pass whose output no longer
   * parses is discarded.
   */
  fix(text: string, options: FixOptions = {}): FixResult {
    const file = options.file ?? null;
    const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    if (!Number.isInteger(maxIterations) || maxIterations < 0) {
      throw new RangeError(
        `maxIterations must be a non-negative integer, got ${maxIterations}`
      );
    }

    let current = text;
    let iterationsUsed = 0;

    while (iterationsUsed < maxIterations) {
      const result = this.lint(current, { file });
      if (result.status === 'parse-failed') break;

      const edits = collectEdits(result.diagnostics, this.ruleSet);
      if (edits.length === 0) break;

      const iteration = iterationsUsed + 1;
      const applied = applyEdits(current, edits);
      for (const error of applied.conflicts) {
        this.callbacks.onFixConflict?.({ file, iteration, error });
      }
      if (applied.applied.length === 0) break;

      const reparsed = this.parse(applied.output);
      if (!reparsed.ok) {
        this.callbacks.onFixRejected?.({
          file,
          iteration,
          codes: [...new Set(applied.applied.map((edit) => edit.code))],
          error: reparsed.error,
        });
        break;
      }

      current = applied.output;
      iterationsUsed = iteration;
      this.callbacks.onFixIteration?.({
        file,
        iteration,
        applied: applied.applied.length,
        conflicts: applied.conflicts.length,
      });
    }

    const final = this.lint(current, { file });
    const { diagnostics, conflicts } =
      final.status === 'parse-failed'
        ? { diagnostics: final.diagnostics, conflicts: [] }
        : this.annotateConflicts(current, final.diagnostics);

    return Object.freeze({
      file,
      correctedText: current,
      remainingDiagnostics: Object.freeze(diagnostics),
      iterationsUsed,
      status: final.status,
      conflicts: Object.freeze(conflicts),
      changed: current !== text,
    });
  }

  /**
   * Mark diagnostics whose fix is blocked by a conflict in the given text.
   */
  private annotateConflicts(
    text: string,
    diagnostics: readonly Diagnostic[]
  ): { diagnostics: Diagnostic[]; conflicts: readonly FixConflictError[] } {
    const { conflicts } = applyEdits(
      text,
      collectEdits(diagnostics, this.ruleSet)
    );
    if (conflicts.length === 0) {
      return { diagnostics: [...diagnostics], conflicts: [] };
    }

    const blockers = new Map<Edit, string[]>();
    const addBlocker = (edit: Edit, other: string): void => {
      const list = blockers.get(edit);
      if (list) {
        list.push(other);
      } else {
        blockers.set(edit, [other]);
      }
    };
    for (const conflict of conflicts) {
      addBlocker(conflict.first, conflict.second.code);
      addBlocker(conflict.second, conflict.first.code);
    }

    const annotated = diagnostics.map((diagnostic) => {
      const others = diagnostic.fix ? blockers.get(diagnostic.fix) : undefined;
      if (others === undefined) return diagnostic;
      return others.reduce(
        (d, other) =>
          annotateDiagnostic(d, `fix not applied: conflicts with rule ${other}`),
        diagnostic
      );
    });

    return { diagnostics: annotated, conflicts };
  }

  /**
   * Run the parser, folding crashes and contract violations into ParseError.
   */
  private parse(text: string): ParseResult<K> {
    let result: ParseResult<K>;
    try {
      result = this.parser.parse(text);
    } catch (err) {
      if (err instanceof ParseError) {
        return { ok: false, error: err };
      }
      return {
        ok: false,
        error: new ParseError(
          'LINT-P005',
          { reason: err instanceof Error ? err.message : String(err) },
          new LineIndex(text).spanAt(0, 0),
          { cause: err }
        ),
      };
    }

    if (result.ok && this.verifyTree) {
      const issues = checkTreeShape(result.tree, text.length);
      const first = issues[0];
      if (first !== undefined) {
        const span = first.node.span;
        const lines = new LineIndex(text);
        const start = Math.min(Math.max(span.start.offset, 0), text.length);
        return {
          ok: false,
          error: new ParseError(
            'LINT-P006',
            { reason: first.message },
            lines.spanAt(start, start)
          ),
        };
      }
    }

    return result;
  }
}
