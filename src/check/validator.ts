/**
 * Tree Validator
 * Dispatches every node to the rules interested in its kind, in one traversal.
 */

import {
  LineIndex,
  isSpanInRange,
  type SourceLocation,
  type SourceSpan,
} from '../source-location.js';
import type { SyntaxNode } from '../syntax-tree.js';
import { RuleExecutionError } from '../error-classes.js';
import type { ActiveRule, ResolvedRuleSet } from './registry.js';
import type { ScratchSlot } from './scratch.js';
import type {
  Finding,
  LintCallbacks,
  RuleContext,
  RuleReport,
} from './types.js';
import { indexTree, type TraversalIndex } from './visitor.js';

/** Code of diagnostics raised for failing rule invocations */
export const INTERNAL_ERROR = 'INTERNAL_ERROR';

/** Options for one traversal */
export interface ValidateOptions {
  readonly file?: string | null | undefined;
  readonly callbacks?: LintCallbacks | undefined;
}

// ============================================================
// VALIDATION ORCHESTRATOR
// ============================================================

/**
 * Evaluate all active rules against a tree.
 *
 * The tree is walked once; at each node the rules subscribed to its kind run
 * in registration order. A rule that throws, or returns a report whose span or
 * fix range lies outside the source, yields an INTERNAL_ERROR finding and
 * evaluation continues with the next rule.
 *
 * @returns Findings in dispatch order (unsorted, not deduplicated)
 */
export function validateTree<K extends string>(
  tree: SyntaxNode<K>,
  source: string,
  ruleSet: ResolvedRuleSet<K>,
  options: ValidateOptions = {}
): Finding[] {
  const file = options.file ?? null;
  const lines = new LineIndex(source);
  const index = indexTree(tree);
  const findings: Finding[] = [];

  // One context per active rule; each context also keys that rule's scratch state
  const contexts = new Map<string, RuleContext<K>>();
  for (const active of ruleSet.rules) {
    contexts.set(
      active.rule.code,
      createRuleContext(tree, source, file, lines, index, active)
    );
  }

  for (const node of index.order) {
    for (const active of ruleSet.rulesFor(node.kind)) {
      const context = contexts.get(active.rule.code);
      if (context === undefined) continue;

      let reports: RuleReport[];
      try {
        reports = active.rule.evaluate(node, context);
        if (!Array.isArray(reports)) {
          throw new TypeError('evaluate() must return an array');
        }
      } catch (err) {
        const error = new RuleExecutionError(
          'LINT-R001',
          active.rule.code,
          { kind: node.kind, reason: describeError(err) },
          node.span.start,
          { cause: err }
        );
        findings.push(internalFinding(error, node));
        options.callbacks?.onRuleError?.({
          file,
          code: active.rule.code,
          kind: node.kind,
          error,
        });
        continue;
      }

      for (const report of reports) {
        const problem = checkReport(report, source.length);
        if (problem !== null) {
          const error = new RuleExecutionError(
            'LINT-R002',
            active.rule.code,
            { reason: problem },
            node.span.start
          );
          findings.push(internalFinding(error, node));
          options.callbacks?.onRuleError?.({
            file,
            code: active.rule.code,
            kind: node.kind,
            error,
          });
          continue;
        }

        findings.push({
          code: active.rule.code,
          severity: active.rule.severity,
          span: report.span,
          message: report.message,
          fix: report.fix ?? null,
        });
      }
    }
  }

  return findings;
}

// ============================================================
// HELPERS
// ============================================================

function createRuleContext<K extends string>(
  tree: SyntaxNode<K>,
  source: string,
  file: string | null,
  lines: LineIndex,
  index: TraversalIndex<K>,
  active: ActiveRule<K>
): RuleContext<K> {
  const context: RuleContext<K> = {
    source,
    file,
    tree,
    params: active.params,
    parent: (node) => index.parent(node),
    ancestors: (node) => index.ancestors(node),
    siblingIndex: (node) => index.siblingIndex(node),
    siblings: (node) => index.parent(node)?.children ?? [node],
    spanAt: (start, end) => lines.spanAt(start, end),
    scratch: <T>(slot: ScratchSlot<T>): T => slot.resolve(context),
  };
  return context;
}

/**
 * Reason a report cannot be used, or null if it is well-formed.
 * Reports come from rule code, so their shape is checked before any field is read.
 */
function checkReport(report: unknown, length: number): string | null {
  if (!isRecord(report)) {
    return 'report must be an object';
  }
  const { message, span, fix } = report;
  if (typeof message !== 'string' || message === '') {
    return 'message must be a non-empty string';
  }
  if (!isSpan(span)) {
    return 'span must have start and end locations';
  }
  if (!isSpanInRange(span, length)) {
    return `span ${span.start.offset}..${span.end.offset} is outside the source`;
  }
  if (fix === undefined || fix === null) {
    return null;
  }
  if (!isRecord(fix)) {
    return 'fix must be an object';
  }
  const { range, replacement } = fix;
  if (!isSpan(range) || typeof replacement !== 'string') {
    return 'fix must have a range and a replacement';
  }
  if (!isSpanInRange(range, length)) {
    return `fix range ${range.start.offset}..${range.end.offset} is outside the source`;
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLocation(value: unknown): value is SourceLocation {
  return (
    isRecord(value) &&
    typeof value['line'] === 'number' &&
    typeof value['column'] === 'number' &&
    typeof value['offset'] === 'number'
  );
}

function isSpan(value: unknown): value is SourceSpan {
  return (
    isRecord(value) && isLocation(value['start']) && isLocation(value['end'])
  );
}

function internalFinding<K extends string>(
  error: RuleExecutionError,
  node: SyntaxNode<K>
): Finding {
  return {
    code: INTERNAL_ERROR,
    severity: 'error',
    span: node.span,
    message: error.toData().message,
    fix: null,
  };
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
