/**
 * Fix Applier
 * Apply non-overlapping edits to source text with conflict detection.
 */

import type { SourceSpan } from '../source-location.js';
import { FixConflictError } from '../error-classes.js';
import type { ResolvedRuleSet } from './registry.js';
import type { Diagnostic, Edit } from './types.js';

// ============================================================
// TYPES
// ============================================================

/**
 * Result of applying edits to source text.
 */
export interface ApplyResult {
  /** Source text with accepted edits applied */
  readonly output: string;
  /** Edits that were applied, in source order */
  readonly applied: readonly Edit[];
  /** Edits dropped because they conflict with another edit */
  readonly skipped: readonly Edit[];
  /** One error per conflicting pair */
  readonly conflicts: readonly FixConflictError[];
}

// ============================================================
// EDIT SELECTION
// ============================================================

/**
 * Edits eligible for automatic application: fixes from diagnostics whose
 * rule is active and marked fixable.
 */
export function collectEdits<K extends string>(
  diagnostics: readonly Diagnostic[],
  ruleSet: ResolvedRuleSet<K>
): Edit[] {
  const edits: Edit[] = [];
  for (const diagnostic of diagnostics) {
    if (diagnostic.fix === null) continue;
    const active = ruleSet.get(diagnostic.code);
    if (active?.rule.fixable) {
      edits.push(diagnostic.fix);
    }
  }
  return edits;
}

// ============================================================
// CONFLICT DETECTION
// ============================================================

function isInsertion(edit: Edit): boolean {
  return edit.range.start.offset === edit.range.end.offset;
}

function compareEdits(a: Edit, b: Edit): number {
  const startDiff = a.range.start.offset - b.range.start.offset;
  if (startDiff !== 0) return startDiff;
  const endDiff = a.range.end.offset - b.range.end.offset;
  if (endDiff !== 0) return endDiff;
  if (a.code !== b.code) return a.code < b.code ? -1 : 1;
  return 0;
}

/**
 * Whether two edits conflict, where `a` sorts before `b`.
 *
 * Edits conflict when `b` starts strictly inside `a`, or when both start at the
 * same offset and either is an insertion (their relative order is undefined).
 * Edits that merely touch (`a` ends where `b` starts) do not conflict.
 */
export function editsConflict(a: Edit, b: Edit): boolean {
  const aStart = a.range.start.offset;
  const bStart = b.range.start.offset;
  if (bStart < a.range.end.offset) {
    return true;
  }
  return aStart === bStart && (isInsertion(a) || isInsertion(b));
}

/** Region both edits claim; a point for insertions */
function sharedSpan(a: Edit, b: Edit): SourceSpan {
  const end =
    a.range.end.offset <= b.range.end.offset ? a.range.end : b.range.end;
  return { start: b.range.start, end };
}

// ============================================================
// FIX APPLICATION
// ============================================================

/**
 * Apply edits to source text.
 *
 * Constraints:
 * - Edits are sorted by start, end and rule code, then scanned once
 * - Every edit involved in a conflict is dropped; the rest are applied
 * - Text outside applied edits is preserved verbatim
 *
 * @param source - Original source text
 * @param edits - Proposed edits, in any order
 * @returns ApplyResult with output text, applied and skipped edits, and conflicts
 * @throws RangeError if an edit is inverted or lies outside the source
 */
export function applyEdits(
  source: string,
  edits: readonly Edit[]
): ApplyResult {
  for (const edit of edits) {
    const { start, end } = edit.range;
    if (
      start.offset < 0 ||
      end.offset > source.length ||
      start.offset > end.offset
    ) {
      throw new RangeError(
        `Edit from ${edit.code} has invalid range ${start.offset}..${end.offset} for source of length ${source.length}`
      );
    }
  }

  if (edits.length === 0) {
    return { output: source, applied: [], skipped: [], conflicts: [] };
  }

  const sorted = [...edits].sort(compareEdits);
  const conflicts: FixConflictError[] = [];
  const conflicted = new Set<Edit>();

  // `reach` is the edit extending furthest so far; any overlap with an earlier
  // edit is also an overlap with it. `previous` catches equal-start insertions.
  let reach: Edit | null = null;
  let previous: Edit | null = null;

  for (const edit of sorted) {
    const partners: Edit[] = [];
    if (reach !== null && editsConflict(reach, edit)) {
      partners.push(reach);
    }
    if (
      previous !== null &&
      previous !== reach &&
      editsConflict(previous, edit)
    ) {
      partners.push(previous);
    }

    for (const partner of partners) {
      conflicts.push(
        new FixConflictError(partner, edit, sharedSpan(partner, edit))
      );
      conflicted.add(partner);
      conflicted.add(edit);
    }

    if (reach === null || edit.range.end.offset > reach.range.end.offset) {
      reach = edit;
    }
    previous = edit;
  }

  const applied: Edit[] = [];
  const skipped: Edit[] = [];
  const parts: string[] = [];
  let cursor = 0;

  for (const edit of sorted) {
    if (conflicted.has(edit)) {
      skipped.push(edit);
      continue;
    }
    parts.push(source.slice(cursor, edit.range.start.offset), edit.replacement);
    cursor = edit.range.end.offset;
    applied.push(edit);
  }
  parts.push(source.slice(cursor));

  return {
    output: parts.join(''),
    applied,
    skipped,
    conflicts,
  };
}
