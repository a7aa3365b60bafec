/**
 * Diagnostic Model
 * Canonicalizes raw findings into sorted, deduplicated, frozen diagnostics.
 */

import { LineIndex, type SourceSpan } from '../source-location.js';
import type { ParseError } from '../error-classes.js';
import type { ResolvedRuleSet } from './registry.js';
import type {
  Diagnostic,
  DiagnosticRecord,
  Edit,
  Finding,
  RunStatus,
  Severity,
} from './types.js';
import { INTERNAL_ERROR } from './validator.js';

/** Code of the diagnostic reported for a file that failed to parse */
export const SYNTAX_ERROR = 'SYNTAX_ERROR';

/** Codes the engine emits itself; they bypass rule activation checks */
const ENGINE_CODES: ReadonlySet<string> = new Set([
  SYNTAX_ERROR,
  INTERNAL_ERROR,
]);

// ============================================================
// CONSTRUCTION
// ============================================================

function dedupKeyOf(code: string, span: SourceSpan, message: string): string {
  return `${code}|${span.start.offset}|${span.end.offset}|${message}`;
}

/**
 * Build a frozen diagnostic from a finding.
 * The finding's fix becomes an Edit stamped with the finding's code.
 */
export function createDiagnostic(
  finding: Finding,
  severity: Severity,
  lines: LineIndex,
  file: string | null,
  notes: readonly string[] = []
): Diagnostic {
  const fix: Edit | null = finding.fix
    ? Object.freeze({
        code: finding.code,
        description: finding.fix.description,
        range: finding.fix.range,
        replacement: finding.fix.replacement,
      })
    : null;

  return Object.freeze({
    file,
    code: finding.code,
    severity,
    message: finding.message,
    span: finding.span,
    location: finding.span.start,
    context: lines.contextLine(finding.span.start.line),
    fix,
    notes: Object.freeze([...notes]),
    sortKey: Object.freeze([
      file ?? '',
      finding.span.start.offset,
      finding.code,
    ] as const),
    dedupKey: dedupKeyOf(finding.code, finding.span, finding.message),
  });
}

/**
 * Diagnostic for a file that could not be parsed.
 */
export function parseErrorDiagnostic(
  error: ParseError,
  source: string,
  file: string | null
): Diagnostic {
  return createDiagnostic(
    {
      code: SYNTAX_ERROR,
      severity: 'error',
      span: error.span,
      message: error.toData().message,
      fix: null,
    },
    'error',
    new LineIndex(source),
    file
  );
}

/**
 * Copy of a diagnostic with one more note.
 */
export function annotateDiagnostic(
  diagnostic: Diagnostic,
  note: string
): Diagnostic {
  if (diagnostic.notes.includes(note)) {
    return diagnostic;
  }
  return Object.freeze({
    ...diagnostic,
    notes: Object.freeze([...diagnostic.notes, note]),
  });
}

// ============================================================
// CANONICALIZATION
// ============================================================

/**
 * Total order over diagnostics: file, start offset, code, end offset, message.
 * Independent of the order rules were registered or evaluated in.
 */
export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  const [fileA, offsetA, codeA] = a.sortKey;
  const [fileB, offsetB, codeB] = b.sortKey;

  if (fileA !== fileB) return fileA < fileB ? -1 : 1;
  if (offsetA !== offsetB) return offsetA - offsetB;
  if (codeA !== codeB) return codeA < codeB ? -1 : 1;
  if (a.span.end.offset !== b.span.end.offset) {
    return a.span.end.offset - b.span.end.offset;
  }
  if (a.message !== b.message) return a.message < b.message ? -1 : 1;
  return 0;
}

/**
 * Turn the findings of one traversal into reportable diagnostics.
 *
 * Steps:
 * 1. Resolve severity (configured override, else the rule's default)
 * 2. Drop findings from rules that are not active
 * 3. Collapse findings with identical code, span and message (first wins)
 * 4. Sort with compareDiagnostics()
 */
export function canonicalize<K extends string>(
  findings: readonly Finding[],
  ruleSet: ResolvedRuleSet<K>,
  source: string,
  file: string | null = null
): Diagnostic[] {
  const lines = new LineIndex(source);
  const seen = new Set<string>();
  const diagnostics: Diagnostic[] = [];

  for (const finding of findings) {
    let severity: Severity;
    if (ENGINE_CODES.has(finding.code)) {
      severity = finding.severity;
    } else {
      const active = ruleSet.get(finding.code);
      if (active === undefined) {
        continue;
      }
      severity = active.severity;
    }

    const key = dedupKeyOf(finding.code, finding.span, finding.message);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);

    diagnostics.push(createDiagnostic(finding, severity, lines, file));
  }

  return diagnostics.sort(compareDiagnostics);
}

/**
 * Overall status for one file.
 * Only 'error' severity counts as a violation.
 */
export function runStatus(
  diagnostics: readonly Diagnostic[],
  parseFailed = false
): RunStatus {
  if (parseFailed) {
    return 'parse-failed';
  }
  return diagnostics.some((d) => d.severity === 'error')
    ? 'violations'
    : 'clean';
}

// ============================================================
// SERIALIZATION
// ============================================================

/**
 * Plain fields of a diagnostic for external reporters.
 */
export function toDiagnosticRecord(diagnostic: Diagnostic): DiagnosticRecord {
  return {
    file: diagnostic.file,
    startLine: diagnostic.span.start.line,
    startColumn: diagnostic.span.start.column,
    endLine: diagnostic.span.end.line,
    endColumn: diagnostic.span.end.column,
    severity: diagnostic.severity,
    code: diagnostic.code,
    message: diagnostic.message,
  };
}
