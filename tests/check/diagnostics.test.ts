/**
 * Diagnostic Model Tests
 */

import { describe, expect, it } from 'vitest';
import {
  SYNTAX_ERROR,
  annotateDiagnostic,
  canonicalize,
  compareDiagnostics,
  createDiagnostic,
  parseErrorDiagnostic,
  runStatus,
  toDiagnosticRecord,
} from '../../src/check/diagnostics.js';
import { RuleRegistry } from '../../src/check/registry.js';
import { INTERNAL_ERROR } from '../../src/check/validator.js';
import type { Finding } from '../../src/check/types.js';
import { ParseError } from '../../src/error-classes.js';
import { LineIndex } from '../../src/source-location.js';
import { makeRule } from '../helpers/conf.js';

const SOURCE = 'first line\n  second line\n';
const lines = new LineIndex(SOURCE);

function finding(
  code: string,
  start: number,
  end: number,
  message = `${code} message`
): Finding {
  return {
    code,
    severity: 'warning',
    span: lines.spanAt(start, end),
    message,
    fix: null,
  };
}

const ruleSet = new RuleRegistry([
  makeRule('ALPHA'),
  makeRule('BETA', { severity: 'info' }),
  makeRule('OFF', { enabled: false }),
]).resolve({ rules: { ALPHA: { severity: 'error' } } });

describe('createDiagnostic', () => {
  it('records location, context line and keys', () => {
    const diagnostic = createDiagnostic(
      finding('ALPHA', 13, 19),
      'error',
      lines,
      'a.conf'
    );
    expect(diagnostic.location).toEqual({ line: 2, column: 3, offset: 13 });
    expect(diagnostic.context).toBe('second line');
    expect(diagnostic.sortKey).toEqual(['a.conf', 13, 'ALPHA']);
    expect(diagnostic.dedupKey).toBe('ALPHA|13|19|ALPHA message');
    expect(Object.isFrozen(diagnostic)).toBe(true);
  });

  it('stamps the fix with the rule code', () => {
    const diagnostic = createDiagnostic(
      {
        ...finding('ALPHA', 0, 5),
        fix: {
          description: 'shorten',
          range: lines.spanAt(0, 5),
          replacement: 'x',
        },
      },
      'warning',
      lines,
      null
    );
    expect(diagnostic.fix).toEqual({
      code: 'ALPHA',
      description: 'shorten',
      range: lines.spanAt(0, 5),
      replacement: 'x',
    });
  });
});

describe('canonicalize', () => {
  it('applies the configured severity', () => {
    const [diagnostic] = canonicalize([finding('ALPHA', 0, 1)], ruleSet, SOURCE);
    expect(diagnostic?.severity).toBe('error');
  });

  it('keeps the default severity when none is configured', () => {
    const [diagnostic] = canonicalize([finding('BETA', 0, 1)], ruleSet, SOURCE);
    expect(diagnostic?.severity).toBe('info');
  });

  it('drops findings of inactive or unknown rules', () => {
    const result = canonicalize(
      [finding('OFF', 0, 1), finding('GHOST', 0, 1), finding('BETA', 0, 1)],
      ruleSet,
      SOURCE
    );
    expect(result.map((d) => d.code)).toEqual(['BETA']);
  });

  it('keeps engine findings with their own severity', () => {
    const result = canonicalize(
      [{ ...finding(INTERNAL_ERROR, 0, 1), severity: 'error' }],
      ruleSet,
      SOURCE
    );
    expect(result.map((d) => [d.code, d.severity])).toEqual([
      [INTERNAL_ERROR, 'error'],
    ]);
  });

  it('collapses identical code, span and message', () => {
    const result = canonicalize(
      [
        finding('ALPHA', 0, 5),
        finding('ALPHA', 0, 5),
        finding('ALPHA', 0, 5, 'different'),
        finding('ALPHA', 0, 4),
      ],
      ruleSet,
      SOURCE
    );
    expect(result.map((d) => d.dedupKey)).toEqual([
      'ALPHA|0|4|ALPHA message',
      'ALPHA|0|5|ALPHA message',
      'ALPHA|0|5|different',
    ]);
  });

  it('sorts by offset, code, end and message', () => {
    const result = canonicalize(
      [
        finding('BETA', 11, 12),
        finding('BETA', 0, 3, 'b'),
        finding('ALPHA', 0, 9),
        finding('BETA', 0, 3, 'a'),
        finding('BETA', 0, 2),
      ],
      ruleSet,
      SOURCE
    );
    expect(result.map((d) => d.dedupKey)).toEqual([
      'ALPHA|0|9|ALPHA message',
      'BETA|0|2|BETA message',
      'BETA|0|3|a',
      'BETA|0|3|b',
      'BETA|11|12|BETA message',
    ]);
  });

  it('does not depend on input order', () => {
    const findings = [
      finding('BETA', 4, 6),
      finding('ALPHA', 4, 6),
      finding('ALPHA', 1, 2),
      finding('BETA', 4, 5),
    ];
    const forward = canonicalize(findings, ruleSet, SOURCE);
    const backward = canonicalize([...findings].reverse(), ruleSet, SOURCE);
    expect(backward).toEqual(forward);
  });

  it('sorts across files by path first', () => {
    const first = canonicalize([finding('ALPHA', 9, 10)], ruleSet, SOURCE, 'a');
    const second = canonicalize([finding('ALPHA', 0, 1)], ruleSet, SOURCE, 'b');
    const merged = [...second, ...first].sort(compareDiagnostics);
    expect(merged.map((d) => d.file)).toEqual(['a', 'b']);
  });
});

describe('parseErrorDiagnostic', () => {
  it('reports the parse error as SYNTAX_ERROR', () => {
    const error = new ParseError(
      'LINT-P004',
      { expected: "';'", found: 'end of input' },
      lines.spanAt(10, 10)
    );
    const diagnostic = parseErrorDiagnostic(error, SOURCE, 'a.conf');
    expect(diagnostic).toMatchObject({
      file: 'a.conf',
      code: SYNTAX_ERROR,
      severity: 'error',
      message: "Expected ';', found end of input",
      location: { line: 1, column: 11, offset: 10 },
      context: 'first line',
    });
  });
});

describe('annotateDiagnostic', () => {
  it('adds a note once', () => {
    const base = createDiagnostic(finding('ALPHA', 0, 1), 'error', lines, null);
    const once = annotateDiagnostic(base, 'note');
    const twice = annotateDiagnostic(once, 'note');
    expect(base.notes).toEqual([]);
    expect(once.notes).toEqual(['note']);
    expect(twice).toBe(once);
  });
});

describe('runStatus', () => {
  it('counts only errors as violations', () => {
    const warning = createDiagnostic(finding('A', 0, 1), 'warning', lines, null);
    const error = createDiagnostic(finding('A', 0, 1), 'error', lines, null);
    expect(runStatus([])).toBe('clean');
    expect(runStatus([warning])).toBe('clean');
    expect(runStatus([warning, error])).toBe('violations');
    expect(runStatus([], true)).toBe('parse-failed');
  });
});

describe('toDiagnosticRecord', () => {
  it('returns plain position fields', () => {
    const diagnostic = createDiagnostic(
      finding('ALPHA', 13, 19),
      'error',
      lines,
      'a.conf'
    );
    expect(toDiagnosticRecord(diagnostic)).toEqual({
      file: 'a.conf',
      startLine: 2,
      startColumn: 3,
      endLine: 2,
      endColumn: 9,
      severity: 'error',
      code: 'ALPHA',
      message: 'ALPHA message',
    });
  });
});
