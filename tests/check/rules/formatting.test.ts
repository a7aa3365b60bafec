/**
 * Formatting Rules Tests
 */

import { describe, expect, it } from 'vitest';
import {
  INDENT_TABS,
  MAX_LINE_LENGTH,
  SPACING_OPERATOR,
  TRAILING_WHITESPACE,
} from '../../../src/check/rules/index.js';
import { ConfigError } from '../../../src/error-classes.js';
import { check, fixWith, singleRuleLinter } from '../../helpers/conf.js';

describe('SPACING_OPERATOR', () => {
  it('reports unspaced operators and the declaration =', () => {
    const diagnostics = check(SPACING_OPERATOR, 'let a=1+2;');
    expect(
      diagnostics.map((d) => [d.location.column, d.severity, d.message])
    ).toEqual([
      [6, 'info', "Operator '=' should have exactly one space on each side"],
      [8, 'info', "Operator '+' should have exactly one space on each side"],
    ]);
  });

  it('fixes all operators in one pass', () => {
    expect(fixWith(SPACING_OPERATOR, 'let a=1+2;')).toBe('let a = 1 + 2;');
  });

  it('replaces the whole run of extra spaces', () => {
    const [diagnostic] = check(SPACING_OPERATOR, 'let a = 1  +  2;');
    expect(diagnostic?.fix?.range.start.offset).toBe(9);
    expect(diagnostic?.fix?.range.end.offset).toBe(14);
    expect(diagnostic?.fix?.replacement).toBe(' + ');
    expect(fixWith(SPACING_OPERATOR, 'let a = 1  +  2;')).toBe('let a = 1 + 2;');
  });

  it('accepts single spaces', () => {
    expect(check(SPACING_OPERATOR, 'let a = 1 * (2 - 3);')).toEqual([]);
  });

  it('leaves operators next to a line break or comment alone', () => {
    expect(check(SPACING_OPERATOR, 'let a = 1 +\n  2;\n')).toEqual([]);
    expect(check(SPACING_OPERATOR, 'let a = 1 # one\n  +2;\n')).toEqual([]);
  });
});

describe('TRAILING_WHITESPACE', () => {
  it('reports whitespace before a line break', () => {
    const diagnostics = check(TRAILING_WHITESPACE, 'let a = 1; \nlet b = 2;');
    expect(
      diagnostics.map((d) => [d.location.line, d.location.column, d.message])
    ).toEqual([[1, 11, 'Trailing whitespace']]);
  });

  it('reports whitespace at the end of the file', () => {
    const [diagnostic] = check(TRAILING_WHITESPACE, 'let a = 1;  ');
    expect(diagnostic?.location.column).toBe(11);
    expect(diagnostic?.span.end.column).toBe(13);
  });

  it('reports whitespace-only lines', () => {
    const [diagnostic] = check(TRAILING_WHITESPACE, '  \nlet a = 1;');
    expect(diagnostic?.location).toMatchObject({ line: 1, column: 1 });
  });

  it('removes the whitespace', () => {
    expect(fixWith(TRAILING_WHITESPACE, 'let a = 1; \t\nlet b = 2;  ')).toBe(
      'let a = 1;\nlet b = 2;'
    );
  });

  it('ignores whitespace inside a line', () => {
    expect(check(TRAILING_WHITESPACE, 'let a = 1;\n')).toEqual([]);
  });
});

describe('INDENT_TABS', () => {
  it('reports tab indentation', () => {
    const diagnostics = check(INDENT_TABS, '\tlet a = 1;\n');
    expect(diagnostics.map((d) => [d.location.line, d.location.column])).toEqual(
      [[1, 1]]
    );
    expect(diagnostics[0]?.message).toBe('Indentation uses tabs');
  });

  it('reports tabs indenting a continuation line', () => {
    const diagnostics = check(INDENT_TABS, 'let a =\n\t1;\n');
    expect(diagnostics.map((d) => d.location.line)).toEqual([2]);
  });

  it('expands tabs to the configured width', () => {
    expect(fixWith(INDENT_TABS, '\tlet a = 1;\n')).toBe('  let a = 1;\n');
    expect(fixWith(INDENT_TABS, '\tlet a = 1;\n', { tabWidth: 4 })).toBe(
      '    let a = 1;\n'
    );
  });

  it('ignores tabs after code and whitespace-only lines', () => {
    expect(check(INDENT_TABS, 'let a =\t1;')).toEqual([]);
    expect(check(INDENT_TABS, '\t\nlet a = 1;')).toEqual([]);
  });

  it('rejects an out-of-range tab width', () => {
    expect(() => singleRuleLinter(INDENT_TABS, { tabWidth: 0 })).toThrow(
      ConfigError
    );
    expect(() => singleRuleLinter(INDENT_TABS, { tabWidth: 0 })).toThrow(
      'Invalid parameters for rule INDENT_TABS: tabWidth must be an integer between 1 and 16'
    );
  });
});

describe('MAX_LINE_LENGTH', () => {
  it('reports the part of a line past the limit', () => {
    const [diagnostic, ...rest] = check(MAX_LINE_LENGTH, 'let abc = 12345;', {
      max: 10,
    });
    expect(rest).toEqual([]);
    expect(diagnostic).toMatchObject({
      message: 'Line exceeds 10 characters (16)',
      location: { line: 1, column: 11 },
    });
    expect(diagnostic?.span.end.column).toBe(17);
  });

  it('checks each line separately', () => {
    const diagnostics = check(
      MAX_LINE_LENGTH,
      'let a = 1;\nlet abcdef = 1234;\n',
      { max: 12 }
    );
    expect(
      diagnostics.map((d) => [d.location.line, d.location.column, d.message])
    ).toEqual([[2, 13, 'Line exceeds 12 characters (18)']]);
  });

  it('defaults to 100 characters', () => {
    expect(check(MAX_LINE_LENGTH, `let a = "${'x'.repeat(89)}";`)).toEqual([]);
    expect(
      check(MAX_LINE_LENGTH, `let a = "${'x'.repeat(90)}";`).map(
        (d) => d.message
      )
    ).toEqual(['Line exceeds 100 characters (101)']);
  });

  it('rejects a non-positive limit', () => {
    expect(() => singleRuleLinter(MAX_LINE_LENGTH, { max: 0 })).toThrow(
      'Invalid parameters for rule MAX_LINE_LENGTH: max must be an integer >= 1'
    );
  });
});
