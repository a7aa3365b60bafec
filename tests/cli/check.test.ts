/**
 * lintel CLI Tests
 * Runs the command in-process against files in a temporary directory.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'fs/promises';
import * as fssync from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  EXIT_CODES,
  HELP_TEXT,
  exitCodeFor,
  parseCheckArgs,
  runCheck,
  type CheckIO,
} from '../../src/cli-check.js';

interface Captured extends CheckIO {
  readonly out: string[];
  readonly err: string[];
}

describe('parseCheckArgs', () => {
  it('parses files with defaults', () => {
    expect(parseCheckArgs(['a.conf'])).toEqual({
      mode: 'check',
      files: ['a.conf'],
      fix: false,
      verbose: false,
      format: 'text',
      config: null,
      maxIterations: null,
    });
  });

  it('parses every option', () => {
    expect(
      parseCheckArgs([
        '--fix',
        '--format',
        'json',
        '--config',
        'lint.yaml',
        '--max-iterations',
        '3',
        '--verbose',
        'a.conf',
        'b.conf',
      ])
    ).toEqual({
      mode: 'check',
      files: ['a.conf', 'b.conf'],
      fix: true,
      verbose: true,
      format: 'json',
      config: 'lint.yaml',
      maxIterations: 3,
    });
  });

  it('gives help and version precedence in any position', () => {
    expect(parseCheckArgs(['a.conf', '--help'])).toEqual({ mode: 'help' });
    expect(parseCheckArgs(['--bogus', '-h'])).toEqual({ mode: 'help' });
    expect(parseCheckArgs(['a.conf', '-v'])).toEqual({ mode: 'version' });
  });

  it.each([
    [[], 'Missing file argument'],
    [['--format'], '--format requires an argument'],
    [['--config', '--fix', 'a'], '--config requires an argument'],
    [['--bogus', 'a'], 'Unknown option: --bogus'],
    [['--format', 'xml', 'a'], 'Invalid format: xml. Expected text or json'],
    [
      ['--max-iterations', '1.5', 'a'],
      'Invalid --max-iterations: 1.5. Expected a non-negative integer',
    ],
  ])('rejects %j', (argv, message) => {
    expect(() => parseCheckArgs(argv)).toThrow(message);
  });
});

describe('exitCodeFor', () => {
  const report = (status: 'clean' | 'violations' | 'parse-failed') => ({
    file: 'a.conf',
    status,
    diagnostics: [],
  });

  it('ranks file errors over parse failures over violations', () => {
    expect(exitCodeFor([report('parse-failed')], 1)).toBe(EXIT_CODES.USAGE);
    expect(exitCodeFor([report('violations'), report('parse-failed')], 0)).toBe(
      EXIT_CODES.PARSE_FAILED
    );
    expect(exitCodeFor([report('clean'), report('violations')], 0)).toBe(
      EXIT_CODES.VIOLATIONS
    );
    expect(exitCodeFor([report('clean')], 0)).toBe(EXIT_CODES.CLEAN);
  });
});

describe('runCheck', () => {
  let tempDir: string;
  let io: Captured;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lintel-check-test-'));
    const out: string[] = [];
    const err: string[] = [];
    io = {
      cwd: tempDir,
      out,
      err,
      stdout: (text) => out.push(text),
      stderr: (text) => err.push(text),
    };
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeFile(name: string, content: string): Promise<string> {
    const filePath = path.join(tempDir, name);
    await fs.writeFile(filePath, content, 'utf-8');
    return filePath;
  }

  describe('reporting', () => {
    it('reports a clean file', async () => {
      await writeFile('clean.conf', 'let a = 1;\n');
      expect(runCheck(['clean.conf'], io)).toBe(0);
      expect(io.out).toEqual(['No issues found']);
      expect(io.err).toEqual([]);
    });

    it('exits 1 on error-severity violations', async () => {
      await writeFile('dup.conf', 'let a = 1;\nlet a = 2;\n');
      expect(runCheck(['dup.conf'], io)).toBe(1);
      expect(io.out).toEqual([
        "dup.conf:2:5: error: 'a' is already declared at line 1 (DUPLICATE_DECLARATION)",
      ]);
    });

    it('exits 0 when only warnings are found', async () => {
      await writeFile('warn.conf', 'let fooBar = 1;\n');
      expect(runCheck(['warn.conf'], io)).toBe(0);
      expect(io.out).toEqual([
        "warn.conf:1:5: warning: Declaration 'fooBar' should use snake_case (e.g., 'foo_bar') (NAMING_SNAKE_CASE)",
      ]);
    });

    it('exits 3 when a file fails to parse', async () => {
      await writeFile('bad.conf', 'let a = ;\n');
      expect(runCheck(['bad.conf'], io)).toBe(3);
      expect(io.out).toEqual([
        "bad.conf:1:9: error: Expected expression, found ';' (SYNTAX_ERROR)",
      ]);
    });

    it('exits 2 for a missing file without other output', () => {
      expect(runCheck(['nope.conf'], io)).toBe(2);
      expect(io.err).toEqual(['Error: File not found: nope.conf']);
      expect(io.out).toEqual([]);
    });

    it('exits 2 for a directory', async () => {
      await fs.mkdir(path.join(tempDir, 'sub'));
      expect(runCheck(['sub'], io)).toBe(2);
      expect(io.err).toEqual(['Error: Path is a directory: sub']);
    });

    it('still reports readable files next to a missing one', async () => {
      await writeFile('clean.conf', 'let a = 1;\n');
      expect(runCheck(['nope.conf', 'clean.conf'], io)).toBe(2);
      expect(io.out).toEqual(['No issues found']);
    });

    it('prints help and version', () => {
      expect(runCheck(['--help'], io)).toBe(0);
      expect(runCheck(['--version'], io)).toBe(0);
      expect(io.out).toEqual([HELP_TEXT, '0.1.0']);
    });

    it('exits 2 on a usage error', () => {
      expect(runCheck(['--bogus', 'a.conf'], io)).toBe(2);
      expect(io.err).toEqual(['Error: Unknown option: --bogus']);
    });
  });

  describe('json output', () => {
    it('prints records with a summary', async () => {
      await writeFile('x.conf', 'let a=1;\n');
      expect(runCheck(['--format', 'json', 'x.conf'], io)).toBe(0);
      expect(io.out).toHaveLength(1);
      expect(JSON.parse(io.out[0] ?? '')).toEqual({
        files: [
          {
            file: 'x.conf',
            status: 'clean',
            diagnostics: [
              {
                file: 'x.conf',
                startLine: 1,
                startColumn: 6,
                endLine: 1,
                endColumn: 7,
                severity: 'info',
                code: 'SPACING_OPERATOR',
                message: "Operator '=' should have exactly one space on each side",
                fixable: true,
              },
            ],
          },
        ],
        summary: { total: 1, errors: 0, warnings: 0, info: 1 },
      });
    });

    it('adds rule categories in verbose mode', async () => {
      await writeFile('x.conf', 'let a=1;\n');
      runCheck(['--format', 'json', '--verbose', 'x.conf'], io);
      expect(io.out[0]).toContain('"category": "formatting"');
    });

    it('prints an empty report when no file could be read', () => {
      expect(runCheck(['--format', 'json', 'nope.conf'], io)).toBe(2);
      expect(JSON.parse(io.out[0] ?? '')).toEqual({
        files: [],
        summary: { total: 0, errors: 0, warnings: 0, info: 0 },
      });
    });
  });

  describe('--fix', () => {
    it('rewrites the file', async () => {
      const filePath = await writeFile('fix.conf', 'let a=1;\n');
      expect(runCheck(['--fix', 'fix.conf'], io)).toBe(0);
      expect(fssync.readFileSync(filePath, 'utf-8')).toBe('let a = 1;\n');
      expect(io.err).toEqual(['Fixed fix.conf in 1 pass']);
      expect(io.out).toEqual(['No issues found']);
    });

    it('reports fix passes in verbose mode', async () => {
      await writeFile('v.conf', 'let a=1;\n');
      runCheck(['--fix', '--verbose', 'v.conf'], io);
      expect(io.err).toEqual([
        'v.conf: fix pass 1 applied 1 edit, 0 conflicts',
        'Fixed v.conf in 1 pass',
      ]);
    });

    it('honors --max-iterations', async () => {
      const filePath = await writeFile('g.conf', 'let a = ((1));\n');
      expect(runCheck(['--fix', '--max-iterations', '1', 'g.conf'], io)).toBe(0);
      expect(fssync.readFileSync(filePath, 'utf-8')).toBe('let a = (1);\n');
      expect(io.out).toEqual([
        'g.conf:1:9: info: Redundant parentheses around expression (REDUNDANT_GROUPING)',
      ]);
    });

    it('leaves conflicting fixes and notes them', async () => {
      const filePath = await writeFile('c.conf', 'let a = (1+2);\n');
      expect(runCheck(['--fix', 'c.conf'], io)).toBe(0);
      expect(fssync.readFileSync(filePath, 'utf-8')).toBe('let a = (1+2);\n');
      expect(io.err).toEqual([]);
      expect(io.out).toEqual([
        [
          'c.conf:1:9: info: Redundant parentheses around expression (REDUNDANT_GROUPING)',
          '  note: fix not applied: conflicts with rule SPACING_OPERATOR',
          "c.conf:1:11: info: Operator '+' should have exactly one space on each side (SPACING_OPERATOR)",
          '  note: fix not applied: conflicts with rule REDUNDANT_GROUPING',
        ].join('\n'),
      ]);
    });

    it('reports a failed write and carries on with the next file', async () => {
      await writeFile('a.conf', 'let a=1;\n');
      const bPath = await writeFile('b.conf', 'let b=2;\n');
      const readOnlyA: Captured = {
        ...io,
        writeFile: (target, text) => {
          if (path.basename(target) === 'a.conf') {
            throw Object.assign(new Error('EROFS: read-only file system'), {
              code: 'EROFS',
            });
          }
          fssync.writeFileSync(target, text, 'utf-8');
        },
      };

      expect(runCheck(['--fix', 'a.conf', 'b.conf'], readOnlyA)).toBe(2);
      expect(io.err).toEqual([
        'Error: Cannot write file: a.conf (EROFS)',
        'Fixed b.conf in 1 pass',
      ]);
      expect(fssync.readFileSync(bPath, 'utf-8')).toBe('let b = 2;\n');
      expect(io.out).toEqual(['No issues found']);
    });

    it('does not touch a file that fails to parse', async () => {
      const filePath = await writeFile('bad.conf', 'let a=1\n');
      expect(runCheck(['--fix', 'bad.conf'], io)).toBe(3);
      expect(fssync.readFileSync(filePath, 'utf-8')).toBe('let a=1\n');
      expect(io.err).toEqual([
        'Cannot apply fixes to bad.conf: file has parse errors',
      ]);
    });
  });

  describe('configuration', () => {
    it('reads .lintel.yaml from the working directory', async () => {
      await writeFile('.lintel.yaml', 'rules:\n  NAMING_SNAKE_CASE: "off"\n');
      await writeFile('a.conf', 'let fooBar = 1;\n');
      expect(runCheck(['a.conf'], io)).toBe(0);
      expect(io.out).toEqual(['No issues found']);
    });

    it('reads an explicit --config file', async () => {
      await writeFile(
        'custom.json',
        JSON.stringify({
          rules: { MAX_LINE_LENGTH: { params: { max: 5 } } },
          severity: { MAX_LINE_LENGTH: 'error' },
        })
      );
      await writeFile('a.conf', 'let a = 1;\n');
      expect(runCheck(['--config', 'custom.json', 'a.conf'], io)).toBe(1);
      expect(io.out).toEqual([
        'a.conf:1:6: error: Line exceeds 5 characters (10) (MAX_LINE_LENGTH)',
      ]);
    });

    it('exits 2 for an invalid rule entry', async () => {
      await writeFile('.lintel.json', '{"rules": {"X": 5}}');
      await writeFile('a.conf', 'let a = 1;\n');
      expect(runCheck(['a.conf'], io)).toBe(2);
      expect(io.err).toEqual([
        `Error: Invalid configuration for rule X: invalid state "5" (must be 'on', 'off', 'warn', or an object)`,
      ]);
      expect(io.out).toEqual([]);
    });

    it('exits 2 for malformed JSON', async () => {
      await writeFile('.lintel.json', '{');
      await writeFile('a.conf', 'let a = 1;\n');
      expect(runCheck(['a.conf'], io)).toBe(2);
      expect(io.err[0]).toMatch(/^Error: Invalid configuration: invalid JSON in /);
    });

    it('exits 2 when the --config file is missing', async () => {
      await writeFile('a.conf', 'let a = 1;\n');
      expect(runCheck(['--config', 'missing.json', 'a.conf'], io)).toBe(2);
      expect(io.err).toEqual([
        `Error: Cannot read configuration file ${path.join(tempDir, 'missing.json')}: file not found`,
      ]);
    });

    it('warns about unknown rules and carries on', async () => {
      await writeFile('.lintel.json', '{"rules": {"NOPE": "on"}}');
      await writeFile('a.conf', 'let a = 1;\n');
      expect(runCheck(['a.conf'], io)).toBe(0);
      expect(io.err).toEqual(['Warning: Unknown rule in configuration: NOPE']);
    });
  });
});
