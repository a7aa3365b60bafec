#!/usr/bin/env node
/**
 * CLI Check Entry Point
 *
 * Implements argument parsing for lintel.
 * Lints conf files against the built-in rules, optionally fixing them in place.
 */

import { readFileSync, statSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import {
  createLinter,
  toDiagnosticRecord,
  type Diagnostic,
  type LintCallbacks,
  type Linter,
  type RunStatus,
} from './check/index.js';
import { CONF_RULES } from './check/rules/index.js';
import { confParser, type ConfNodeKind } from './parser/index.js';
import { loadConfig } from './cli-config.js';
import {
  formatError,
  formatFileError,
  plural,
  readVersion,
} from './cli-shared.js';

/** Exit codes */
export const EXIT_CODES = {
  CLEAN: 0,
  VIOLATIONS: 1,
  USAGE: 2,
  PARSE_FAILED: 3,
} as const;

export type OutputFormat = 'text' | 'json';

/**
 * Parsed command-line arguments for lintel
 */
export type ParsedCheckArgs =
  | {
      mode: 'check';
      files: string[];
      fix: boolean;
      verbose: boolean;
      format: OutputFormat;
      config: string | null;
      maxIterations: number | null;
    }
  | { mode: 'help' }
  | { mode: 'version' };

export const HELP_TEXT = `lintel - Lint conf files

Usage: lintel [options] <file...>

Options:
  --fix                  Apply automatic fixes in place
  --format <fmt>         Output format: text (default) or json
  --config <path>        Configuration file (default: .lintel.json, .lintel.yaml or .lintel.yml)
  --max-iterations <n>   Upper bound on fix passes (default 10)
  --verbose              Report fix passes, conflicts and rule failures
  -h, --help             Show this help message
  -v, --version          Show version number

Exit codes:
  0  no violations
  1  violations found
  2  usage, configuration or file error
  3  a file failed to parse`;

/** Flags followed by a value */
const VALUE_FLAGS: ReadonlySet<string> = new Set([
  '--format',
  '--config',
  '--max-iterations',
]);

const SWITCH_FLAGS: ReadonlySet<string> = new Set([
  '--help',
  '-h',
  '--version',
  '-v',
  '--fix',
  '--verbose',
]);

/**
 * Parse command-line arguments for lintel
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 * @throws Error for unknown options, missing values or missing files
 */
export function parseCheckArgs(argv: string[]): ParsedCheckArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const values = new Map<string, string>();
  const files: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (VALUE_FLAGS.has(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new Error(`${arg} requires an argument`);
      }
      values.set(arg, value);
      i++;
      continue;
    }

    if (SWITCH_FLAGS.has(arg)) {
      continue;
    }

    if (arg.startsWith('-') && arg !== '-') {
      throw new Error(`Unknown option: ${arg}`);
    }

    files.push(arg);
  }

  let format: OutputFormat = 'text';
  const formatValue = values.get('--format');
  if (formatValue !== undefined) {
    if (formatValue !== 'text' && formatValue !== 'json') {
      throw new Error(`Invalid format: ${formatValue}. Expected text or json`);
    }
    format = formatValue;
  }

  let maxIterations: number | null = null;
  const iterationsValue = values.get('--max-iterations');
  if (iterationsValue !== undefined) {
    if (!/^\d+$/.test(iterationsValue)) {
      throw new Error(
        `Invalid --max-iterations: ${iterationsValue}. Expected a non-negative integer`
      );
    }
    maxIterations = Number(iterationsValue);
  }

  if (files.length === 0) {
    throw new Error('Missing file argument');
  }

  return {
    mode: 'check',
    files,
    fix: argv.includes('--fix'),
    verbose: argv.includes('--verbose'),
    format,
    config: values.get('--config') ?? null,
    maxIterations,
  };
}

// ============================================================
// RESULT FORMATTING
// ============================================================

/** Outcome for one file on the command line */
export interface FileReport {
  readonly file: string;
  readonly status: RunStatus;
  readonly diagnostics: readonly Diagnostic[];
}

/**
 * Format results for output
 *
 * Text format: file:line:col: severity: message (code), notes indented below
 * JSON format: files with their diagnostics, plus a severity summary
 */
export function formatReports(
  reports: readonly FileReport[],
  format: OutputFormat,
  verbose: boolean
): string {
  if (format === 'json') {
    return formatReportsJSON(reports, verbose);
  }
  return formatReportsText(reports);
}

function formatReportsText(reports: readonly FileReport[]): string {
  const lines: string[] = [];
  for (const report of reports) {
    for (const d of report.diagnostics) {
      const { line, column } = d.location;
      lines.push(
        `${report.file}:${line}:${column}: ${d.severity}: ${d.message} (${d.code})`
      );
      for (const note of d.notes) {
        lines.push(`  note: ${note}`);
      }
    }
  }
  return lines.length === 0 ? 'No issues found' : lines.join('\n');
}

function formatReportsJSON(
  reports: readonly FileReport[],
  verbose: boolean
): string {
  const categories = new Map<string, string>();
  for (const rule of CONF_RULES) {
    categories.set(rule.code, rule.category);
  }

  const all = reports.flatMap((report) => report.diagnostics);
  const output = {
    files: reports.map((report) => ({
      file: report.file,
      status: report.status,
      diagnostics: report.diagnostics.map((d) => {
        const entry: Record<string, unknown> = {
          ...toDiagnosticRecord(d),
          fixable: d.fix !== null,
        };
        if (d.notes.length > 0) {
          entry['notes'] = [...d.notes];
        }
        if (verbose) {
          const category = categories.get(d.code);
          if (category !== undefined) {
            entry['category'] = category;
          }
        }
        return entry;
      }),
    })),
    summary: {
      total: all.length,
      errors: all.filter((d) => d.severity === 'error').length,
      warnings: all.filter((d) => d.severity === 'warning').length,
      info: all.filter((d) => d.severity === 'info').length,
    },
  };

  return JSON.stringify(output, null, 2);
}

/**
 * Exit code for a run.
 * A file error outranks a parse failure, which outranks violations.
 */
export function exitCodeFor(
  reports: readonly FileReport[],
  fileErrors: number
): number {
  if (fileErrors > 0) return EXIT_CODES.USAGE;
  if (reports.some((r) => r.status === 'parse-failed')) {
    return EXIT_CODES.PARSE_FAILED;
  }
  if (reports.some((r) => r.status === 'violations')) {
    return EXIT_CODES.VIOLATIONS;
  }
  return EXIT_CODES.CLEAN;
}

// ============================================================
// RUN
// ============================================================

/** Process environment for one CLI run */
export interface CheckIO {
  readonly cwd: string;
  stdout(text: string): void;
  stderr(text: string): void;
  /** Writes fixed text back; defaults to the file system */
  writeFile?(path: string, text: string): void;
}

function writeToDisk(path: string, text: string): void {
  writeFileSync(path, text, 'utf-8');
}

function createCallbacks(io: CheckIO, verbose: boolean): LintCallbacks {
  const callbacks: LintCallbacks = {
    onConfigWarning: (message) => io.stderr(`Warning: ${message}`),
  };
  if (!verbose) {
    return callbacks;
  }

  return {
    ...callbacks,
    onRuleError: (event) =>
      io.stderr(`${event.file ?? '<input>'}: ${event.error.message}`),
    onFixIteration: (event) =>
      io.stderr(
        `${event.file ?? '<input>'}: fix pass ${event.iteration} applied ${plural(event.applied, 'edit')}, ${plural(event.conflicts, 'conflict')}`
      ),
    onFixConflict: (event) =>
      io.stderr(`${event.file ?? '<input>'}: ${event.error.message}`),
    onFixRejected: (event) =>
      io.stderr(
        `${event.file ?? '<input>'}: discarded fixes from ${event.codes.join(', ')}: ${event.error.message}`
      ),
  };
}

/** Lint or fix one file; null when the fixed text could not be written */
function checkFile(
  linter: Linter<ConfNodeKind>,
  args: Extract<ParsedCheckArgs, { mode: 'check' }>,
  file: string,
  source: string,
  path: string,
  io: CheckIO
): FileReport | null {
  if (!args.fix) {
    const result = linter.lint(source, { file });
    return { file, status: result.status, diagnostics: result.diagnostics };
  }

  const result = linter.fix(source, {
    file,
    maxIterations: args.maxIterations ?? undefined,
  });

  if (result.status === 'parse-failed' && !result.changed) {
    io.stderr(`Cannot apply fixes to ${file}: file has parse errors`);
  }
  if (result.changed) {
    try {
      (io.writeFile ?? writeToDisk)(path, result.correctedText);
    } catch (err) {
      io.stderr(formatFileError(err, file, 'write'));
      return null;
    }
    io.stderr(
      `Fixed ${file} in ${plural(result.iterationsUsed, 'pass', 'es')}`
    );
  }

  return {
    file,
    status: result.status,
    diagnostics: result.remainingDiagnostics,
  };
}

/**
 * Run lintel with the given arguments.
 * Results go to stdout, status messages and errors to stderr.
 *
 * @returns Process exit code
 */
export function runCheck(argv: string[], io: CheckIO): number {
  let args: ParsedCheckArgs;
  try {
    args = parseCheckArgs(argv);
  } catch (err) {
    io.stderr(formatError(err));
    return EXIT_CODES.USAGE;
  }

  if (args.mode === 'help') {
    io.stdout(HELP_TEXT);
    return EXIT_CODES.CLEAN;
  }

  if (args.mode === 'version') {
    io.stdout(readVersion());
    return EXIT_CODES.CLEAN;
  }

  // Configuration problems are fatal before any file is read
  let linter: Linter<ConfNodeKind>;
  try {
    const config = loadConfig(io.cwd, args.config) ?? { rules: {} };
    linter = createLinter({
      parser: confParser,
      rules: CONF_RULES,
      config,
      callbacks: createCallbacks(io, args.verbose),
    });
  } catch (err) {
    io.stderr(formatError(err));
    return EXIT_CODES.USAGE;
  }

  const reports: FileReport[] = [];
  let fileErrors = 0;

  for (const file of args.files) {
    const path = resolve(io.cwd, file);
    let source: string;
    try {
      if (statSync(path).isDirectory()) {
        io.stderr(`Error: Path is a directory: ${file}`);
        fileErrors++;
        continue;
      }
      source = readFileSync(path, 'utf-8');
    } catch (err) {
      io.stderr(formatFileError(err, file));
      fileErrors++;
      continue;
    }
    const report = checkFile(linter, args, file, source, path, io);
    if (report === null) {
      fileErrors++;
      continue;
    }
    reports.push(report);
  }

  // Text output has nothing to add when every file failed to load
  if (args.format === 'json' || reports.length > 0) {
    io.stdout(formatReports(reports, args.format, args.verbose));
  }
  return exitCodeFor(reports, fileErrors);
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

function main(): void {
  process.exitCode = runCheck(process.argv.slice(2), {
    cwd: process.cwd(),
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
  });
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
