/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import { readFileSync } from 'node:fs';
import { LintError } from './error-classes.js';

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: unknown): string {
  if (err instanceof LintError) {
    return `Error: ${err.toData().message}`;
  }

  if (err instanceof Error) {
    return `Error: ${err.message}`;
  }
  return `Error: ${String(err)}`;
}

/**
 * Format a failure to read or write an input file, naming it as the user gave it
 */
export function formatFileError(
  err: unknown,
  file: string,
  action: 'read' | 'write' = 'read'
): string {
  const code =
    err instanceof Error && 'code' in err && typeof err.code === 'string'
      ? err.code
      : undefined;
  if (action === 'write') {
    return `Error: Cannot write file: ${file}${code !== undefined ? ` (${code})` : ''}`;
  }
  if (code === 'ENOENT') {
    return `Error: File not found: ${file}`;
  }
  if (code === 'EISDIR') {
    return `Error: Path is a directory: ${file}`;
  }
  return `Error: Cannot read file: ${file}`;
}

/**
 * Package version from the package.json above the source tree.
 */
export function readVersion(): string {
  const url = new URL('../package.json', import.meta.url);
  const data: unknown = JSON.parse(readFileSync(url, 'utf-8'));
  if (
    typeof data === 'object' &&
    data !== null &&
    'version' in data &&
    typeof data.version === 'string'
  ) {
    return data.version;
  }
  return '0.0.0';
}

/** `count` followed by the noun, pluralized with `s` */
export function plural(count: number, noun: string, suffix = 's'): string {
  return `${count} ${noun}${count === 1 ? '' : suffix}`;
}
