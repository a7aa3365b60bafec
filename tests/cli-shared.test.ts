/**
 * CLI Shared Utilities Tests
 */

import { describe, expect, it } from 'vitest';
import {
  formatError,
  formatFileError,
  plural,
  readVersion,
} from '../src/cli-shared.js';
import { ConfigError } from '../src/error-classes.js';

function errnoError(code: string): Error {
  return Object.assign(new Error(`${code}: failed`), { code });
}

describe('formatError', () => {
  it('formats library errors without their location', () => {
    expect(formatError(new ConfigError('LINT-C002', { reason: 'bad' }))).toBe(
      'Error: Invalid configuration: bad'
    );
  });

  it('formats other values', () => {
    expect(formatError(new Error('oops'))).toBe('Error: oops');
    expect(formatError('plain')).toBe('Error: plain');
  });
});

describe('formatFileError', () => {
  it('names the file as given', () => {
    expect(formatFileError(errnoError('ENOENT'), 'a.conf')).toBe(
      'Error: File not found: a.conf'
    );
    expect(formatFileError(errnoError('EISDIR'), 'dir')).toBe(
      'Error: Path is a directory: dir'
    );
    expect(formatFileError(errnoError('EACCES'), 'a.conf')).toBe(
      'Error: Cannot read file: a.conf'
    );
  });

  it('reports write failures with their error code', () => {
    expect(formatFileError(errnoError('EACCES'), 'a.conf', 'write')).toBe(
      'Error: Cannot write file: a.conf (EACCES)'
    );
    expect(formatFileError(new Error('gone'), 'a.conf', 'write')).toBe(
      'Error: Cannot write file: a.conf'
    );
  });
});

describe('plural', () => {
  it('adds the suffix unless the count is one', () => {
    expect(plural(1, 'edit')).toBe('1 edit');
    expect(plural(0, 'edit')).toBe('0 edits');
    expect(plural(2, 'pass', 'es')).toBe('2 passes');
  });
});

describe('readVersion', () => {
  it('reads the package version', () => {
    expect(readVersion()).toBe('0.1.0');
  });
});
