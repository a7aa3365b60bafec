/**
 * CLI Configuration Loader
 * Finds and reads .lintel.json / .lintel.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { extname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { normalizeConfig, type LintConfig } from './check/index.js';
import { ConfigError } from './error-classes.js';

/** Configuration files looked up in the working directory, in order */
export const CONFIG_FILE_NAMES = [
  '.lintel.json',
  '.lintel.yaml',
  '.lintel.yml',
] as const;

/**
 * First configuration file present in `cwd`, or null.
 */
export function findConfigFile(cwd: string): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const path = resolve(cwd, name);
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

/**
 * Parse configuration text; the format follows the file extension.
 * YAML for .yaml and .yml, JSON otherwise.
 *
 * @throws ConfigError if the text is not valid JSON or YAML
 */
export function parseConfigText(text: string, path: string): unknown {
  const ext = extname(path).toLowerCase();
  const isYaml = ext === '.yaml' || ext === '.yml';
  try {
    return isYaml ? parseYaml(text) : JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(
      'LINT-C002',
      { reason: `invalid ${isYaml ? 'YAML' : 'JSON'} in ${path} (${detail})` },
      { cause: err }
    );
  }
}

/**
 * Load configuration for a run.
 *
 * With `explicitPath` that file must exist. Otherwise the first of
 * CONFIG_FILE_NAMES in `cwd` is used, and null is returned when none exists.
 *
 * @throws ConfigError if the file cannot be read or is invalid
 */
export function loadConfig(
  cwd: string,
  explicitPath?: string | null
): LintConfig | null {
  const path =
    explicitPath !== undefined && explicitPath !== null
      ? resolve(cwd, explicitPath)
      : findConfigFile(cwd);

  if (path === null) {
    return null;
  }

  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    const reason =
      err instanceof Error && 'code' in err && err.code === 'ENOENT'
        ? 'file not found'
        : err instanceof Error
          ? err.message
          : String(err);
    throw new ConfigError('LINT-C005', { path, reason }, { cause: err });
  }

  return normalizeConfig(parseConfigText(text, path));
}
