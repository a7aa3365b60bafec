/**
 * Configuration
 * Validation and normalization of lint configuration values.
 */

import { ConfigError } from '../error-classes.js';
import type {
  LintConfig,
  Rule,
  RuleParams,
  RuleSettings,
  RuleState,
  Severity,
} from './types.js';

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

/**
 * Create a configuration that states every rule's defaults explicitly.
 * Resolving it gives the same rule set as an empty configuration.
 */
export function createDefaultConfig(
  rules: readonly Pick<Rule, 'code' | 'enabled' | 'severity'>[]
): LintConfig {
  const settings: Record<string, RuleSettings> = {};

  for (const rule of rules) {
    settings[rule.code] = { enabled: rule.enabled, severity: rule.severity };
  }

  return { rules: settings };
}

// ============================================================
// TYPE GUARDS
// ============================================================

/**
 * Validate that a value is a valid RuleState.
 */
export function isRuleState(value: unknown): value is RuleState {
  return value === 'on' || value === 'off' || value === 'warn';
}

/**
 * Validate that a value is a valid Severity.
 */
export function isSeverity(value: unknown): value is Severity {
  return value === 'error' || value === 'warning' || value === 'info';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================
// VALIDATION
// ============================================================

/**
 * Validate one rule's settings object.
 * Throws ConfigError naming the rule if any field is invalid.
 */
function validateSettings(code: string, settings: unknown): RuleSettings {
  if (!isRecord(settings)) {
    throw new ConfigError('LINT-C003', {
      code,
      reason: 'settings must be an object',
    });
  }

  for (const key of Object.keys(settings)) {
    if (key !== 'enabled' && key !== 'severity' && key !== 'params') {
      throw new ConfigError('LINT-C003', {
        code,
        reason: `unknown field "${key}"`,
      });
    }
  }

  const { enabled, severity, params } = settings;

  if (enabled !== undefined && typeof enabled !== 'boolean') {
    throw new ConfigError('LINT-C003', {
      code,
      reason: 'enabled must be a boolean',
    });
  }

  if (severity !== undefined && !isSeverity(severity)) {
    throw new ConfigError('LINT-C003', {
      code,
      reason: `invalid severity "${String(severity)}" (must be 'error', 'warning', or 'info')`,
    });
  }

  if (params !== undefined && !isRecord(params)) {
    throw new ConfigError('LINT-C003', {
      code,
      reason: 'params must be an object',
    });
  }

  const result: { enabled?: boolean; severity?: Severity; params?: RuleParams } =
    {};
  if (enabled !== undefined) result.enabled = enabled;
  if (severity !== undefined) result.severity = severity;
  if (params !== undefined) result.params = { ...params };
  return result;
}

/**
 * Validate configuration structure and values.
 * Throws ConfigError if configuration is invalid.
 */
export function assertValidConfig(value: unknown): asserts value is LintConfig {
  if (!isRecord(value)) {
    throw new ConfigError('LINT-C002', { reason: 'must be an object' });
  }
  if (!isRecord(value['rules'])) {
    throw new ConfigError('LINT-C002', { reason: 'rules must be an object' });
  }
  for (const [code, settings] of Object.entries(value['rules'])) {
    validateSettings(code, settings);
  }
}

// ============================================================
// NORMALIZATION
// ============================================================

/**
 * Expand a rule state shorthand into settings.
 * 'warn' enables the rule at warning severity.
 */
function settingsFromState(state: RuleState): RuleSettings {
  switch (state) {
    case 'on':
      return { enabled: true };
    case 'off':
      return { enabled: false };
    case 'warn':
      return { enabled: true, severity: 'warning' };
  }
}

/**
 * Turn a parsed configuration document into a LintConfig.
 *
 * Accepted shape:
 * ```json
 * {
 *   "rules": { "NAMING_SNAKE_CASE": "off", "MAX_LINE_LENGTH": { "params": { "max": 80 } } },
 *   "severity": { "TRAILING_WHITESPACE": "error" }
 * }
 * ```
 * Rule entries are 'on' | 'off' | 'warn' or settings objects. The optional
 * `severity` section overrides the severity of the named rules.
 *
 * @throws ConfigError with "Invalid configuration: {reason}" for structural problems
 * @throws ConfigError naming the rule for invalid rule entries
 */
export function normalizeConfig(data: unknown): LintConfig {
  if (data === null || data === undefined) {
    return { rules: {} };
  }
  if (!isRecord(data)) {
    throw new ConfigError('LINT-C002', { reason: 'must be an object' });
  }

  for (const key of Object.keys(data)) {
    if (key !== 'rules' && key !== 'severity') {
      throw new ConfigError('LINT-C002', { reason: `unknown field "${key}"` });
    }
  }

  const rules: Record<string, RuleSettings> = {};

  // Validate rules field if present
  if ('rules' in data) {
    if (!isRecord(data['rules'])) {
      throw new ConfigError('LINT-C002', { reason: 'rules must be an object' });
    }
    for (const [code, entry] of Object.entries(data['rules'])) {
      if (isRuleState(entry)) {
        rules[code] = settingsFromState(entry);
      } else if (isRecord(entry)) {
        rules[code] = validateSettings(code, entry);
      } else {
        throw new ConfigError('LINT-C003', {
          code,
          reason: `invalid state "${String(entry)}" (must be 'on', 'off', 'warn', or an object)`,
        });
      }
    }
  }

  // Validate severity field if present
  if ('severity' in data) {
    if (!isRecord(data['severity'])) {
      throw new ConfigError('LINT-C002', {
        reason: 'severity must be an object',
      });
    }
    for (const [code, severity] of Object.entries(data['severity'])) {
      if (!isSeverity(severity)) {
        throw new ConfigError('LINT-C003', {
          code,
          reason: `invalid severity "${String(severity)}" (must be 'error', 'warning', or 'info')`,
        });
      }
      rules[code] = { ...rules[code], severity };
    }
  }

  return { rules };
}
