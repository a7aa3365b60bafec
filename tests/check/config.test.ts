/**
 * Configuration Tests
 */

import { describe, expect, it } from 'vitest';
import {
  assertValidConfig,
  createDefaultConfig,
  isRuleState,
  isSeverity,
  normalizeConfig,
} from '../../src/check/config.js';
import { RuleRegistry } from '../../src/check/registry.js';
import { ConfigError } from '../../src/error-classes.js';
import { makeRule } from '../helpers/conf.js';

describe('normalizeConfig', () => {
  it('returns an empty configuration for null', () => {
    expect(normalizeConfig(null)).toEqual({ rules: {} });
    expect(normalizeConfig(undefined)).toEqual({ rules: {} });
  });

  it('expands rule state shorthand', () => {
    expect(
      normalizeConfig({ rules: { A: 'off', B: 'warn', C: 'on' } })
    ).toEqual({
      rules: {
        A: { enabled: false },
        B: { enabled: true, severity: 'warning' },
        C: { enabled: true },
      },
    });
  });

  it('accepts settings objects', () => {
    expect(
      normalizeConfig({
        rules: { A: { enabled: true, severity: 'info', params: { max: 3 } } },
      })
    ).toEqual({
      rules: { A: { enabled: true, severity: 'info', params: { max: 3 } } },
    });
  });

  it('merges the severity section into rule settings', () => {
    expect(
      normalizeConfig({ rules: { A: 'on' }, severity: { A: 'error', B: 'info' } })
    ).toEqual({
      rules: {
        A: { enabled: true, severity: 'error' },
        B: { severity: 'info' },
      },
    });
  });

  it('rejects unknown top-level fields', () => {
    expect(() => normalizeConfig({ extra: true })).toThrow(
      'Invalid configuration: unknown field "extra"'
    );
  });

  it('rejects a non-object document', () => {
    expect(() => normalizeConfig([1, 2])).toThrow(
      'Invalid configuration: must be an object'
    );
  });

  it('rejects an invalid rule state', () => {
    let error: unknown;
    try {
      normalizeConfig({ rules: { A: 'loud' } });
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(ConfigError);
    if (!(error instanceof ConfigError)) return;
    expect(error.errorId).toBe('LINT-C003');
    expect(error.message).toBe(
      `Invalid configuration for rule A: invalid state "loud" (must be 'on', 'off', 'warn', or an object)`
    );
  });

  it.each([
    [{ enabled: 'yes' }, 'enabled must be a boolean'],
    [{ params: 5 }, 'params must be an object'],
    [{ level: 'high' }, 'unknown field "level"'],
  ])('rejects invalid settings %j', (settings, reason) => {
    expect(() => normalizeConfig({ rules: { A: settings } })).toThrow(
      `Invalid configuration for rule A: ${reason}`
    );
  });
});

describe('assertValidConfig', () => {
  it('requires a rules object', () => {
    expect(() => assertValidConfig({ rules: [] })).toThrow(
      'Invalid configuration: rules must be an object'
    );
    expect(() => assertValidConfig('rules')).toThrow(
      'Invalid configuration: must be an object'
    );
  });

  it('accepts a valid configuration', () => {
    expect(() =>
      assertValidConfig({ rules: { A: { enabled: false } } })
    ).not.toThrow();
  });
});

describe('createDefaultConfig', () => {
  it('resolves to the same rule set as an empty configuration', () => {
    const rules = [
      makeRule('A'),
      makeRule('B', { enabled: false, severity: 'error' }),
    ];
    const registry = new RuleRegistry(rules);
    const explicit = registry.resolve(createDefaultConfig(rules));
    const implicit = registry.resolve({ rules: {} });

    expect(createDefaultConfig(rules)).toEqual({
      rules: {
        A: { enabled: true, severity: 'warning' },
        B: { enabled: false, severity: 'error' },
      },
    });
    expect(explicit.rules.map((a) => [a.rule.code, a.severity])).toEqual(
      implicit.rules.map((a) => [a.rule.code, a.severity])
    );
  });
});

describe('type guards', () => {
  it('recognizes rule states and severities', () => {
    expect(['on', 'off', 'warn', 'error'].map(isRuleState)).toEqual([
      true,
      true,
      true,
      false,
    ]);
    expect(['error', 'warning', 'info', 'warn'].map(isSeverity)).toEqual([
      true,
      true,
      true,
      false,
    ]);
  });
});
