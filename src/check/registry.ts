/**
 * Rule Registry
 * Holds the rule catalog and resolves it against configuration.
 */

import { ConfigError, DuplicateRuleError } from '../error-classes.js';
import { assertValidConfig } from './config.js';
import type {
  LintConfig,
  Rule,
  RuleParams,
  RuleSettings,
  Severity,
} from './types.js';

// ============================================================
// RESOLVED RULE SET
// ============================================================

/** A rule that is enabled for this run, with its effective settings */
export interface ActiveRule<K extends string = string> {
  readonly rule: Rule<K>;
  readonly severity: Severity;
  readonly params: RuleParams;
}

/**
 * Rules active for a run, indexed by node kind.
 * Immutable after resolution; safe to share between files.
 */
export interface ResolvedRuleSet<K extends string = string> {
  /** Active rules in registration order */
  readonly rules: readonly ActiveRule<K>[];
  /** Configuration entries that name no registered rule */
  readonly warnings: readonly string[];
  /** Active rules subscribed to a kind, in registration order */
  rulesFor(kind: K): readonly ActiveRule<K>[];
  get(code: string): ActiveRule<K> | undefined;
  isActive(code: string): boolean;
}

const NO_RULES: readonly never[] = Object.freeze([]);

class ResolvedRuleSetImpl<K extends string> implements ResolvedRuleSet<K> {
  readonly rules: readonly ActiveRule<K>[];
  readonly warnings: readonly string[];
  private readonly byKind: ReadonlyMap<K, readonly ActiveRule<K>[]>;
  private readonly byCode: ReadonlyMap<string, ActiveRule<K>>;

  constructor(rules: ActiveRule<K>[], warnings: string[]) {
    const byKind = new Map<K, ActiveRule<K>[]>();
    const byCode = new Map<string, ActiveRule<K>>();

    for (const active of rules) {
      byCode.set(active.rule.code, active);
      for (const kind of new Set(active.rule.nodeTypes)) {
        const list = byKind.get(kind);
        if (list) {
          list.push(active);
        } else {
          byKind.set(kind, [active]);
        }
      }
    }

    for (const list of byKind.values()) {
      Object.freeze(list);
    }

    this.rules = Object.freeze(rules);
    this.warnings = Object.freeze(warnings);
    this.byKind = byKind;
    this.byCode = byCode;
    Object.freeze(this);
  }

  rulesFor(kind: K): readonly ActiveRule<K>[] {
    return this.byKind.get(kind) ?? NO_RULES;
  }

  get(code: string): ActiveRule<K> | undefined {
    return this.byCode.get(code);
  }

  isActive(code: string): boolean {
    return this.byCode.has(code);
  }
}

// ============================================================
// REGISTRY
// ============================================================

/**
 * Catalog of rules, keyed by code.
 * Registration order is kept and becomes the dispatch order.
 *
 * @example
 * ```typescript
 * const registry = new RuleRegistry(CONF_RULES);
 * const ruleSet = registry.resolve({ rules: { MAX_LINE_LENGTH: { params: { max: 80 } } } });
 * ```
 */
export class RuleRegistry<K extends string = string> {
  private readonly byCode = new Map<string, Rule<K>>();

  constructor(rules: readonly Rule<K>[] = []) {
    for (const rule of rules) {
      this.register(rule);
    }
  }

  /**
   * Add a rule to the catalog.
   * @throws DuplicateRuleError if a rule with the same code is registered
   */
  register(rule: Rule<K>): this {
    if (this.byCode.has(rule.code)) {
      throw new DuplicateRuleError(rule.code);
    }
    this.byCode.set(rule.code, rule);
    return this;
  }

  has(code: string): boolean {
    return this.byCode.has(code);
  }

  get(code: string): Rule<K> | undefined {
    return this.byCode.get(code);
  }

  /** Registered rules in registration order */
  list(): Rule<K>[] {
    return [...this.byCode.values()];
  }

  get size(): number {
    return this.byCode.size;
  }

  /**
   * Resolve the active rule set for a configuration.
   *
   * Rules not mentioned in configuration keep their defaults. Entries naming
   * unknown rules become warnings rather than failures.
   *
   * @throws ConfigError if the configuration or any rule's parameters are invalid
   */
  resolve(config: LintConfig): ResolvedRuleSet<K> {
    assertValidConfig(config);

    const warnings: string[] = [];
    for (const code of Object.keys(config.rules)) {
      if (!this.byCode.has(code)) {
        warnings.push(`Unknown rule in configuration: ${code}`);
      }
    }

    const active: ActiveRule<K>[] = [];
    for (const rule of this.byCode.values()) {
      const settings: RuleSettings | undefined = Object.hasOwn(
        config.rules,
        rule.code
      )
        ? config.rules[rule.code]
        : undefined;

      if (!(settings?.enabled ?? rule.enabled)) {
        continue;
      }

      const params: RuleParams = Object.freeze({
        ...rule.defaults,
        ...settings?.params,
      });

      const problems = rule.validateParams?.(params) ?? [];
      if (problems.length > 0) {
        throw new ConfigError('LINT-C004', {
          code: rule.code,
          reason: problems.join('; '),
        });
      }

      active.push(
        Object.freeze({
          rule,
          severity: settings?.severity ?? rule.severity,
          params,
        })
      );
    }

    return new ResolvedRuleSetImpl(active, warnings);
  }
}
