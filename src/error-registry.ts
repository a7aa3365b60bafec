/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'config' | 'parse' | 'rule' | 'fix';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: LINT-{category letter}{3-digit} (e.g., LINT-C001) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Registry of all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

const CATEGORY_PREFIX: Record<ErrorCategory, string> = {
  config: 'C',
  parse: 'P',
  rule: 'R',
  fix: 'F',
};

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      const prefix = `LINT-${CATEGORY_PREFIX[def.category]}`;
      if (!def.errorId.startsWith(prefix)) {
        throw new TypeError(
          `Error ID ${def.errorId} does not match category ${def.category}`
        );
      }
      if (idMap.has(def.errorId)) {
        throw new TypeError(`Duplicate error ID: ${def.errorId}`);
      }
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Configuration Errors (LINT-C0xx)
  {
    errorId: 'LINT-C001',
    category: 'config',
    description: 'Duplicate rule',
    messageTemplate: 'Rule {code} is already registered',
    resolution: 'Give every rule in the catalog a unique code.',
  },
  {
    errorId: 'LINT-C002',
    category: 'config',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration: {reason}',
  },
  {
    errorId: 'LINT-C003',
    category: 'config',
    description: 'Invalid rule setting',
    messageTemplate: 'Invalid configuration for rule {code}: {reason}',
    resolution:
      "Use 'on', 'off', 'warn' or an object with enabled, severity and params.",
  },
  {
    errorId: 'LINT-C004',
    category: 'config',
    description: 'Invalid rule parameters',
    messageTemplate: 'Invalid parameters for rule {code}: {reason}',
  },
  {
    errorId: 'LINT-C005',
    category: 'config',
    description: 'Unreadable configuration file',
    messageTemplate: 'Cannot read configuration file {path}: {reason}',
  },

  // Parse Errors (LINT-P0xx)
  {
    errorId: 'LINT-P001',
    category: 'parse',
    description: 'Syntax error',
    messageTemplate: '{message}',
  },
  {
    errorId: 'LINT-P002',
    category: 'parse',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    resolution: 'Close the string with a double quote on the same line.',
  },
  {
    errorId: 'LINT-P003',
    category: 'parse',
    description: 'Invalid character',
    messageTemplate: 'Unexpected character {char}',
  },
  {
    errorId: 'LINT-P004',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'Expected {expected}, found {found}',
  },
  {
    errorId: 'LINT-P005',
    category: 'parse',
    description: 'Parser failure',
    messageTemplate: 'Parser failed: {reason}',
  },
  {
    errorId: 'LINT-P006',
    category: 'parse',
    description: 'Malformed tree',
    messageTemplate: 'Parser produced a malformed tree: {reason}',
  },

  // Rule Errors (LINT-R0xx)
  {
    errorId: 'LINT-R001',
    category: 'rule',
    description: 'Rule failure',
    messageTemplate: 'Rule {code} failed on {kind}: {reason}',
  },
  {
    errorId: 'LINT-R002',
    category: 'rule',
    description: 'Invalid rule report',
    messageTemplate: 'Rule {code} returned an invalid report: {reason}',
  },

  // Fix Errors (LINT-F0xx)
  {
    errorId: 'LINT-F001',
    category: 'fix',
    description: 'Fix conflict',
    messageTemplate: 'Fix from {first} conflicts with fix from {second}',
    resolution: 'Run fixes again after resolving one of the two diagnostics.',
  },
];

/** Registry of every error the library raises */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Replace `{name}` placeholders with values from context.
 * Missing keys render as the literal placeholder.
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, key: string) => {
    if (!Object.hasOwn(context, key)) {
      return placeholder;
    }
    const value = context[key];
    return typeof value === 'string' ? value : String(value);
  });
}
