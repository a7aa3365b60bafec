/**
 * Scratch Slots
 * Typed per-traversal state for rules that need to remember earlier nodes.
 */

/**
 * A slot declared once by a rule module and read through `context.scratch()`.
 *
 * Values are keyed by the traversal's rule context, so each file (and each
 * pass of a fix loop) starts from `init()` and nothing outlives the traversal.
 *
 * @example
 * ```typescript
 * const SEEN = new ScratchSlot(() => new Map<string, SourceLocation>());
 * const seen = context.scratch(SEEN);
 * ```
 */
export class ScratchSlot<T> {
  private readonly values = new WeakMap<object, { value: T }>();

  constructor(private readonly init: () => T) {}

  /** Value for a traversal owner, creating it on first access */
  resolve(owner: object): T {
    const existing = this.values.get(owner);
    if (existing) {
      return existing.value;
    }
    const created = { value: this.init() };
    this.values.set(owner, created);
    return created.value;
  }
}
