/**
 * Tree Visitor
 * Iterative pre-order traversal and the per-traversal upward lookup.
 */

import type { SyntaxNode } from '../syntax-tree.js';

// ============================================================
// VISITOR FUNCTION
// ============================================================

/**
 * Callback invoked for each node in pre-order.
 * `parent` is null and `index` is 0 for the root.
 */
export type EnterCallback<K extends string> = (
  node: SyntaxNode<K>,
  parent: SyntaxNode<K> | null,
  index: number
) => void;

/**
 * Visit every node depth-first, parents before children, children in order.
 * Uses an explicit stack, so tree depth is not limited by the call stack.
 */
export function visitTree<K extends string>(
  root: SyntaxNode<K>,
  enter: EnterCallback<K>
): void {
  const stack: Array<{
    node: SyntaxNode<K>;
    parent: SyntaxNode<K> | null;
    index: number;
  }> = [{ node: root, parent: null, index: 0 }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (frame === undefined) break;

    enter(frame.node, frame.parent, frame.index);

    // Push in reverse so the first child is visited next
    const children = frame.node.children;
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child !== undefined) {
        stack.push({ node: child, parent: frame.node, index: i });
      }
    }
  }
}

// ============================================================
// TRAVERSAL INDEX
// ============================================================

/**
 * Pre-order node list plus parent and sibling-index lookups for one traversal.
 * Discarded with the traversal; never stored on nodes.
 */
export interface TraversalIndex<K extends string> {
  readonly order: readonly SyntaxNode<K>[];
  parent(node: SyntaxNode<K>): SyntaxNode<K> | null;
  siblingIndex(node: SyntaxNode<K>): number;
  ancestors(node: SyntaxNode<K>): SyntaxNode<K>[];
}

/**
 * Walk the tree once, recording pre-order position and upward links.
 * Nodes that are not part of the tree have no parent and sibling index -1.
 */
export function indexTree<K extends string>(
  root: SyntaxNode<K>
): TraversalIndex<K> {
  const order: SyntaxNode<K>[] = [];
  const parents = new Map<SyntaxNode<K>, SyntaxNode<K> | null>();
  const indices = new Map<SyntaxNode<K>, number>();

  visitTree(root, (node, parent, index) => {
    order.push(node);
    parents.set(node, parent);
    indices.set(node, index);
  });

  return {
    order,
    parent(node) {
      return parents.get(node) ?? null;
    },
    siblingIndex(node) {
      return indices.get(node) ?? -1;
    },
    ancestors(node) {
      const chain: SyntaxNode<K>[] = [];
      let current = parents.get(node) ?? null;
      while (current !== null) {
        chain.push(current);
        current = parents.get(current) ?? null;
      }
      return chain;
    },
  };
}
