/**
 * Comment Rules
 */

import type { ConfNode, ConfNodeKind } from '../../parser/kinds.js';
import type { Rule, RuleContext, RuleReport } from '../types.js';

/** Characters allowed directly after `#` */
const COMMENT_MARKERS: ReadonlySet<string> = new Set([' ', '#', '!']);

/**
 * Comment text is separated from `#` by a space.
 * Banners (`##`) and shebang-style markers (`#!`) are allowed.
 */
export const COMMENT_SPACING: Rule<ConfNodeKind> = {
  code: 'COMMENT_SPACING',
  version: '1.0.0',
  description: "Comments start with '# '",
  category: 'comments',
  severity: 'info',
  enabled: true,
  fixable: true,
  nodeTypes: ['Comment'],

  evaluate(node: ConfNode, context: RuleContext<ConfNodeKind>): RuleReport[] {
    const marker = node.text?.[1];
    if (marker === undefined || COMMENT_MARKERS.has(marker)) {
      return [];
    }

    const at = node.span.start.offset + 1;
    return [
      {
        span: node.span,
        message: "Comment should start with '# '",
        fix: {
          description: "Insert a space after '#'",
          range: context.spanAt(at, at),
          replacement: ' ',
        },
      },
    ];
  },
};
