/**
 * Comment Association Engine
 *
 * Decides, for every extracted comment, which construct (if any) it belongs
 * to. Each comment is matched on its own against the full set of node
 * spans; comments never influence each other. A comment is claimed by at
 * most one node, and a comment no node claims is returned as residual.
 *
 * Two policies are available:
 *
 * - `conservative` (default): a comment belongs to a body block when it
 *   sits strictly inside the block's delimiters; otherwise to a declaration
 *   when it trails the declaration on the same line or sits between the
 *   declaration and its opening brace. Comments above a declaration stay
 *   unassociated.
 * - `nearest`: same-line containment, then a leading comment on the line
 *   right above a node, then the smallest node containing the comment.
 *   Resolves more comments, but a comment between two sibling items may go
 *   to the wrong neighbor.
 *
 * @module commentAssociator
 */

import type { Comment } from './commentExtractor.js';
import {
  type SpanInfo,
  type SourcePosition,
  comparePositions,
  containsPosition,
  spanStart,
  spanEnd,
  spanLineCount,
  spanColumnWidth,
} from './spanInfo.js';
import { type NodeSpan, blockIdentifier, isBlockIdentifier } from './nodeSpanCollector.js';
import { getLogger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export type AssociationPolicy = 'conservative' | 'nearest';

export const ASSOCIATION_POLICIES: readonly AssociationPolicy[] = ['conservative', 'nearest'];

export const DEFAULT_ASSOCIATION_POLICY: AssociationPolicy = 'conservative';

/**
 * Output of an association pass
 */
export interface AssociationResult {
  /** Node identifier to its comments, in source order */
  associations: Map<string, Comment[]>;
  /** Comments no node claimed, in source order */
  unassociated: Comment[];
}

/**
 * Node spans prepared for repeated lookups
 */
interface SpanIndex {
  nodes: NodeSpan[];
  blocks: NodeSpan[];
  declarations: NodeSpan[];
  byIdentifier: Map<string, SpanInfo>;
}

type Matcher = (comment: Comment, index: SpanIndex) => string | undefined;

// ============================================================================
// Helpers
// ============================================================================

function commentStart(comment: Comment): SourcePosition {
  return { line: comment.span.startLine, column: comment.span.startColumn };
}

function buildSpanIndex(nodeSpans: NodeSpan[]): SpanIndex {
  const byIdentifier = new Map<string, SpanInfo>();
  for (const node of nodeSpans) {
    if (!byIdentifier.has(node.identifier)) {
      byIdentifier.set(node.identifier, node.span);
    }
  }
  return {
    nodes: nodeSpans,
    blocks: nodeSpans.filter((n) => isBlockIdentifier(n.identifier)),
    declarations: nodeSpans.filter((n) => !isBlockIdentifier(n.identifier)),
    byIdentifier,
  };
}

/**
 * Pick the node with the fewest lines, then the narrowest columns.
 * Ties keep collection order.
 */
function smallest(candidates: NodeSpan[]): NodeSpan | undefined {
  let best: NodeSpan | undefined;
  for (const candidate of candidates) {
    if (
      best === undefined ||
      spanLineCount(candidate.span) < spanLineCount(best.span) ||
      (spanLineCount(candidate.span) === spanLineCount(best.span) &&
        spanColumnWidth(candidate.span) < spanColumnWidth(best.span))
    ) {
      best = candidate;
    }
  }
  return best;
}

// ============================================================================
// Conservative Policy
// ============================================================================

/**
 * True when the comment starts strictly after the block's opening
 * position and strictly before its closing position
 */
export function isStrictlyInsideBlock(comment: Comment, block: SpanInfo): boolean {
  const start = commentStart(comment);
  return (
    comparePositions(start, spanStart(block)) > 0 &&
    comparePositions(start, spanEnd(block)) < 0
  );
}

/**
 * True when the comment trails the declaration on its last line, or sits
 * on a line between the declaration and the opening line of its block
 */
export function isOnDeclaration(
  comment: Comment,
  declaration: SpanInfo,
  block: SpanInfo | undefined
): boolean {
  const { line, column } = commentStart(comment);

  if (line === declaration.endLine) {
    return column >= declaration.endColumn;
  }

  return block !== undefined && line > declaration.endLine && line < block.startLine;
}

const matchConservative: Matcher = (comment, index) => {
  const block = index.blocks.find((b) => isStrictlyInsideBlock(comment, b.span));
  if (block) {
    return block.identifier;
  }

  const declaration = index.declarations.find((d) =>
    isOnDeclaration(comment, d.span, index.byIdentifier.get(blockIdentifier(d.identifier)))
  );
  return declaration?.identifier;
};

// ============================================================================
// Nearest Policy
// ============================================================================

const matchNearest: Matcher = (comment, index) => {
  const start = commentStart(comment);

  const sameLine = index.nodes.filter(
    (n) =>
      (n.span.startLine === start.line || n.span.endLine === start.line) &&
      containsPosition(n.span, start)
  );
  const sameLineMatch = smallest(sameLine);
  if (sameLineMatch) {
    return sameLineMatch.identifier;
  }

  let leading: NodeSpan | undefined;
  for (const node of index.nodes) {
    if (node.span.startLine !== comment.span.endLine + 1) {
      continue;
    }
    if (leading === undefined || node.span.startColumn < leading.span.startColumn) {
      leading = node;
    }
  }
  if (leading) {
    return leading.identifier;
  }

  return smallest(index.nodes.filter((n) => containsPosition(n.span, start)))?.identifier;
};

const MATCHERS: Record<AssociationPolicy, Matcher> = {
  conservative: matchConservative,
  nearest: matchNearest,
};

// ============================================================================
// Main API
// ============================================================================

/**
 * Find the identifier of the node a single comment belongs to
 */
export function findOwner(
  comment: Comment,
  nodeSpans: NodeSpan[],
  policy: AssociationPolicy = DEFAULT_ASSOCIATION_POLICY
): string | undefined {
  return MATCHERS[policy](comment, buildSpanIndex(nodeSpans));
}

/**
 * Associate comments with node spans.
 *
 * @example
 * ```typescript
 * const { associations, unassociated } = associateComments(comments, collectNodeSpans(file));
 * associations.get('item_0_block'); // comments inside the first item's body
 * ```
 */
export function associateComments(
  comments: readonly Comment[],
  nodeSpans: NodeSpan[],
  policy: AssociationPolicy = DEFAULT_ASSOCIATION_POLICY
): AssociationResult {
  const index = buildSpanIndex(nodeSpans);
  const match = MATCHERS[policy];
  const associations = new Map<string, Comment[]>();
  const unassociated: Comment[] = [];

  for (const comment of comments) {
    const owner = match(comment, index);
    if (owner === undefined) {
      unassociated.push(comment);
      continue;
    }
    const list = associations.get(owner);
    if (list) {
      list.push(comment);
    } else {
      associations.set(owner, [comment]);
    }
  }

  getLogger().debug('commentAssociator', 'Associated comments', {
    policy,
    comments: comments.length,
    nodes: associations.size,
    unassociated: unassociated.length,
  });

  return { associations, unassociated };
}
