/**
 * Node Span Collector
 *
 * Walks the top-level items of a mirror tree in document order and records
 * the span of every construct that can own comments. Items are keyed by
 * position (`item_N`); an item's body block gets the derived key
 * `item_N_block` and its own span, independent of the declaration's.
 * Items whose kind records no span are skipped.
 *
 * @module nodeSpanCollector
 */

import type { SpanInfo } from './spanInfo.js';
import { type SourceFile, getItemSpan, getBlockSpan } from './syntaxTree.js';
import { getLogger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Span of a comment-owning construct, keyed by its structural identifier
 */
export interface NodeSpan {
  identifier: string;
  span: SpanInfo;
}

// ============================================================================
// Identifiers
// ============================================================================

const ITEM_PREFIX = 'item_';
const BLOCK_SUFFIX = '_block';

export function itemIdentifier(index: number): string {
  return `${ITEM_PREFIX}${index}`;
}

export function blockIdentifier(declarationId: string): string {
  return `${declarationId}${BLOCK_SUFFIX}`;
}

export function isBlockIdentifier(identifier: string): boolean {
  return identifier.endsWith(BLOCK_SUFFIX);
}

/**
 * Declaration identifier a block identifier was derived from,
 * or null when `identifier` is not a block identifier
 */
export function declarationIdentifierOf(identifier: string): string | null {
  if (!isBlockIdentifier(identifier)) {
    return null;
  }
  return identifier.slice(0, -BLOCK_SUFFIX.length);
}

/**
 * Index of the item an identifier refers to, or null when the identifier
 * is not an item or block identifier
 */
export function itemIndexOf(identifier: string): number | null {
  const declarationId = declarationIdentifierOf(identifier) ?? identifier;
  const match = /^item_(\d+)$/.exec(declarationId);
  return match ? Number(match[1]) : null;
}

// ============================================================================
// Collection
// ============================================================================

/**
 * Collect node spans for every span-bearing construct in the file.
 *
 * Declarations come before their own blocks; items appear in document
 * order.
 */
export function collectNodeSpans(file: SourceFile): NodeSpan[] {
  const spans: NodeSpan[] = [];
  let skipped = 0;

  file.items.forEach((item, index) => {
    const id = itemIdentifier(index);

    const itemSpan = getItemSpan(item);
    if (itemSpan) {
      spans.push({ identifier: id, span: itemSpan });
    } else {
      skipped++;
    }

    const blockSpan = getBlockSpan(item);
    if (blockSpan) {
      spans.push({ identifier: blockIdentifier(id), span: blockSpan });
    }
  });

  getLogger().debug('nodeSpanCollector', 'Collected node spans', {
    items: file.items.length,
    spans: spans.length,
    itemsWithoutSpan: skipped,
  });

  return spans;
}
