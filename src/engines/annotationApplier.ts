/**
 * Annotation Applier
 *
 * Writes an association map back into the mirror tree. Each item takes the
 * comments keyed by its declaration identifier, and each body block takes
 * the comments keyed by its block identifier. Item kinds without a
 * comment list cannot take comments; those comments, and every comment no
 * node claimed, end up in the file's residual list in source order.
 *
 * @module annotationApplier
 */

import { type Comment, compareComments } from './commentExtractor.js';
import {
  type SourceFile,
  hasCommentsCapability,
  hasBlockCapability,
} from './syntaxTree.js';
import { itemIdentifier, blockIdentifier } from './nodeSpanCollector.js';
import { getLogger } from '../utils/logger.js';

/**
 * Result counters for a single application
 */
export interface ApplyStats {
  /** Comments attached to items or blocks */
  attached: number;
  /** Comments matched to a node whose kind cannot hold them */
  uncarried: number;
  /** Comments placed in the file's residual list */
  residual: number;
}

function nonEmpty(comments: readonly Comment[] | undefined): Comment[] | undefined {
  return comments && comments.length > 0 ? [...comments] : undefined;
}

/**
 * Apply associations to a file in place.
 *
 * Existing comment lists are replaced, so re-applying to an already
 * annotated tree does not duplicate comments.
 *
 * @param file - Tree to annotate
 * @param associations - Node identifier to comments
 * @param comments - Every comment extracted from the source, in source order
 * @returns The same file, annotated
 */
export function applyAssociations(
  file: SourceFile,
  associations: ReadonlyMap<string, readonly Comment[]>,
  comments: readonly Comment[]
): SourceFile {
  return applyAssociationsWithStats(file, associations, comments).file;
}

/**
 * Same as {@link applyAssociations}, also returning counters
 */
export function applyAssociationsWithStats(
  file: SourceFile,
  associations: ReadonlyMap<string, readonly Comment[]>,
  comments: readonly Comment[]
): { file: SourceFile; stats: ApplyStats } {
  const logger = getLogger();
  const placed = new Set<Comment>();
  let uncarried = 0;

  file.items.forEach((item, index) => {
    const id = itemIdentifier(index);
    const itemComments = associations.get(id);

    if (hasCommentsCapability(item)) {
      item.comments = nonEmpty(itemComments);
      itemComments?.forEach((c) => placed.add(c));
    } else if (itemComments && itemComments.length > 0) {
      uncarried += itemComments.length;
      logger.debug('annotationApplier', 'Item kind cannot hold comments', {
        identifier: id,
        kind: item.kind,
        comments: itemComments.length,
      });
    }

    if (hasBlockCapability(item)) {
      const blockComments = associations.get(blockIdentifier(id));
      item.block.comments = nonEmpty(blockComments);
      blockComments?.forEach((c) => placed.add(c));
    }
  });

  const residual = comments.filter((c) => !placed.has(c)).sort(compareComments);
  file.comments = nonEmpty(residual);

  const stats: ApplyStats = { attached: placed.size, uncarried, residual: residual.length };
  logger.debug('annotationApplier', 'Applied comment associations', { ...stats });

  return { file, stats };
}
