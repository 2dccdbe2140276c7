/**
 * Comment Annotation Pipeline
 *
 * Runs the four stages in order: extract comments from the source text,
 * collect node spans from the tree, associate each comment with at most
 * one node, and write the result back into the tree. Every extracted
 * comment ends up either on a node or in the file's residual list.
 *
 * @module commentAnnotator
 */

import { extractComments, type CommentExtractionOptions } from './commentExtractor.js';
import { collectNodeSpans } from './nodeSpanCollector.js';
import {
  associateComments,
  DEFAULT_ASSOCIATION_POLICY,
  type AssociationPolicy,
} from './commentAssociator.js';
import { applyAssociationsWithStats } from './annotationApplier.js';
import { parseSourceFile } from './syntaxTreeBuilder.js';
import type { SourceFile } from './syntaxTree.js';
import { getLogger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface AnnotationOptions extends CommentExtractionOptions {
  /** Association policy (default: conservative) */
  policy?: AssociationPolicy;
}

export interface AnnotationStats {
  /** Comments extracted from the source */
  comments: number;
  /** Node spans collected from the tree */
  nodeSpans: number;
  /** Comments attached to items or blocks */
  attached: number;
  /** Comments matched to a node kind that cannot hold them */
  uncarried: number;
  /** Comments left in the file's residual list */
  residual: number;
}

export interface AnnotationResult {
  file: SourceFile;
  stats: AnnotationStats;
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * Annotate an already built tree with the comments of its source text.
 * The tree is modified in place and returned.
 */
export function annotateTree(
  file: SourceFile,
  source: string,
  options: AnnotationOptions = {}
): AnnotationResult {
  const policy = options.policy ?? DEFAULT_ASSOCIATION_POLICY;

  const comments = extractComments(source, options);
  const nodeSpans = collectNodeSpans(file);
  const { associations } = associateComments(comments, nodeSpans, policy);
  const applied = applyAssociationsWithStats(file, associations, comments);

  const stats: AnnotationStats = {
    comments: comments.length,
    nodeSpans: nodeSpans.length,
    ...applied.stats,
  };

  getLogger().debug('commentAnnotator', 'Annotated tree', { policy, ...stats });
  return { file: applied.file, stats };
}

/**
 * Parse Rust source and annotate the resulting tree
 *
 * @example
 * ```typescript
 * const { file, stats } = await annotateSource(source, 'lib.rs', { policy: 'nearest' });
 * ```
 */
export async function annotateSource(
  source: string,
  filePath: string = 'input.rs',
  options: AnnotationOptions = {}
): Promise<AnnotationResult> {
  const file = await parseSourceFile(source, filePath);
  return annotateTree(file, source, options);
}
