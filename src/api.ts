/**
 * Library entry: the annotation pipeline and its stages
 */

export {
  extractComments,
  isInsideStringLiteral,
  type Comment,
  type CommentKind,
  type CommentExtractionOptions,
} from './engines/commentExtractor.js';
export { collectNodeSpans, type NodeSpan } from './engines/nodeSpanCollector.js';
export {
  associateComments,
  type AssociationPolicy,
  type AssociationResult,
} from './engines/commentAssociator.js';
export { applyAssociations } from './engines/annotationApplier.js';
export {
  annotateSource,
  annotateTree,
  type AnnotationOptions,
  type AnnotationResult,
  type AnnotationStats,
} from './engines/commentAnnotator.js';
export { buildSourceFile, parseSourceFile, type SyntaxNode } from './engines/syntaxTreeBuilder.js';
export { supportsParsing } from './engines/treeSitterParser.js';
export { ITEM_CAPABILITIES, type SourceFile, type Item, type ItemKind, type Block } from './engines/syntaxTree.js';
export type { SpanInfo } from './engines/spanInfo.js';
export { toJSON, toJSONString, fromJSON, fromJSONString } from './storage/syntaxJson.js';
export { SyntreeError, ErrorCode, isSyntreeError } from './errors/index.js';
