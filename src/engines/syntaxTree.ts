/**
 * Mirror Syntax Tree
 *
 * Serializable model of a Rust source file's top-level items. Each item
 * kind carries only the fields its capabilities allow: a `span` when the
 * parser adapter records positions for that kind, a `comments` list when
 * the kind can hold comments, and a `block` when it has a brace-delimited
 * body. The capability table below is the single source of truth for
 * which kinds are which.
 *
 * @module syntaxTree
 */

import type { Comment } from './commentExtractor.js';
import type { SpanInfo } from './spanInfo.js';

// ============================================================================
// Capability Table
// ============================================================================

/**
 * Every top-level item kind the tree models
 */
export type ItemKind =
  | 'fn'
  | 'enum'
  | 'struct'
  | 'trait'
  | 'impl'
  | 'use'
  | 'const'
  | 'static'
  | 'type'
  | 'union'
  | 'mod'
  | 'foreignMod'
  | 'macro'
  | 'externCrate'
  | 'verbatim';

export interface ItemCapabilities {
  /** Item records a declaration span */
  span: boolean;
  /** Item can hold a comment list */
  comments: boolean;
  /** Item has a brace-delimited body block with its own span and comments */
  block: boolean;
}

export const ITEM_CAPABILITIES: Readonly<Record<ItemKind, Readonly<ItemCapabilities>>> = {
  fn: { span: true, comments: true, block: true },
  enum: { span: true, comments: true, block: false },
  struct: { span: false, comments: false, block: false },
  trait: { span: true, comments: true, block: true },
  impl: { span: true, comments: true, block: true },
  use: { span: true, comments: true, block: false },
  const: { span: true, comments: true, block: false },
  static: { span: true, comments: true, block: false },
  type: { span: true, comments: true, block: false },
  union: { span: false, comments: true, block: false },
  mod: { span: false, comments: false, block: false },
  foreignMod: { span: false, comments: true, block: false },
  macro: { span: false, comments: false, block: false },
  externCrate: { span: false, comments: false, block: false },
  verbatim: { span: false, comments: false, block: false },
};

// ============================================================================
// Node Types
// ============================================================================

/**
 * A brace-delimited body
 */
export interface Block {
  span?: SpanInfo;
  comments?: Comment[];
}

interface Spanned {
  span?: SpanInfo;
}

interface Commented {
  comments?: Comment[];
}

interface WithBlock {
  block: Block;
}

export interface ItemFn extends Spanned, Commented, WithBlock {
  kind: 'fn';
  name: string;
  isPublic: boolean;
  isAsync: boolean;
  params: string[];
}

export interface ItemEnum extends Spanned, Commented {
  kind: 'enum';
  name: string;
  isPublic: boolean;
  variants: string[];
}

export interface ItemStruct {
  kind: 'struct';
  name: string;
  isPublic: boolean;
  fields: string[];
}

export interface ItemTrait extends Spanned, Commented, WithBlock {
  kind: 'trait';
  name: string;
  isPublic: boolean;
}

export interface ItemImpl extends Spanned, Commented, WithBlock {
  kind: 'impl';
  selfType: string;
  traitName?: string;
}

export interface ItemUse extends Spanned, Commented {
  kind: 'use';
  path: string;
}

export interface ItemConst extends Spanned, Commented {
  kind: 'const';
  name: string;
  isPublic: boolean;
}

export interface ItemStatic extends Spanned, Commented {
  kind: 'static';
  name: string;
  isPublic: boolean;
  isMutable: boolean;
}

export interface ItemType extends Spanned, Commented {
  kind: 'type';
  name: string;
  isPublic: boolean;
}

export interface ItemUnion extends Commented {
  kind: 'union';
  name: string;
}

export interface ItemMod {
  kind: 'mod';
  name: string;
  /** True for `mod name;` declarations without an inline body */
  isExternal: boolean;
}

export interface ItemForeignMod extends Commented {
  kind: 'foreignMod';
  abi?: string;
}

export interface ItemMacro {
  kind: 'macro';
  name: string;
}

export interface ItemExternCrate {
  kind: 'externCrate';
  name: string;
}

/**
 * Item the adapter does not model; keeps its source text
 */
export interface ItemVerbatim {
  kind: 'verbatim';
  text: string;
}

export type Item =
  | ItemFn
  | ItemEnum
  | ItemStruct
  | ItemTrait
  | ItemImpl
  | ItemUse
  | ItemConst
  | ItemStatic
  | ItemType
  | ItemUnion
  | ItemMod
  | ItemForeignMod
  | ItemMacro
  | ItemExternCrate
  | ItemVerbatim;

/**
 * Root of the tree. `comments` holds residual comments that no item claimed.
 */
export interface SourceFile {
  items: Item[];
  comments?: Comment[];
}

/** Kinds whose declaration span is recorded */
export type SpannedKind = 'fn' | 'enum' | 'trait' | 'impl' | 'use' | 'const' | 'static' | 'type';
/** Kinds that can hold a comment list */
export type CommentableKind = SpannedKind | 'union' | 'foreignMod';
/** Kinds with a body block */
export type BlockKind = 'fn' | 'trait' | 'impl';

export type SpannedItem = Extract<Item, { kind: SpannedKind }>;
export type CommentableItem = Extract<Item, { kind: CommentableKind }>;
export type BlockItem = Extract<Item, { kind: BlockKind }>;

// ============================================================================
// Capability Queries
// ============================================================================

export function hasSpanCapability(item: Item): item is SpannedItem {
  return ITEM_CAPABILITIES[item.kind].span;
}

export function hasCommentsCapability(item: Item): item is CommentableItem {
  return ITEM_CAPABILITIES[item.kind].comments;
}

export function hasBlockCapability(item: Item): item is BlockItem {
  return ITEM_CAPABILITIES[item.kind].block;
}

/**
 * Declaration span of an item, when its kind records one and the
 * adapter supplied it
 */
export function getItemSpan(item: Item): SpanInfo | undefined {
  return hasSpanCapability(item) ? item.span : undefined;
}

/**
 * Span of an item's body block, when it has one
 */
export function getBlockSpan(item: Item): SpanInfo | undefined {
  return hasBlockCapability(item) ? item.block.span : undefined;
}

/**
 * Collect every comment attached anywhere in the tree, residuals last
 */
export function collectAttachedComments(file: SourceFile): Comment[] {
  const all: Comment[] = [];
  for (const item of file.items) {
    if (hasCommentsCapability(item) && item.comments) {
      all.push(...item.comments);
    }
    if (hasBlockCapability(item) && item.block.comments) {
      all.push(...item.block.comments);
    }
  }
  if (file.comments) {
    all.push(...file.comments);
  }
  return all;
}
