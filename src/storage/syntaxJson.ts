/**
 * Syntax Tree JSON Codec
 *
 * Serializes mirror trees to plain JSON and back. Output is deterministic:
 * `kind` first, then the item's own fields in alphabetical order, then
 * `span`, `comments` and `block`. Empty comment lists are never written.
 *
 * Compact output drops every `span`, including comment spans, so a compact
 * tree that carries comments cannot be decoded again.
 *
 * @module syntaxJson
 */

import { z } from 'zod';
import type { Comment } from '../engines/commentExtractor.js';
import type { SpanInfo } from '../engines/spanInfo.js';
import {
  type Block,
  type Item,
  type SourceFile,
  hasBlockCapability,
  hasCommentsCapability,
} from '../engines/syntaxTree.js';
import { invalidTree } from '../errors/index.js';
import { getLogger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

export interface ToJSONOptions {
  /** Omit every span (default: false) */
  compact?: boolean;
}

export interface ToJSONStringOptions extends ToJSONOptions {
  /** Indent with two spaces (default: false) */
  pretty?: boolean;
}

/** Keys written after the item's own fields, in this order */
const STRUCTURAL_KEYS = new Set(['kind', 'span', 'comments', 'block']);

// ============================================================================
// Encoding
// ============================================================================

function spanToJSON(span: SpanInfo): JsonObject {
  return {
    startLine: span.startLine,
    startColumn: span.startColumn,
    endLine: span.endLine,
    endColumn: span.endColumn,
    startOffset: span.startOffset,
    endOffset: span.endOffset,
  };
}

function commentToJSON(comment: Comment, compact: boolean): JsonObject {
  const json: JsonObject = { text: comment.text, kind: comment.kind };
  if (!compact) {
    json.span = spanToJSON(comment.span);
  }
  return json;
}

function commentsToJSON(comments: readonly Comment[] | undefined, compact: boolean): JsonValue[] | undefined {
  if (!comments || comments.length === 0) {
    return undefined;
  }
  return comments.map((c) => commentToJSON(c, compact));
}

function blockToJSON(block: Block, compact: boolean): JsonObject {
  const json: JsonObject = {};
  if (block.span && !compact) {
    json.span = spanToJSON(block.span);
  }
  const comments = commentsToJSON(block.comments, compact);
  if (comments) {
    json.comments = comments;
  }
  return json;
}

/**
 * Convert an item field to JSON; item fields are strings, booleans or
 * string lists
 */
function fieldToJSON(value: unknown): JsonValue | undefined {
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === 'string');
  }
  return undefined;
}

function itemToJSON(item: Item, compact: boolean): JsonObject {
  const json: JsonObject = { kind: item.kind };

  const fieldNames = Object.keys(item)
    .filter((key) => !STRUCTURAL_KEYS.has(key))
    .sort();
  const fields = new Map<string, unknown>(Object.entries(item));
  for (const name of fieldNames) {
    const value = fieldToJSON(fields.get(name));
    if (value !== undefined) {
      json[name] = value;
    }
  }

  if ('span' in item && item.span && !compact) {
    json.span = spanToJSON(item.span);
  }
  if (hasCommentsCapability(item)) {
    const comments = commentsToJSON(item.comments, compact);
    if (comments) {
      json.comments = comments;
    }
  }
  if (hasBlockCapability(item)) {
    json.block = blockToJSON(item.block, compact);
  }

  return json;
}

/**
 * Convert a tree to a JSON value
 */
export function toJSON(file: SourceFile, options: ToJSONOptions = {}): JsonObject {
  const compact = options.compact ?? false;
  const json: JsonObject = { items: file.items.map((item) => itemToJSON(item, compact)) };
  const comments = commentsToJSON(file.comments, compact);
  if (comments) {
    json.comments = comments;
  }
  return json;
}

/**
 * Serialize a tree to a JSON string
 *
 * @example
 * ```typescript
 * toJSONString(file, { compact: true, pretty: true });
 * ```
 */
export function toJSONString(file: SourceFile, options: ToJSONStringOptions = {}): string {
  return JSON.stringify(toJSON(file, options), null, options.pretty ? 2 : undefined);
}

// ============================================================================
// Decoding
// ============================================================================

const SpanSchema = z
  .object({
    startLine: z.number().int().min(1),
    startColumn: z.number().int().min(0),
    endLine: z.number().int().min(1),
    endColumn: z.number().int().min(0),
    startOffset: z.number().int().min(0).default(0),
    endOffset: z.number().int().min(0).default(0),
  })
  .strict();

const CommentSchema = z
  .object({
    text: z.string(),
    kind: z.enum(['line', 'block']),
    span: SpanSchema,
  })
  .strict();

const CommentListSchema = z.array(CommentSchema).optional();

const BlockSchema = z
  .object({
    span: SpanSchema.optional(),
    comments: CommentListSchema,
  })
  .strict();

/** Fields shared by items that record a span and hold comments */
const spannedFields = {
  span: SpanSchema.optional(),
  comments: CommentListSchema,
};

const ItemSchema = z.discriminatedUnion('kind', [
  z
    .object({
      kind: z.literal('fn'),
      name: z.string(),
      isPublic: z.boolean(),
      isAsync: z.boolean(),
      params: z.array(z.string()),
      ...spannedFields,
      block: BlockSchema,
    })
    .strict(),
  z
    .object({
      kind: z.literal('enum'),
      name: z.string(),
      isPublic: z.boolean(),
      variants: z.array(z.string()),
      ...spannedFields,
    })
    .strict(),
  z
    .object({
      kind: z.literal('struct'),
      name: z.string(),
      isPublic: z.boolean(),
      fields: z.array(z.string()),
    })
    .strict(),
  z
    .object({
      kind: z.literal('trait'),
      name: z.string(),
      isPublic: z.boolean(),
      ...spannedFields,
      block: BlockSchema,
    })
    .strict(),
  z
    .object({
      kind: z.literal('impl'),
      selfType: z.string(),
      traitName: z.string().optional(),
      ...spannedFields,
      block: BlockSchema,
    })
    .strict(),
  z.object({ kind: z.literal('use'), path: z.string(), ...spannedFields }).strict(),
  z.object({ kind: z.literal('const'), name: z.string(), isPublic: z.boolean(), ...spannedFields }).strict(),
  z
    .object({
      kind: z.literal('static'),
      name: z.string(),
      isPublic: z.boolean(),
      isMutable: z.boolean(),
      ...spannedFields,
    })
    .strict(),
  z.object({ kind: z.literal('type'), name: z.string(), isPublic: z.boolean(), ...spannedFields }).strict(),
  z.object({ kind: z.literal('union'), name: z.string(), comments: CommentListSchema }).strict(),
  z.object({ kind: z.literal('mod'), name: z.string(), isExternal: z.boolean() }).strict(),
  z.object({ kind: z.literal('foreignMod'), abi: z.string().optional(), comments: CommentListSchema }).strict(),
  z.object({ kind: z.literal('macro'), name: z.string() }).strict(),
  z.object({ kind: z.literal('externCrate'), name: z.string() }).strict(),
  z.object({ kind: z.literal('verbatim'), text: z.string() }).strict(),
]);

const SourceFileSchema = z
  .object({
    items: z.array(ItemSchema),
    comments: CommentListSchema,
  })
  .strict();

function dropEmpty(comments: Comment[] | undefined): Comment[] | undefined {
  return comments && comments.length > 0 ? comments : undefined;
}

/**
 * Decode a tree from a parsed JSON value
 *
 * @throws SyntreeError INVALID_TREE when the value does not describe a tree
 */
export function fromJSON(value: unknown): SourceFile {
  const result = SourceFileSchema.safeParse(value);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw invalidTree(errors);
  }

  const file: SourceFile = result.data;
  for (const item of file.items) {
    if (hasCommentsCapability(item)) {
      item.comments = dropEmpty(item.comments);
    }
    if (hasBlockCapability(item)) {
      item.block.comments = dropEmpty(item.block.comments);
    }
  }
  file.comments = dropEmpty(file.comments);

  getLogger().debug('syntaxJson', 'Decoded syntax tree', { items: file.items.length });
  return file;
}

/**
 * Decode a tree from a JSON string
 *
 * @throws SyntreeError INVALID_TREE on malformed JSON or an invalid tree
 */
export function fromJSONString(text: string): SourceFile {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw invalidTree(`not valid JSON: ${message}`);
  }
  return fromJSON(value);
}
