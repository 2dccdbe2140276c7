/**
 * Syntax Tree Builder
 *
 * Converts a tree-sitter Rust CST into the mirror tree. Only top-level
 * items are modeled. Declaration spans cover the item's name token (the
 * `impl` or `use` keyword for items without a name); block spans run from
 * the opening brace to just past the closing brace.
 *
 * The builder works against the {@link SyntaxNode} shape rather than the
 * web-tree-sitter class so it can be driven by any CST with the same
 * surface.
 *
 * @module syntaxTreeBuilder
 */

import { getTreeSitterParser } from './treeSitterParser.js';
import { LineIndex, type SourcePosition, type SpanInfo } from './spanInfo.js';
import type { Block, Item, SourceFile } from './syntaxTree.js';
import { parseFailed, parserUnavailable, unsupportedLanguage } from '../errors/index.js';
import { getLogger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Position as reported by tree-sitter (0-based row and column)
 */
export interface SyntaxPoint {
  row: number;
  column: number;
}

/**
 * The part of a concrete syntax tree node the builder reads
 */
export interface SyntaxNode {
  readonly type: string;
  readonly text: string;
  readonly startPosition: SyntaxPoint;
  readonly endPosition: SyntaxPoint;
  readonly children: readonly (SyntaxNode | null)[];
  readonly namedChildren: readonly (SyntaxNode | null)[];
  readonly hasError: boolean;
  readonly isMissing: boolean;
  childForFieldName(fieldName: string): SyntaxNode | null;
}

/** Top-level nodes that are not items */
const SKIPPED_NODE_TYPES = new Set(['attribute_item', 'inner_attribute_item', 'line_comment', 'block_comment']);

/** Parameter node types listed in a function's `params` */
const PARAMETER_NODE_TYPES = new Set(['parameter', 'self_parameter', 'variadic_parameter']);

// ============================================================================
// Node Helpers
// ============================================================================

function childrenOf(node: SyntaxNode, named: boolean = false): SyntaxNode[] {
  const result: SyntaxNode[] = [];
  for (const child of named ? node.namedChildren : node.children) {
    if (child) {
      result.push(child);
    }
  }
  return result;
}

function findChildByType(node: SyntaxNode, type: string): SyntaxNode | null {
  return childrenOf(node).find((c) => c.type === type) ?? null;
}

function fieldText(node: SyntaxNode, fieldName: string): string {
  return node.childForFieldName(fieldName)?.text ?? '';
}

function toPosition(point: SyntaxPoint): SourcePosition {
  return { line: point.row + 1, column: point.column };
}

function isPublic(node: SyntaxNode): boolean {
  return findChildByType(node, 'visibility_modifier') !== null;
}

// ============================================================================
// Item Conversion
// ============================================================================

class ItemConverter {
  constructor(private readonly lines: LineIndex) {}

  private spanOf(node: SyntaxNode | null): SpanInfo | undefined {
    if (!node) {
      return undefined;
    }
    return this.lines.span(toPosition(node.startPosition), toPosition(node.endPosition));
  }

  private blockOf(node: SyntaxNode): Block {
    const body = node.childForFieldName('body');
    return body ? { span: this.spanOf(body) } : {};
  }

  convert(node: SyntaxNode): Item | null {
    if (SKIPPED_NODE_TYPES.has(node.type)) {
      return null;
    }

    switch (node.type) {
      case 'function_item':
        return {
          kind: 'fn',
          name: fieldText(node, 'name'),
          isPublic: isPublic(node),
          isAsync: findChildByType(node, 'function_modifiers')?.text.split(/\s+/).includes('async') ?? false,
          params: this.paramsOf(node),
          span: this.spanOf(node.childForFieldName('name')),
          block: this.blockOf(node),
        };

      case 'enum_item': {
        const body = node.childForFieldName('body');
        return {
          kind: 'enum',
          name: fieldText(node, 'name'),
          isPublic: isPublic(node),
          variants: body
            ? childrenOf(body, true)
                .filter((c) => c.type === 'enum_variant')
                .map((c) => fieldText(c, 'name'))
            : [],
          span: this.spanOf(node.childForFieldName('name')),
        };
      }

      case 'struct_item':
        return {
          kind: 'struct',
          name: fieldText(node, 'name'),
          isPublic: isPublic(node),
          fields: this.fieldsOf(node),
        };

      case 'trait_item':
        return {
          kind: 'trait',
          name: fieldText(node, 'name'),
          isPublic: isPublic(node),
          span: this.spanOf(node.childForFieldName('name')),
          block: this.blockOf(node),
        };

      case 'impl_item': {
        const traitNode = node.childForFieldName('trait');
        return {
          kind: 'impl',
          selfType: fieldText(node, 'type'),
          ...(traitNode ? { traitName: traitNode.text } : {}),
          span: this.spanOf(findChildByType(node, 'impl')),
          block: this.blockOf(node),
        };
      }

      case 'use_declaration':
        return {
          kind: 'use',
          path: fieldText(node, 'argument'),
          span: this.spanOf(findChildByType(node, 'use')),
        };

      case 'const_item':
        return {
          kind: 'const',
          name: fieldText(node, 'name'),
          isPublic: isPublic(node),
          span: this.spanOf(node.childForFieldName('name')),
        };

      case 'static_item':
        return {
          kind: 'static',
          name: fieldText(node, 'name'),
          isPublic: isPublic(node),
          isMutable: findChildByType(node, 'mutable_specifier') !== null,
          span: this.spanOf(node.childForFieldName('name')),
        };

      case 'type_item':
        return {
          kind: 'type',
          name: fieldText(node, 'name'),
          isPublic: isPublic(node),
          span: this.spanOf(node.childForFieldName('name')),
        };

      case 'union_item':
        return { kind: 'union', name: fieldText(node, 'name') };

      case 'mod_item':
        return {
          kind: 'mod',
          name: fieldText(node, 'name'),
          isExternal: node.childForFieldName('body') === null,
        };

      case 'foreign_mod_item': {
        const abi = findChildByType(node, 'extern_modifier')?.text.match(/"([^"]*)"/)?.[1];
        return abi === undefined ? { kind: 'foreignMod' } : { kind: 'foreignMod', abi };
      }

      case 'macro_definition':
        return { kind: 'macro', name: fieldText(node, 'name') };

      case 'macro_invocation':
        return { kind: 'macro', name: fieldText(node, 'macro') };

      case 'expression_statement': {
        const inner = childrenOf(node, true);
        if (inner.length === 1 && inner[0].type === 'macro_invocation') {
          return { kind: 'macro', name: fieldText(inner[0], 'macro') };
        }
        return { kind: 'verbatim', text: node.text };
      }

      case 'extern_crate_declaration':
        return { kind: 'externCrate', name: fieldText(node, 'name') };

      default:
        return { kind: 'verbatim', text: node.text };
    }
  }

  private paramsOf(node: SyntaxNode): string[] {
    const parameters = node.childForFieldName('parameters');
    if (!parameters) {
      return [];
    }
    return childrenOf(parameters, true)
      .filter((p) => PARAMETER_NODE_TYPES.has(p.type))
      .map((p) => p.childForFieldName('pattern')?.text ?? p.text);
  }

  private fieldsOf(node: SyntaxNode): string[] {
    const body = node.childForFieldName('body');
    if (!body) {
      return [];
    }
    if (body.type === 'field_declaration_list') {
      return childrenOf(body, true)
        .filter((c) => c.type === 'field_declaration')
        .map((c) => fieldText(c, 'name'));
    }
    // Tuple struct: fields are positional
    return childrenOf(body, true)
      .filter((c) => c.type !== 'visibility_modifier' && c.type !== 'attribute_item')
      .map((_, i) => String(i));
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Build a mirror tree from the root node of a parsed Rust file
 *
 * @param root - The `source_file` node
 * @param source - The text the node was parsed from (used for offsets)
 */
export function buildSourceFile(root: SyntaxNode, source: string): SourceFile {
  const converter = new ItemConverter(new LineIndex(source));
  const items: Item[] = [];

  for (const child of childrenOf(root, true)) {
    const item = converter.convert(child);
    if (item) {
      items.push(item);
    }
  }

  getLogger().debug('syntaxTreeBuilder', 'Built source file', { items: items.length });
  return { items };
}

/**
 * Position (1-based line) of the first ERROR or missing node, or null
 * when the tree is clean
 */
export function findSyntaxError(root: SyntaxNode): SourcePosition | null {
  if (root.type === 'ERROR' || root.isMissing) {
    return toPosition(root.startPosition);
  }
  if (!root.hasError) {
    return null;
  }
  for (const child of childrenOf(root)) {
    const found = findSyntaxError(child);
    if (found) {
      return found;
    }
  }
  return toPosition(root.startPosition);
}

/**
 * Parse Rust source text into a mirror tree
 *
 * @param source - Source text
 * @param filePath - Path used for language detection and error messages
 * @throws SyntreeError UNSUPPORTED_LANGUAGE, PARSER_UNAVAILABLE or PARSE_FAILED
 */
export async function parseSourceFile(source: string, filePath: string = 'input.rs'): Promise<SourceFile> {
  const parser = getTreeSitterParser();

  if (!parser.isSupported(filePath)) {
    throw unsupportedLanguage(filePath);
  }

  try {
    await parser.initialize();
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw parserUnavailable(cause.message, cause);
  }

  const tree = await parser.parse(source, filePath);
  if (!tree) {
    throw parserUnavailable(`no syntax tree produced for ${filePath}`);
  }

  try {
    const errorAt = findSyntaxError(tree.rootNode);
    if (errorAt) {
      throw parseFailed(filePath, errorAt.line, errorAt.column);
    }
    return buildSourceFile(tree.rootNode, source);
  } finally {
    tree.delete();
  }
}
