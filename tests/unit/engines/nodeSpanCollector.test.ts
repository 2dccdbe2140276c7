import { describe, it, expect } from 'vitest';
import {
  collectNodeSpans,
  itemIdentifier,
  blockIdentifier,
  isBlockIdentifier,
  declarationIdentifierOf,
  itemIndexOf,
} from '../../../src/engines/nodeSpanCollector.js';
import { createSpan } from '../../../src/engines/spanInfo.js';
import type { SourceFile } from '../../../src/engines/syntaxTree.js';

const span = (sl: number, sc: number, el: number, ec: number) =>
  createSpan({ line: sl, column: sc }, { line: el, column: ec });

describe('identifiers', () => {
  it('should derive item and block identifiers', () => {
    expect(itemIdentifier(0)).toBe('item_0');
    expect(blockIdentifier('item_3')).toBe('item_3_block');
  });

  it('should recognize block identifiers', () => {
    expect(isBlockIdentifier('item_3_block')).toBe(true);
    expect(isBlockIdentifier('item_3')).toBe(false);
    expect(declarationIdentifierOf('item_3_block')).toBe('item_3');
    expect(declarationIdentifierOf('item_3')).toBeNull();
  });

  it('should recover the item index', () => {
    expect(itemIndexOf('item_12')).toBe(12);
    expect(itemIndexOf('item_12_block')).toBe(12);
    expect(itemIndexOf('other')).toBeNull();
  });
});

describe('collectNodeSpans', () => {
  it('should return nothing for an empty file', () => {
    expect(collectNodeSpans({ items: [] })).toEqual([]);
  });

  it('should list declarations before their blocks, in document order', () => {
    const file: SourceFile = {
      items: [
        { kind: 'use', path: 'std::fmt', span: span(1, 0, 1, 3) },
        {
          kind: 'fn',
          name: 'f',
          isPublic: false,
          isAsync: false,
          params: [],
          span: span(3, 3, 3, 4),
          block: { span: span(3, 7, 5, 1) },
        },
      ],
    };

    expect(collectNodeSpans(file)).toEqual([
      { identifier: 'item_0', span: span(1, 0, 1, 3) },
      { identifier: 'item_1', span: span(3, 3, 3, 4) },
      { identifier: 'item_1_block', span: span(3, 7, 5, 1) },
    ]);
  });

  it('should skip items whose kind records no span but keep their index', () => {
    const file: SourceFile = {
      items: [
        { kind: 'struct', name: 'P', isPublic: true, fields: ['x'] },
        { kind: 'mod', name: 'inner', isExternal: true },
        { kind: 'const', name: 'N', isPublic: false, span: span(4, 6, 4, 7) },
      ],
    };

    expect(collectNodeSpans(file).map((n) => n.identifier)).toEqual(['item_2']);
  });

  it('should skip spans the adapter did not supply', () => {
    const file: SourceFile = {
      items: [{ kind: 'trait', name: 'T', isPublic: false, block: {} }],
    };
    expect(collectNodeSpans(file)).toEqual([]);
  });

  it('should keep a block span when the declaration has none', () => {
    const file: SourceFile = {
      items: [{ kind: 'impl', selfType: 'P', block: { span: span(1, 7, 3, 1) } }],
    };
    expect(collectNodeSpans(file).map((n) => n.identifier)).toEqual(['item_0_block']);
  });
});
