import { describe, it, expect } from 'vitest';
import { applyAssociations, applyAssociationsWithStats } from '../../../src/engines/annotationApplier.js';
import type { Comment } from '../../../src/engines/commentExtractor.js';
import { createSpan } from '../../../src/engines/spanInfo.js';
import { collectAttachedComments, type SourceFile } from '../../../src/engines/syntaxTree.js';

const comment = (text: string, line: number): Comment => ({
  text,
  kind: 'line',
  span: createSpan({ line, column: 0 }, { line, column: text.length + 3 }),
});

function sampleFile(): SourceFile {
  return {
    items: [
      {
        kind: 'fn',
        name: 'f',
        isPublic: false,
        isAsync: false,
        params: [],
        block: {},
      },
      { kind: 'struct', name: 'S', isPublic: false, fields: [] },
      { kind: 'enum', name: 'E', isPublic: false, variants: ['A'] },
    ],
  };
}

describe('applyAssociations', () => {
  const decl = comment('decl', 1);
  const body = comment('body', 2);
  const onStruct = comment('struct', 4);
  const loose = comment('loose', 3);
  const all = [decl, body, loose, onStruct];

  it('should attach comments to items and blocks', () => {
    const file = applyAssociations(
      sampleFile(),
      new Map([
        ['item_0', [decl]],
        ['item_0_block', [body]],
      ]),
      all
    );

    const fn = file.items[0];
    expect(fn.kind === 'fn' && fn.comments).toEqual([decl]);
    expect(fn.kind === 'fn' && fn.block.comments).toEqual([body]);
    expect(file.comments).toEqual([loose, onStruct]);
  });

  it('should send comments for kinds without a comment list to the residual', () => {
    const { file, stats } = applyAssociationsWithStats(sampleFile(), new Map([['item_1', [onStruct]]]), [onStruct]);
    expect('comments' in file.items[1]).toBe(false);
    expect(file.comments).toEqual([onStruct]);
    expect(stats).toEqual({ attached: 0, uncarried: 1, residual: 1 });
  });

  it('should keep the residual list in source order', () => {
    const { file } = applyAssociationsWithStats(sampleFile(), new Map(), [onStruct, loose, decl]);
    expect(file.comments?.map((c) => c.text)).toEqual(['decl', 'loose', 'struct']);
  });

  it('should leave no empty comment lists', () => {
    const file = applyAssociations(sampleFile(), new Map([['item_2', []]]), []);
    const en = file.items[2];
    expect(en.kind === 'enum' && en.comments).toBeUndefined();
    expect(file.comments).toBeUndefined();
  });

  it('should neither lose nor duplicate comments', () => {
    const { file, stats } = applyAssociationsWithStats(
      sampleFile(),
      new Map([
        ['item_0', [decl]],
        ['item_0_block', [body]],
        ['item_1', [onStruct]],
      ]),
      all
    );
    const attached = collectAttachedComments(file);
    expect(attached).toHaveLength(all.length);
    expect(new Set(attached)).toEqual(new Set(all));
    expect(stats).toEqual({ attached: 2, uncarried: 1, residual: 2 });
  });

  it('should replace existing lists when applied again', () => {
    const associations = new Map([['item_0_block', [body]]]);
    const once = applyAssociations(sampleFile(), associations, [body]);
    const twice = applyAssociations(once, associations, [body]);
    const fn = twice.items[0];
    expect(fn.kind === 'fn' && fn.block.comments).toEqual([body]);
  });
});
