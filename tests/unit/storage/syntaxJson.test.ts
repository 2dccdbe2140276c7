import { describe, it, expect, beforeEach } from 'vitest';
import { toJSON, toJSONString, fromJSON, fromJSONString } from '../../../src/storage/syntaxJson.js';
import { annotateTree } from '../../../src/engines/commentAnnotator.js';
import { createSpan } from '../../../src/engines/spanInfo.js';
import type { SourceFile } from '../../../src/engines/syntaxTree.js';
import { ErrorCode, SyntreeError } from '../../../src/errors/index.js';
import { resetLogger } from '../../../src/utils/logger.js';

const SOURCE = 'use std::fmt; // imports\nfn f() {\n  // inside\n}\n// end\n';

function annotated(): SourceFile {
  const file: SourceFile = {
    items: [
      { kind: 'use', path: 'std::fmt', span: createSpan({ line: 1, column: 0 }, { line: 1, column: 3 }) },
      {
        kind: 'fn',
        name: 'f',
        isPublic: false,
        isAsync: false,
        params: [],
        span: createSpan({ line: 2, column: 3 }, { line: 2, column: 4 }),
        block: { span: createSpan({ line: 2, column: 7 }, { line: 4, column: 1 }) },
      },
      { kind: 'struct', name: 'S', isPublic: true, fields: ['x'] },
    ],
  };
  return annotateTree(file, SOURCE).file;
}

function decodeError(value: unknown): SyntreeError | undefined {
  try {
    fromJSON(value);
    return undefined;
  } catch (error) {
    return error instanceof SyntreeError ? error : undefined;
  }
}

describe('toJSON', () => {
  beforeEach(() => {
    resetLogger();
  });

  it('should write kind first, then fields alphabetically, then span, comments and block', () => {
    const json = toJSON(annotated());
    const items = json.items;
    expect(Array.isArray(items)).toBe(true);
    if (Array.isArray(items)) {
      const fn = items[1];
      expect(fn !== null && typeof fn === 'object' && !Array.isArray(fn) && Object.keys(fn)).toEqual([
        'kind',
        'isAsync',
        'isPublic',
        'name',
        'params',
        'span',
        'block',
      ]);
    }
  });

  it('should attach the trailing comment to the use item and the inner one to the block', () => {
    const text = toJSONString(annotated());
    const parsed: unknown = JSON.parse(text);
    expect(parsed).toMatchObject({
      items: [
        { kind: 'use', comments: [{ text: 'imports', kind: 'line' }] },
        { kind: 'fn', block: { comments: [{ text: 'inside' }] } },
        { kind: 'struct', name: 'S' },
      ],
      comments: [{ text: 'end', span: { startLine: 5, startColumn: 0, endColumn: 6 } }],
    });
  });

  it('should omit every span in compact form', () => {
    const compact = toJSONString(annotated(), { compact: true });
    expect(compact).not.toContain('span');
    expect(compact).not.toContain('startLine');
    expect(compact).toContain('"text":"inside"');
  });

  it('should never write empty comment lists', () => {
    const file: SourceFile = {
      items: [{ kind: 'trait', name: 'T', isPublic: false, comments: [], block: { comments: [] } }],
      comments: [],
    };
    expect(toJSON(file)).toEqual({ items: [{ kind: 'trait', isPublic: false, name: 'T', block: {} }] });
  });

  it('should indent when pretty is set', () => {
    expect(toJSONString({ items: [] }, { pretty: true })).toBe('{\n  "items": []\n}');
    expect(toJSONString({ items: [] })).toBe('{"items":[]}');
  });
});

describe('fromJSON', () => {
  beforeEach(() => {
    resetLogger();
  });

  it('should round-trip a full tree without change', () => {
    const text = toJSONString(annotated());
    expect(toJSONString(fromJSONString(text))).toBe(text);
  });

  it('should round-trip a compact tree without comments', () => {
    const file: SourceFile = {
      items: [
        { kind: 'impl', selfType: 'P', traitName: 'Clone', block: {} },
        { kind: 'foreignMod' },
        { kind: 'verbatim', text: ';' },
      ],
    };
    const text = toJSONString(file, { compact: true });
    expect(toJSONString(fromJSONString(text), { compact: true })).toBe(text);
  });

  it('should fill in missing offsets', () => {
    const file = fromJSON({
      items: [{ kind: 'const', name: 'N', isPublic: false, span: { startLine: 1, startColumn: 6, endLine: 1, endColumn: 7 } }],
    });
    expect(file.items[0]).toEqual({
      kind: 'const',
      name: 'N',
      isPublic: false,
      span: { startLine: 1, startColumn: 6, endLine: 1, endColumn: 7, startOffset: 0, endOffset: 0 },
    });
  });

  it('should drop empty comment lists', () => {
    const file = fromJSON({ items: [{ kind: 'union', name: 'U', comments: [] }], comments: [] });
    expect(file).toEqual({ items: [{ kind: 'union', name: 'U' }] });
  });

  it('should reject unknown kinds', () => {
    expect(decodeError({ items: [{ kind: 'class', name: 'C' }] })?.code).toBe(ErrorCode.INVALID_TREE);
  });

  it('should reject comments on kinds that cannot hold them', () => {
    const error = decodeError({
      items: [{ kind: 'struct', name: 'S', isPublic: false, fields: [], comments: [] }],
    });
    expect(error?.code).toBe(ErrorCode.INVALID_TREE);
  });

  it('should reject comments without spans', () => {
    const error = decodeError({ items: [], comments: [{ text: 'x', kind: 'line' }] });
    expect(error?.code).toBe(ErrorCode.INVALID_TREE);
    expect(error?.developerMessage).toContain('comments.0.span');
  });

  it('should reject malformed JSON text', () => {
    let caught: unknown;
    try {
      fromJSONString('{"items": [');
    } catch (error) {
      caught = error;
    }
    expect(caught instanceof SyntreeError && caught.code).toBe(ErrorCode.INVALID_TREE);
  });
});
