import { describe, it, expect, beforeEach, vi } from 'vitest';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  ErrorCode,
  SyntreeError,
  fileNotFound,
  parserUnavailable,
  unsupportedLanguage,
  parseFailed,
  invalidTree,
  invalidConfig,
  isSyntreeError,
  wrapError,
} from '../../../src/errors/index.js';

const { errorSpy } = vi.hoisted(() => ({ errorSpy: vi.fn() }));

vi.mock('../../../src/utils/logger.js', () => ({
  getLogger: () => ({
    error: errorSpy,
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  }),
}));

describe('SyntreeError', () => {
  beforeEach(() => {
    errorSpy.mockClear();
  });

  it('should carry both messages and the code', () => {
    const error = new SyntreeError({
      code: ErrorCode.INVALID_TREE,
      userMessage: 'friendly',
      developerMessage: 'technical',
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('technical');
    expect(error.name).toBe('SyntreeError[INVALID_TREE]');
    expect(error.toString()).toBe('SyntreeError[INVALID_TREE]: technical');
  });

  it('should log itself when constructed', () => {
    new SyntreeError({ code: ErrorCode.PARSE_FAILED, userMessage: 'u', developerMessage: 'd' });
    expect(errorSpy).toHaveBeenCalledWith('SyntreeError', 'd', { code: 'PARSE_FAILED', userMessage: 'u' });
  });

  it('should serialize the cause without its stack', () => {
    const error = parserUnavailable('no wasm', new Error('ENOENT'));
    expect(error.toJSON()).toEqual({
      code: 'PARSER_UNAVAILABLE',
      userMessage: 'The source parser could not be loaded. Reinstall dependencies and try again.',
      developerMessage: 'Tree-sitter parser unavailable: no wasm',
      cause: { name: 'Error', message: 'ENOENT' },
    });
  });
});

describe('error factories', () => {
  const home = os.homedir();

  it('should hide the home directory in file paths', () => {
    const error = fileNotFound(path.join(home, 'src', 'lib.rs'));
    expect(error.code).toBe(ErrorCode.FILE_NOT_FOUND);
    expect(error.developerMessage).toBe('File not found: ~/src/lib.rs');
  });

  it('should report the syntax error position', () => {
    const error = parseFailed(path.join(home, 'main.rs'), 3, 7);
    expect(error.userMessage).toBe('The source file has a syntax error near line 3.');
    expect(error.developerMessage).toBe('Syntax error in ~/main.rs at 3:7');
  });

  it('should name the supported language', () => {
    expect(unsupportedLanguage(path.join(home, 'a.py')).userMessage).toContain('Rust (.rs)');
  });

  it('should prefix decoding details', () => {
    expect(invalidTree('items: Required').developerMessage).toBe('Invalid serialized syntax tree: items: Required');
  });

  it('should include the config path and details', () => {
    const error = invalidConfig(path.join(home, 'syntree-comments.json'), 'bad policy');
    expect(error.code).toBe(ErrorCode.INVALID_CONFIG);
    expect(error.developerMessage).toBe('Invalid config at ~/syntree-comments.json: bad policy');
  });
});

describe('wrapError', () => {
  it('should return SyntreeErrors unchanged', () => {
    const original = invalidTree('x');
    expect(wrapError(original)).toBe(original);
  });

  it('should wrap plain errors with context', () => {
    const wrapped = wrapError(new Error('disk full'), ErrorCode.WRITE_FAILED, 'Failed to write out.json');
    expect(isSyntreeError(wrapped)).toBe(true);
    expect(wrapped.code).toBe(ErrorCode.WRITE_FAILED);
    expect(wrapped.developerMessage).toBe('Failed to write out.json: disk full');
    expect(wrapped.cause?.message).toBe('disk full');
  });

  it('should wrap non-error values', () => {
    expect(wrapError('boom').developerMessage).toBe('An unexpected error occurred: boom');
  });

  it('should tell SyntreeErrors apart from other values', () => {
    expect(isSyntreeError(new Error('x'))).toBe(false);
    expect(isSyntreeError(null)).toBe(false);
  });
});
