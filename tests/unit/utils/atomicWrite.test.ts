import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { atomicWrite, writeOutputFile } from '../../../src/utils/atomicWrite.js';
import { ErrorCode, SyntreeError } from '../../../src/errors/index.js';

vi.mock('../../../src/utils/logger.js', () => ({
  getLogger: () => ({
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  }),
}));

describe('Atomic Write Utilities', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = path.join(os.tmpdir(), `syntree-comments-write-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await fs.promises.mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await fs.promises.rm(testDir, { recursive: true, force: true });
  });

  describe('atomicWrite', () => {
    it('should write content to file', async () => {
      const target = path.join(testDir, 'out.json');
      await atomicWrite(target, '{"items":[]}');
      expect(await fs.promises.readFile(target, 'utf-8')).toBe('{"items":[]}');
    });

    it('should create parent directories', async () => {
      const target = path.join(testDir, 'a', 'b', 'out.json');
      await atomicWrite(target, 'x');
      expect(fs.existsSync(target)).toBe(true);
    });

    it('should overwrite an existing file', async () => {
      const target = path.join(testDir, 'out.json');
      await fs.promises.writeFile(target, 'old');
      await atomicWrite(target, 'new');
      expect(await fs.promises.readFile(target, 'utf-8')).toBe('new');
    });

    it('should not leave temp files behind', async () => {
      await atomicWrite(path.join(testDir, 'out.json'), 'x');
      expect(await fs.promises.readdir(testDir)).toEqual(['out.json']);
    });

    it('should remove the temp file when the rename fails', async () => {
      // A directory at the target path makes rename fail after the temp file exists
      const target = path.join(testDir, 'taken');
      await fs.promises.mkdir(path.join(target, 'child'), { recursive: true });

      await expect(atomicWrite(target, 'x')).rejects.toThrow();
      expect(await fs.promises.readdir(testDir)).toEqual(['taken']);
    });
  });

  describe('writeOutputFile', () => {
    it('should end the content with a newline', async () => {
      const target = path.join(testDir, 'out.json');
      await writeOutputFile(target, '{}');
      expect(await fs.promises.readFile(target, 'utf-8')).toBe('{}\n');
    });

    it('should not add a second newline', async () => {
      const target = path.join(testDir, 'out.json');
      await writeOutputFile(target, '{}\n');
      expect(await fs.promises.readFile(target, 'utf-8')).toBe('{}\n');
    });

    it('should report failures as WRITE_FAILED', async () => {
      const target = path.join(testDir, 'taken');
      await fs.promises.mkdir(path.join(target, 'child'), { recursive: true });

      const error = await writeOutputFile(target, 'x').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(SyntreeError);
      expect(error instanceof SyntreeError && error.code).toBe(ErrorCode.WRITE_FAILED);
    });
  });
});
