import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  ConfigSchema,
  DEFAULT_CONFIG,
  loadConfig,
  generateDefaultConfig,
} from '../../../src/storage/config.js';
import { ErrorCode, SyntreeError } from '../../../src/errors/index.js';

// Mock the logger to avoid console noise
vi.mock('../../../src/utils/logger.js', () => ({
  getLogger: () => ({
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  }),
}));

describe('Config Manager', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(async () => {
    testDir = path.join(os.tmpdir(), `syntree-comments-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    configPath = path.join(testDir, 'syntree-comments.json');
    await fs.promises.mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await fs.promises.rm(testDir, { recursive: true, force: true });
  });

  describe('ConfigSchema', () => {
    it('should fill every field with its default', () => {
      expect(ConfigSchema.parse({})).toEqual(DEFAULT_CONFIG);
    });

    it('should reject unknown policies', () => {
      expect(ConfigSchema.safeParse({ associationPolicy: 'closest' }).success).toBe(false);
    });

    it('should reject unknown fields', () => {
      expect(ConfigSchema.safeParse({ policy: 'nearest' }).success).toBe(false);
    });
  });

  describe('loadConfig', () => {
    it('should return defaults when the file does not exist', async () => {
      expect(await loadConfig(configPath)).toEqual(DEFAULT_CONFIG);
    });

    it('should load valid values and default the rest', async () => {
      await fs.promises.writeFile(configPath, JSON.stringify({ associationPolicy: 'nearest', compactJson: true }));
      expect(await loadConfig(configPath)).toEqual({
        ...DEFAULT_CONFIG,
        associationPolicy: 'nearest',
        compactJson: true,
      });
    });

    it('should ignore documentation fields', async () => {
      await fs.promises.writeFile(configPath, JSON.stringify({ _comment: 'notes', prettyJson: false }));
      expect((await loadConfig(configPath)).prettyJson).toBe(false);
    });

    it('should fall back to defaults on invalid JSON', async () => {
      await fs.promises.writeFile(configPath, '{ not json');
      expect(await loadConfig(configPath)).toEqual(DEFAULT_CONFIG);
    });

    it('should fall back to defaults on invalid values', async () => {
      await fs.promises.writeFile(configPath, JSON.stringify({ includeLineComments: 'yes' }));
      expect(await loadConfig(configPath)).toEqual(DEFAULT_CONFIG);
    });

    it('should fail on a missing required file', async () => {
      const error = await loadConfig(configPath, { required: true }).catch((e: unknown) => e);
      expect(error instanceof SyntreeError && error.code).toBe(ErrorCode.FILE_NOT_FOUND);
    });

    it('should fail on an invalid required file', async () => {
      await fs.promises.writeFile(configPath, JSON.stringify({ associationPolicy: 'closest' }));
      const error = await loadConfig(configPath, { required: true }).catch((e: unknown) => e);
      expect(error instanceof SyntreeError && error.code).toBe(ErrorCode.INVALID_CONFIG);
      expect(error instanceof SyntreeError && error.developerMessage).toContain('associationPolicy');
    });
  });

  describe('generateDefaultConfig', () => {
    it('should write a documented config that loads back to the defaults', async () => {
      await generateDefaultConfig(configPath);

      const raw: unknown = JSON.parse(await fs.promises.readFile(configPath, 'utf-8'));
      expect(raw).toMatchObject({ _comment: expect.any(String), associationPolicy: 'conservative' });
      expect(await loadConfig(configPath, { required: true })).toEqual(DEFAULT_CONFIG);
    });
  });
});
