/**
 * Tree-sitter Parser Module
 *
 * Grammar parser adapter built on web-tree-sitter (WASM-based). The runtime
 * and the Rust grammar from tree-sitter-wasms are located and loaded on the
 * first `initialize()`; later calls reuse them.
 *
 * @module treeSitterParser
 */

import * as TreeSitter from 'web-tree-sitter';
import * as path from 'node:path';
import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { getLogger } from '../utils/logger.js';

/** Extensions parsed with the Rust grammar */
const RUST_EXTENSIONS: ReadonlySet<string> = new Set(['.rs']);

/** Runtime WASM, tried in order: 0.25.x ships tree-sitter.wasm, later releases web-tree-sitter.wasm */
export const RUNTIME_WASM_CANDIDATES: readonly string[] = [
  'web-tree-sitter/tree-sitter.wasm',
  'web-tree-sitter/web-tree-sitter.wasm',
];
const RUST_GRAMMAR_WASM = 'tree-sitter-wasms/out/tree-sitter-rust.wasm';

/**
 * node_modules directories to probe, in order: next to the installed
 * package, the working directory, then a global install.
 */
function nodeModulesCandidates(): string[] {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return [
    path.join(here, '../../node_modules'),
    path.join(process.cwd(), 'node_modules'),
    path.join(process.execPath, '../lib/node_modules/syntree-comments/node_modules'),
  ];
}

/**
 * First existing `<node_modules>/<relativePath>`, or null
 */
async function locateInNodeModules(relativePath: string): Promise<string | null> {
  const logger = getLogger();
  const candidates = nodeModulesCandidates().map((dir) => path.join(dir, relativePath));

  for (const candidate of candidates) {
    try {
      await fs.promises.access(candidate);
      logger.debug('treeSitterParser', 'Found WASM file', { path: candidate });
      return candidate;
    } catch {
      // try the next location
    }
  }

  logger.debug('treeSitterParser', 'WASM file not found', { file: relativePath, searchPaths: candidates });
  return null;
}

/**
 * First runtime WASM found under any candidate name, or null
 */
export async function locateRuntimeWasm(): Promise<string | null> {
  for (const candidate of RUNTIME_WASM_CANDIDATES) {
    const found = await locateInNodeModules(candidate);
    if (found) {
      return found;
    }
  }
  return null;
}

/**
 * Rust parser over web-tree-sitter
 *
 * @example
 * ```typescript
 * const parser = getTreeSitterParser();
 * await parser.initialize();
 * const tree = await parser.parse(sourceCode, 'lib.rs');
 * ```
 */
export class TreeSitterParser {
  private static instance: TreeSitterParser | null = null;

  private parser: TreeSitter.Parser | null = null;
  private loading: Promise<void> | null = null;

  private constructor() {}

  static getInstance(): TreeSitterParser {
    if (!TreeSitterParser.instance) {
      TreeSitterParser.instance = new TreeSitterParser();
    }
    return TreeSitterParser.instance;
  }

  /**
   * Load the runtime and the Rust grammar. Concurrent and repeated calls
   * share one load; a failed load is retried on the next call.
   *
   * @throws Error when a WASM file is missing or fails to load
   */
  initialize(): Promise<void> {
    if (!this.loading) {
      this.loading = this.load().catch((error: unknown) => {
        this.loading = null;
        throw error;
      });
    }
    return this.loading;
  }

  private async load(): Promise<void> {
    const logger = getLogger();

    try {
      const runtimePath = await locateRuntimeWasm();
      if (!runtimePath) {
        throw new Error('Could not find web-tree-sitter WASM file');
      }

      await TreeSitter.Parser.init({
        locateFile: (file: string) =>
          // The runtime asks for its WASM under whichever name its release uses
          file === 'tree-sitter.wasm' || file === 'web-tree-sitter.wasm' ? runtimePath : file,
      });

      const grammarPath = await locateInNodeModules(RUST_GRAMMAR_WASM);
      if (!grammarPath) {
        throw new Error('Could not find the tree-sitter-rust grammar');
      }

      const rust = await TreeSitter.Language.load(grammarPath);
      const parser = new TreeSitter.Parser();
      parser.setLanguage(rust);
      this.parser = parser;

      logger.debug('treeSitterParser', 'Rust grammar loaded', { runtimePath, grammarPath });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('treeSitterParser', 'Failed to initialize Tree-sitter', { error: message });
      throw error;
    }
  }

  /**
   * Parse Rust source text
   *
   * @returns The tree (caller deletes it), or null when the parser is not
   * loaded, the file is not Rust, or tree-sitter gave up
   */
  async parse(sourceCode: string, filePath: string): Promise<TreeSitter.Tree | null> {
    const logger = getLogger();

    if (!this.parser) {
      logger.warn('treeSitterParser', 'Parser not initialized');
      return null;
    }
    if (!this.isSupported(filePath)) {
      logger.debug('treeSitterParser', 'Not a Rust file', { filePath });
      return null;
    }

    try {
      const tree = this.parser.parse(sourceCode);
      if (!tree) {
        logger.warn('treeSitterParser', 'Parsing returned null', { filePath });
      }
      return tree;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('treeSitterParser', 'Parsing failed', { filePath, error: message });
      return null;
    }
  }

  isSupported(filePath: string): boolean {
    return RUST_EXTENSIONS.has(path.extname(filePath).toLowerCase());
  }
}

export function getTreeSitterParser(): TreeSitterParser {
  return TreeSitterParser.getInstance();
}

/**
 * Check if a file can be parsed into a syntax tree
 */
export function supportsParsing(filePath: string): boolean {
  return TreeSitterParser.getInstance().isSupported(filePath);
}
