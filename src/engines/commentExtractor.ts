/**
 * Comment Extraction Engine
 *
 * Recovers `//` line comments and single-line `/* ... *\/` block comments
 * from raw source text without tokenizing it. The scan works one physical
 * line at a time, left to right:
 *
 * - Block comments must close on the line they open on. An unclosed
 *   block comment is skipped along with the rest of that line's blocks.
 * - The line comment is the first `//` that is outside a quoted region
 *   and outside any block comment found on the line. Block markers after
 *   it are part of its text.
 * - Quote state is tracked within the line only (`"` and `'`, with
 *   backslash escapes). A marker inside a live quote is not a comment.
 *
 * @module commentExtractor
 */

import { LineIndex, type SpanInfo, comparePositions } from './spanInfo.js';
import { getLogger } from '../utils/logger.js';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Kind of comment, by delimiter
 */
export type CommentKind =
  | 'line'   // // ...
  | 'block'; // /* ... */

/**
 * A comment recovered from source text
 */
export interface Comment {
  /** Comment text without delimiters, trimmed */
  readonly text: string;
  /** Location of the comment including its delimiters */
  readonly span: SpanInfo;
  readonly kind: CommentKind;
}

/**
 * Options for comment extraction
 */
export interface CommentExtractionOptions {
  /** Extract `//` comments (default: true) */
  includeLineComments?: boolean;
  /** Extract single-line `/* *\/` comments (default: true) */
  includeBlockComments?: boolean;
}

// ============================================================================
// Constants
// ============================================================================

export const LINE_COMMENT_MARKER = '//';
export const BLOCK_COMMENT_OPEN = '/*';
export const BLOCK_COMMENT_CLOSE = '*/';

export const DEFAULT_EXTRACTION_OPTIONS: Required<CommentExtractionOptions> = {
  includeLineComments: true,
  includeBlockComments: true,
};

// ============================================================================
// Quote Tracking
// ============================================================================

/**
 * Check whether a position on a line falls inside a quoted region.
 *
 * Walks the line up to `position`, opening a region on `"` or `'` and
 * closing it on the same character. A backslash inside a region escapes
 * the next character. Regions never continue onto the next line.
 *
 * @param line - A single physical line
 * @param position - Index of the candidate marker
 */
export function isInsideStringLiteral(line: string, position: number): boolean {
  let quoteChar: string | null = null;
  let escaped = false;

  for (let i = 0; i < position && i < line.length; i++) {
    const c = line[i];

    if ((c === '"' || c === "'") && !escaped) {
      if (quoteChar === null) {
        quoteChar = c;
      } else if (c === quoteChar) {
        quoteChar = null;
      }
    } else if (c === '\\' && quoteChar !== null) {
      escaped = !escaped;
      continue;
    }

    escaped = false;
  }

  return quoteChar !== null;
}

// ============================================================================
// Line Scanning
// ============================================================================

export interface LineMatch {
  kind: CommentKind;
  text: string;
  startColumn: number;
  endColumn: number;
}

function scanBlockComments(line: string): LineMatch[] {
  const matches: LineMatch[] = [];
  let searchStart = 0;

  while (searchStart < line.length) {
    const start = line.indexOf(BLOCK_COMMENT_OPEN, searchStart);
    if (start === -1) {
      break;
    }

    if (isInsideStringLiteral(line, start)) {
      searchStart = start + 1;
      continue;
    }

    const close = line.indexOf(BLOCK_COMMENT_CLOSE, start + BLOCK_COMMENT_OPEN.length);
    if (close === -1) {
      // Continues on a later line: unsupported, skip the rest of the line
      break;
    }

    matches.push({
      kind: 'block',
      text: line.slice(start + BLOCK_COMMENT_OPEN.length, close).trim(),
      startColumn: start,
      endColumn: close + BLOCK_COMMENT_CLOSE.length,
    });
    searchStart = close + BLOCK_COMMENT_CLOSE.length;
  }

  return matches;
}

function findLineComment(line: string, blocks: LineMatch[]): LineMatch | null {
  let searchStart = 0;

  while (searchStart < line.length) {
    const start = line.indexOf(LINE_COMMENT_MARKER, searchStart);
    if (start === -1) {
      return null;
    }

    const enclosing = blocks.find((b) => start >= b.startColumn && start < b.endColumn);
    if (enclosing) {
      searchStart = enclosing.endColumn;
      continue;
    }

    if (isInsideStringLiteral(line, start)) {
      return null;
    }

    return {
      kind: 'line',
      text: line.slice(start + LINE_COMMENT_MARKER.length).trim(),
      startColumn: start,
      endColumn: line.length,
    };
  }

  return null;
}

/**
 * Scan a single line, returning its comments ordered by column
 */
export function scanLine(
  line: string,
  options: Required<CommentExtractionOptions> = DEFAULT_EXTRACTION_OPTIONS
): LineMatch[] {
  const blocks = scanBlockComments(line);
  const lineComment = findLineComment(line, blocks);

  const matches: LineMatch[] = [];
  if (options.includeBlockComments) {
    for (const block of blocks) {
      if (lineComment === null || block.startColumn < lineComment.startColumn) {
        matches.push(block);
      }
    }
  }
  if (options.includeLineComments && lineComment !== null) {
    matches.push(lineComment);
  }

  return matches.sort((a, b) => a.startColumn - b.startColumn);
}

// ============================================================================
// Main Extraction API
// ============================================================================

/**
 * Extract comments from source text.
 *
 * The result is ordered by ascending (line, column) and is identical for
 * identical input.
 *
 * @example
 * ```typescript
 * extractComments('/* a *\/ /* b *\/ code');
 * // => two block comments, "a" at columns 0-7 and "b" at columns 8-15
 * ```
 */
export function extractComments(
  source: string,
  options: CommentExtractionOptions = {}
): Comment[] {
  const opts: Required<CommentExtractionOptions> = {
    includeLineComments: options.includeLineComments ?? DEFAULT_EXTRACTION_OPTIONS.includeLineComments,
    includeBlockComments: options.includeBlockComments ?? DEFAULT_EXTRACTION_OPTIONS.includeBlockComments,
  };
  const index = new LineIndex(source);
  const comments: Comment[] = [];

  const lines = source.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].endsWith('\r') ? lines[i].slice(0, -1) : lines[i];
    const lineNumber = i + 1;

    for (const match of scanLine(line, opts)) {
      comments.push(
        Object.freeze({
          text: match.text,
          kind: match.kind,
          span: index.span(
            { line: lineNumber, column: match.startColumn },
            { line: lineNumber, column: match.endColumn }
          ),
        })
      );
    }
  }

  getLogger().debug('commentExtractor', 'Extracted comments', {
    lines: lines.length,
    comments: comments.length,
  });

  return comments;
}

/**
 * Order comments by start position
 */
export function compareComments(a: Comment, b: Comment): number {
  return comparePositions(
    { line: a.span.startLine, column: a.span.startColumn },
    { line: b.span.startLine, column: b.span.startColumn }
  );
}
