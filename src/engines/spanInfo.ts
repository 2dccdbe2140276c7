/**
 * Span Model
 *
 * Positional records shared by extracted comments and syntax tree nodes.
 * Lines are 1-based, columns are 0-based and end columns are exclusive.
 * Offsets are character offsets into the source, or 0 when the position
 * source cannot supply them.
 *
 * @module spanInfo
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Serializable span information
 */
export interface SpanInfo {
  /** Line number (1-based) of the start of the span */
  startLine: number;
  /** Column (0-based) of the start of the span */
  startColumn: number;
  /** Line number (1-based) of the end of the span */
  endLine: number;
  /** Column (0-based, exclusive) of the end of the span */
  endColumn: number;
  /** Character offset of the start of the span (0 when unavailable) */
  startOffset: number;
  /** Character offset of the end of the span (0 when unavailable) */
  endOffset: number;
}

/**
 * A single (line, column) location
 */
export interface SourcePosition {
  line: number;
  column: number;
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Create a frozen span. Offsets default to 0.
 */
export function createSpan(
  start: SourcePosition,
  end: SourcePosition,
  offsets: { startOffset: number; endOffset: number } = { startOffset: 0, endOffset: 0 }
): SpanInfo {
  return Object.freeze({
    startLine: start.line,
    startColumn: start.column,
    endLine: end.line,
    endColumn: end.column,
    startOffset: offsets.startOffset,
    endOffset: offsets.endOffset,
  });
}

/**
 * Create a span whose start and end coincide
 */
export function pointSpan(position: SourcePosition, offset: number = 0): SpanInfo {
  return createSpan(position, position, { startOffset: offset, endOffset: offset });
}

// ============================================================================
// Comparison
// ============================================================================

/**
 * Compare two positions by line, then column
 */
export function comparePositions(a: SourcePosition, b: SourcePosition): number {
  if (a.line !== b.line) {
    return a.line - b.line;
  }
  return a.column - b.column;
}

export function spanStart(span: SpanInfo): SourcePosition {
  return { line: span.startLine, column: span.startColumn };
}

export function spanEnd(span: SpanInfo): SourcePosition {
  return { line: span.endLine, column: span.endColumn };
}

/**
 * Order spans by start position, then by end position
 */
export function compareSpans(a: SpanInfo, b: SpanInfo): number {
  return comparePositions(spanStart(a), spanStart(b)) || comparePositions(spanEnd(a), spanEnd(b));
}

export function spansEqual(a: SpanInfo, b: SpanInfo): boolean {
  return (
    a.startLine === b.startLine &&
    a.startColumn === b.startColumn &&
    a.endLine === b.endLine &&
    a.endColumn === b.endColumn &&
    a.startOffset === b.startOffset &&
    a.endOffset === b.endOffset
  );
}

// ============================================================================
// Predicates and Measures
// ============================================================================

/**
 * A span is well formed when its end does not precede its start
 */
export function isWellFormed(span: SpanInfo): boolean {
  return (
    span.startLine >= 1 &&
    span.endLine >= 1 &&
    span.startColumn >= 0 &&
    span.endColumn >= 0 &&
    comparePositions(spanStart(span), spanEnd(span)) <= 0
  );
}

export function isPointSpan(span: SpanInfo): boolean {
  return span.startLine === span.endLine && span.startColumn === span.endColumn;
}

/**
 * Inclusive containment of a position within a span
 */
export function containsPosition(span: SpanInfo, position: SourcePosition): boolean {
  return (
    comparePositions(spanStart(span), position) <= 0 &&
    comparePositions(position, spanEnd(span)) <= 0
  );
}

/**
 * Number of lines between start and end (0 for a single-line span)
 */
export function spanLineCount(span: SpanInfo): number {
  return span.endLine - span.startLine;
}

export function spanColumnWidth(span: SpanInfo): number {
  return span.endColumn - span.startColumn;
}

/**
 * Format a span as "startLine:startColumn-endLine:endColumn"
 */
export function formatSpan(span: SpanInfo): string {
  return `${span.startLine}:${span.startColumn}-${span.endLine}:${span.endColumn}`;
}

// ============================================================================
// Line Index
// ============================================================================

/**
 * Maps (line, column) positions to character offsets in a source string.
 *
 * Lines are split on `\n`; a trailing `\r` stays part of the line ending,
 * so offsets count it.
 */
export class LineIndex {
  private readonly lineStarts: number[];
  private readonly sourceLength: number;

  constructor(source: string) {
    this.lineStarts = [0];
    this.sourceLength = source.length;
    for (let i = 0; i < source.length; i++) {
      if (source.charCodeAt(i) === 10) {
        this.lineStarts.push(i + 1);
      }
    }
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  /**
   * Character offset of a position, clamped to the source length
   */
  offsetOf(position: SourcePosition): number {
    const lineStart = this.lineStarts[position.line - 1];
    if (lineStart === undefined) {
      return this.sourceLength;
    }
    return Math.min(lineStart + position.column, this.sourceLength);
  }

  /**
   * Build a span with offsets filled in from this index
   */
  span(start: SourcePosition, end: SourcePosition): SpanInfo {
    return createSpan(start, end, {
      startOffset: this.offsetOf(start),
      endOffset: this.offsetOf(end),
    });
  }
}
