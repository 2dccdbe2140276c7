/**
 * Error Handling System
 *
 * Standardized errors with a dual-message format:
 * - userMessage: Friendly message for end users (no technical details)
 * - developerMessage: Technical details for debugging
 *
 * The association core never throws for degraded input. These errors cover
 * the stages around it: reading files, loading the parser, parsing, and
 * decoding serialized trees.
 */

import { getLogger } from '../utils/logger.js';
import { sanitizePath } from '../utils/paths.js';

/**
 * Error codes
 */
export enum ErrorCode {
  /** Requested file does not exist */
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  /** The tree-sitter runtime or grammar could not be loaded */
  PARSER_UNAVAILABLE = 'PARSER_UNAVAILABLE',
  /** No grammar is registered for the file's extension */
  UNSUPPORTED_LANGUAGE = 'UNSUPPORTED_LANGUAGE',
  /** The source text is not syntactically valid */
  PARSE_FAILED = 'PARSE_FAILED',
  /** A serialized tree does not match the expected shape */
  INVALID_TREE = 'INVALID_TREE',
  /** A config file passed explicitly is not valid */
  INVALID_CONFIG = 'INVALID_CONFIG',
  /** Writing an output file failed */
  WRITE_FAILED = 'WRITE_FAILED',
}

export interface SyntreeErrorOptions {
  code: ErrorCode;
  userMessage: string;
  developerMessage: string;
  cause?: Error;
}

/**
 * Error class with separate user and developer messages.
 * Logged at ERROR level on construction.
 */
export class SyntreeError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;

  /** User-friendly message (safe to display to end users) */
  readonly userMessage: string;

  /** Technical message with debugging details */
  readonly developerMessage: string;

  /** Original error that caused this error */
  readonly cause?: Error;

  constructor(options: SyntreeErrorOptions) {
    super(options.developerMessage);

    this.code = options.code;
    this.userMessage = options.userMessage;
    this.developerMessage = options.developerMessage;
    this.cause = options.cause;

    // Set the prototype explicitly for proper instanceof checks
    Object.setPrototypeOf(this, SyntreeError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SyntreeError);
    }

    this.name = `SyntreeError[${this.code}]`;

    this.logError();
  }

  private logError(): void {
    const meta: Record<string, unknown> = {
      code: this.code,
      userMessage: this.userMessage,
    };

    if (this.cause) {
      meta.cause = {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack,
      };
    }

    getLogger().error('SyntreeError', this.developerMessage, meta);
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      userMessage: this.userMessage,
      developerMessage: this.developerMessage,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
    };
  }

  toString(): string {
    return `${this.name}: ${this.developerMessage}`;
  }
}

// ============================================================================
// Error Factory Functions
// ============================================================================

/**
 * Create a FILE_NOT_FOUND error
 *
 * @param filePath - The path to the missing file
 */
export function fileNotFound(filePath: string): SyntreeError {
  return new SyntreeError({
    code: ErrorCode.FILE_NOT_FOUND,
    userMessage: 'The requested file could not be found.',
    developerMessage: `File not found: ${sanitizePath(filePath)}`,
  });
}

/**
 * Create a PARSER_UNAVAILABLE error
 *
 * Used when the tree-sitter runtime or a grammar WASM file cannot be loaded.
 */
export function parserUnavailable(details: string, cause?: Error): SyntreeError {
  return new SyntreeError({
    code: ErrorCode.PARSER_UNAVAILABLE,
    userMessage:
      'The source parser could not be loaded. Reinstall dependencies and try again.',
    developerMessage: `Tree-sitter parser unavailable: ${details}`,
    cause,
  });
}

/**
 * Create an UNSUPPORTED_LANGUAGE error
 *
 * @param filePath - The file whose extension has no grammar
 */
export function unsupportedLanguage(filePath: string): SyntreeError {
  return new SyntreeError({
    code: ErrorCode.UNSUPPORTED_LANGUAGE,
    userMessage: 'This file type is not supported. Only Rust (.rs) files can be annotated.',
    developerMessage: `No grammar registered for: ${sanitizePath(filePath)}`,
  });
}

/**
 * Create a PARSE_FAILED error
 *
 * @param filePath - The file being parsed
 * @param line - 1-based line of the first syntax error
 * @param column - 0-based column of the first syntax error
 */
export function parseFailed(filePath: string, line: number, column: number): SyntreeError {
  return new SyntreeError({
    code: ErrorCode.PARSE_FAILED,
    userMessage: `The source file has a syntax error near line ${line}.`,
    developerMessage: `Syntax error in ${sanitizePath(filePath)} at ${line}:${column}`,
  });
}

/**
 * Create an INVALID_TREE error
 *
 * @param details - Validation issues found in the serialized tree
 */
export function invalidTree(details: string): SyntreeError {
  return new SyntreeError({
    code: ErrorCode.INVALID_TREE,
    userMessage: 'The syntax tree file is not valid and could not be loaded.',
    developerMessage: `Invalid serialized syntax tree: ${details}`,
  });
}

/**
 * Create an INVALID_CONFIG error
 *
 * @param configPath - The config file that failed validation
 * @param details - Validation issues
 */
export function invalidConfig(configPath: string, details: string): SyntreeError {
  return new SyntreeError({
    code: ErrorCode.INVALID_CONFIG,
    userMessage: 'The configuration file is not valid. Please check its settings.',
    developerMessage: `Invalid config at ${sanitizePath(configPath)}: ${details}`,
  });
}

// ============================================================================
// Type Guards and Utilities
// ============================================================================

export function isSyntreeError(error: unknown): error is SyntreeError {
  return error instanceof SyntreeError;
}

/**
 * Wrap an unknown error as a SyntreeError if it isn't already
 *
 * @param error - The error to wrap
 * @param defaultCode - Error code to use if wrapping a non-SyntreeError
 * @param context - Additional context for the error message
 */
export function wrapError(
  error: unknown,
  defaultCode: ErrorCode = ErrorCode.WRITE_FAILED,
  context: string = 'An unexpected error occurred'
): SyntreeError {
  if (isSyntreeError(error)) {
    return error;
  }

  const originalError = error instanceof Error ? error : new Error(String(error));

  return new SyntreeError({
    code: defaultCode,
    userMessage: 'An unexpected error occurred. Please try again.',
    developerMessage: `${context}: ${originalError.message}`,
    cause: originalError,
  });
}
