/**
 * Lexer and Parser Error Classes
 *
 * Errors raised while turning expression text into an AST. Both carry the
 * source location and can render a snippet with a caret under the offending
 * position.
 *
 * @packageDocumentation
 */

import { ExpressionError, ErrorCategory, type ErrorContext } from './base.js';
import { LexErrorCode, ParseErrorCode } from './codes.js';
import type { SourceLocation } from '../parser/types.js';

/**
 * Render `message` followed by the source line and a caret
 */
export function formatErrorSnippet(
  message: string,
  source?: string,
  location?: SourceLocation
): string {
  const parts: string[] = [message];

  if (source !== undefined && location) {
    const lines = source.split('\n');
    const line = lines[location.line - 1];
    if (line !== undefined) {
      parts.push(`  ${line}`);
      parts.push(`  ${' '.repeat(Math.max(0, location.column - 1))}^`);
    }
  }

  return parts.join('\n');
}

// =============================================================================
// Lex Error
// =============================================================================

/**
 * Malformed token: unknown character, unterminated literal
 */
export class LexError extends ExpressionError {
  readonly code: LexErrorCode;
  readonly category = ErrorCategory.VALIDATION;

  /** Source location where error occurred */
  readonly location: SourceLocation;
  /** Original expression text */
  readonly source?: string;

  constructor(
    code: LexErrorCode,
    message: string,
    location: SourceLocation,
    source?: string,
    options?: { context?: ErrorContext }
  ) {
    super(`${message} at line ${location.line}, column ${location.column}`, options);
    this.name = 'LexError';
    this.code = code;
    this.location = location;
    this.source = source;
  }

  /**
   * Format error with source context
   */
  format(): string {
    return formatErrorSnippet(this.message, this.source, this.location);
  }
}

// =============================================================================
// Parse Error
// =============================================================================

/**
 * Grammar violation or out-of-range literal
 */
export class ParseError extends ExpressionError {
  readonly code: ParseErrorCode;
  readonly category = ErrorCategory.VALIDATION;

  /** Source location where error occurred */
  readonly location?: SourceLocation;
  /** Original expression text */
  source?: string;

  constructor(
    code: ParseErrorCode,
    message: string,
    location?: SourceLocation,
    source?: string
  ) {
    super(message);
    this.name = 'ParseError';
    this.code = code;
    this.location = location;
    this.source = source;
  }

  format(): string {
    return formatErrorSnippet(this.message, this.source, this.location);
  }
}

/**
 * Unexpected token error
 */
export class UnexpectedTokenError extends ParseError {
  /** Display form of the token that was found */
  readonly found: string;
  /** What the parser expected instead */
  readonly expected: string;

  constructor(found: string, expected: string, location?: SourceLocation, source?: string) {
    super(ParseErrorCode.UNEXPECTED_TOKEN, `Expected ${expected}, found ${found}`, location, source);
    this.name = 'UnexpectedTokenError';
    this.found = found;
    this.expected = expected;
  }
}

/**
 * Unexpected end of input error
 */
export class UnexpectedEOFError extends ParseError {
  /** What the parser expected */
  readonly expected: string;

  constructor(expected: string, location?: SourceLocation, source?: string) {
    super(
      ParseErrorCode.UNEXPECTED_EOF,
      `Unexpected end of input, expected ${expected}`,
      location,
      source
    );
    this.name = 'UnexpectedEOFError';
    this.expected = expected;
  }
}

/**
 * Integer literal whose magnitude does not fit in 64 bits
 */
export function createNumberOutOfRangeError(
  location?: SourceLocation,
  source?: string
): ParseError {
  return new ParseError(
    ParseErrorCode.NUMBER_OUT_OF_RANGE,
    'number too large to fit in target type',
    location,
    source
  );
}

/**
 * Parenthesis nesting or operator tree depth over the configured maximum
 */
export function createNestingTooDeepError(
  maxDepth: number,
  location?: SourceLocation,
  source?: string
): ParseError {
  return new ParseError(
    ParseErrorCode.TOO_DEEP,
    `Expression nesting exceeds maximum depth of ${maxDepth}`,
    location,
    source
  );
}
