/**
 * sqlexpr Error Module
 *
 * @packageDocumentation
 */

// Base classes and types
export {
  ExpressionError,
  ErrorCategory,
  type ErrorContext,
  type SerializedError,
  type ErrorLogEntry,
} from './base.js';

// Error codes
export {
  LexErrorCode,
  ParseErrorCode,
  ValueErrorCode,
  LookupErrorCode,
  type ExpressionErrorCode,
} from './codes.js';

// Lexer and parser errors
export {
  LexError,
  ParseError,
  UnexpectedTokenError,
  UnexpectedEOFError,
  createNumberOutOfRangeError,
  createNestingTooDeepError,
  formatErrorSnippet,
} from './syntax-errors.js';

// Evaluation errors
export {
  ValueError,
  LookupError,
  createTypeMismatchError,
  createIntegerOverflowError,
  createDivideByZeroError,
  createNegativeFactorialError,
  createNoRowError,
  createColumnNotFoundError,
} from './evaluation-errors.js';
