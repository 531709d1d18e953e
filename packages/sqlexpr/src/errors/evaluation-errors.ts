/**
 * Evaluation Error Classes
 *
 * ValueError covers every runtime failure of an operator; LookupError covers
 * column resolution. Messages embed operand display forms and are part of
 * the public contract.
 *
 * @packageDocumentation
 */

import { ExpressionError, ErrorCategory, type ErrorContext } from './base.js';
import { LookupErrorCode, ValueErrorCode } from './codes.js';

// =============================================================================
// Value Error
// =============================================================================

/**
 * Runtime evaluation failure
 */
export class ValueError extends ExpressionError {
  readonly code: ValueErrorCode;
  readonly category = ErrorCategory.EXECUTION;

  constructor(code: ValueErrorCode, message: string, options?: { context?: ErrorContext }) {
    super(message, options);
    this.name = 'ValueError';
    this.code = code;
  }
}

/**
 * Operator applied to operands it does not accept
 *
 * @example
 * ```typescript
 * createTypeMismatchError("Can't add TRUE and FALSE");
 * ```
 */
export function createTypeMismatchError(message: string): ValueError {
  return new ValueError(ValueErrorCode.TYPE_MISMATCH, message);
}

export function createIntegerOverflowError(): ValueError {
  return new ValueError(ValueErrorCode.INTEGER_OVERFLOW, 'Integer overflow');
}

export function createDivideByZeroError(): ValueError {
  return new ValueError(ValueErrorCode.DIVIDE_BY_ZERO, "Can't divide by zero");
}

export function createNegativeFactorialError(): ValueError {
  return new ValueError(
    ValueErrorCode.NEGATIVE_FACTORIAL,
    "Can't take factorial of negative number"
  );
}

// =============================================================================
// Lookup Error
// =============================================================================

/**
 * Column reference that the row context could not resolve
 */
export class LookupError extends ExpressionError {
  readonly code: LookupErrorCode;
  readonly category = ErrorCategory.RESOURCE;

  constructor(code: LookupErrorCode, message: string, options?: { context?: ErrorContext }) {
    super(message, options);
    this.name = 'LookupError';
    this.code = code;
  }
}

export function createNoRowError(column: string): LookupError {
  return new LookupError(
    LookupErrorCode.NO_ROW,
    `No row context to resolve column ${column}`,
    { context: { column } }
  );
}

export function createColumnNotFoundError(column: string): LookupError {
  return new LookupError(
    LookupErrorCode.COLUMN_NOT_FOUND,
    `Column ${column} not found`,
    { context: { column } }
  );
}
