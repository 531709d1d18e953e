/**
 * sqlexpr Error Code Enumerations
 *
 * Standardized error codes following the pattern: CATEGORY_SPECIFIC
 *
 * @packageDocumentation
 */

// =============================================================================
// Lexer Error Codes
// =============================================================================

export enum LexErrorCode {
  /** Character outside the expression alphabet */
  UNEXPECTED_CHARACTER = 'LEX_UNEXPECTED_CHARACTER',
  /** String literal without closing quote */
  UNTERMINATED_STRING = 'LEX_UNTERMINATED_STRING',
  /** Quoted identifier without closing quote */
  UNTERMINATED_IDENTIFIER = 'LEX_UNTERMINATED_IDENTIFIER',
}

// =============================================================================
// Parser Error Codes
// =============================================================================

export enum ParseErrorCode {
  /** A token other than the expected one */
  UNEXPECTED_TOKEN = 'PARSE_UNEXPECTED_TOKEN',
  /** Input ended while more was expected */
  UNEXPECTED_EOF = 'PARSE_UNEXPECTED_EOF',
  /** Integer literal magnitude outside the 64-bit range */
  NUMBER_OUT_OF_RANGE = 'PARSE_NUMBER_OUT_OF_RANGE',
  /** Parenthesis nesting or tree depth over the configured limit */
  TOO_DEEP = 'PARSE_TOO_DEEP',
}

// =============================================================================
// Value Error Codes
// =============================================================================

export enum ValueErrorCode {
  /** Operator applied to operands of the wrong type */
  TYPE_MISMATCH = 'VALUE_TYPE_MISMATCH',
  /** Integer result outside the 64-bit range */
  INTEGER_OVERFLOW = 'VALUE_INTEGER_OVERFLOW',
  /** Integer division or modulo by zero */
  DIVIDE_BY_ZERO = 'VALUE_DIVIDE_BY_ZERO',
  /** Factorial of a negative integer */
  NEGATIVE_FACTORIAL = 'VALUE_NEGATIVE_FACTORIAL',
}

// =============================================================================
// Lookup Error Codes
// =============================================================================

export enum LookupErrorCode {
  /** Column reference evaluated without a row context */
  NO_ROW = 'LOOKUP_NO_ROW',
  /** Row context has no such column */
  COLUMN_NOT_FOUND = 'LOOKUP_COLUMN_NOT_FOUND',
}

/**
 * Union of all sqlexpr error codes
 */
export type ExpressionErrorCode =
  | LexErrorCode
  | ParseErrorCode
  | ValueErrorCode
  | LookupErrorCode;
