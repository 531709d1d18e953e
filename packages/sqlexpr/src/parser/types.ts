/**
 * Parser Types
 *
 * Tokens, source locations and the expression AST.
 *
 * @packageDocumentation
 */

import type { Value } from '../value/types.js';

// =============================================================================
// SOURCE LOCATION
// =============================================================================

/**
 * Location information for error reporting and AST node tracking
 */
export interface SourceLocation {
  /** 1-based line number */
  line: number;
  /** 1-based column number */
  column: number;
  /** 0-based character offset */
  offset: number;
}

// =============================================================================
// TOKEN TYPES
// =============================================================================

/**
 * Token types recognized by the lexer
 */
export type TokenType =
  | 'keyword'
  | 'identifier'
  | 'number'
  | 'string'
  | 'operator'
  | 'punctuation'
  | 'eof';

/**
 * A single token from the lexer
 */
export interface Token {
  /** Token type classification */
  type: TokenType;
  /**
   * Keywords upper-cased, strings and quoted identifiers unescaped, numbers
   * as written
   */
  value: string;
  /** Source location of the token */
  location: SourceLocation;
  /** Length of the token in the source */
  length: number;
}

/**
 * Expression keywords, matched case-insensitively
 */
export const KEYWORDS = [
  'TRUE',
  'FALSE',
  'NULL',
  'INFINITY',
  'NAN',
  'AND',
  'OR',
  'NOT',
  'IS',
  'LIKE',
] as const;

export type Keyword = (typeof KEYWORDS)[number];

// =============================================================================
// OPERATORS
// =============================================================================

export type PrefixOperator = 'NOT' | '+' | '-';

export type BinaryOperator =
  // Logical
  | 'OR' | 'AND'
  // Equality and pattern
  | '=' | '!=' | 'LIKE'
  // Relational
  | '>' | '>=' | '<' | '<='
  // Arithmetic
  | '+' | '-' | '*' | '/' | '%' | '^';

export type PostfixOperator =
  | '!'
  | 'IS NULL'
  | 'IS NOT NULL'
  | 'IS TRUE'
  | 'IS NOT TRUE'
  | 'IS FALSE'
  | 'IS NOT FALSE';

/**
 * Binary operator precedence tiers (higher = binds tighter)
 */
export const OPERATOR_PRECEDENCE: Readonly<Record<BinaryOperator, number>> = {
  'OR': 1,
  'AND': 2,
  '=': 3, '!=': 3, 'LIKE': 3,
  '>': 4, '>=': 4, '<': 4, '<=': 4,
  '+': 5, '-': 5,
  '*': 6, '/': 6, '%': 6,
  '^': 7,
};

export const RIGHT_ASSOCIATIVE: ReadonlySet<BinaryOperator> = new Set<BinaryOperator>(['^']);

// =============================================================================
// EXPRESSION AST
// =============================================================================

/**
 * Column handle handed to the row context
 */
export interface ColumnReference {
  readonly table?: string;
  readonly name: string;
}

interface ExpressionBase {
  readonly location?: SourceLocation;
}

export interface LiteralExpr extends ExpressionBase {
  readonly type: 'literal';
  readonly value: Value;
}

export interface ColumnExpr extends ExpressionBase {
  readonly type: 'column';
  readonly column: ColumnReference;
}

export interface UnaryExpr extends ExpressionBase {
  readonly type: 'unary';
  readonly op: PrefixOperator;
  readonly operand: Expression;
}

export interface BinaryExpr extends ExpressionBase {
  readonly type: 'binary';
  readonly op: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
}

export interface PostfixExpr extends ExpressionBase {
  readonly type: 'postfix';
  readonly op: PostfixOperator;
  readonly operand: Expression;
}

/**
 * Expression AST node
 */
export type Expression = LiteralExpr | ColumnExpr | UnaryExpr | BinaryExpr | PostfixExpr;

/**
 * Qualified display name of a column reference
 */
export function columnName(column: ColumnReference): string {
  return column.table === undefined ? column.name : `${column.table}.${column.name}`;
}
