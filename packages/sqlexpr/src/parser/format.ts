/**
 * Expression formatter
 *
 * Renders an AST back to expression text. Every compound operand is
 * parenthesized, so the output parses back to the same tree regardless of
 * precedence.
 *
 * @packageDocumentation
 */

import { formatLiteral } from '../value/value.js';
import { isKeyword } from './tokenizer.js';
import type { ColumnReference, Expression } from './types.js';

function formatIdentifier(name: string): string {
  if (/^[a-zA-Z_][a-zA-Z0-9_]*$/.test(name) && !isKeyword(name)) {
    return name;
  }
  return `"${name.replace(/"/g, '""')}"`;
}

export function formatColumn(column: ColumnReference): string {
  const name = formatIdentifier(column.name);
  return column.table === undefined ? name : `${formatIdentifier(column.table)}.${name}`;
}

function isAtomic(expr: Expression): boolean {
  if (expr.type === 'column') return true;
  return expr.type === 'literal' && !formatLiteral(expr.value).startsWith('-');
}

function operand(expr: Expression): string {
  const text = formatExpression(expr);
  return isAtomic(expr) ? text : `(${text})`;
}

/**
 * Format an expression AST as text
 *
 * @example
 * ```typescript
 * formatExpression(parseExpression('1 + 2 * 3')); // '1 + (2 * 3)'
 * ```
 */
export function formatExpression(expr: Expression): string {
  switch (expr.type) {
    case 'literal':
      return formatLiteral(expr.value);
    case 'column':
      return formatColumn(expr.column);
    case 'unary':
      return expr.op === 'NOT' ? `NOT ${operand(expr.operand)}` : `${expr.op}${operand(expr.operand)}`;
    case 'binary':
      return `${operand(expr.left)} ${expr.op} ${operand(expr.right)}`;
    case 'postfix':
      return expr.op === '!' ? `${operand(expr.operand)}!` : `${operand(expr.operand)} ${expr.op}`;
  }
}
