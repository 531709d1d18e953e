/**
 * Expression Evaluator
 *
 * Post-order tree walk: children are evaluated before their parent combines
 * them, so `FALSE AND 1/0` still fails on the division. The tree is never
 * mutated and may be evaluated concurrently against different rows.
 *
 * @packageDocumentation
 */

import { createNoRowError, createTypeMismatchError } from '../errors/index.js';
import { LikeMatcher } from '../pattern/like.js';
import {
  columnName,
  type BinaryOperator,
  type Expression,
  type PostfixOperator,
  type PrefixOperator,
} from '../parser/types.js';
import {
  add,
  divide,
  exponentiate,
  factorial,
  multiply,
  negate,
  positive,
  remainder,
  subtract,
} from '../value/arithmetic.js';
import {
  compareEqual,
  compareGreater,
  compareGreaterOrEqual,
  compareLess,
  compareLessOrEqual,
  compareNotEqual,
} from '../value/compare.js';
import { and, isFalse, isNull, isTrue, not, or } from '../value/logic.js';
import type { Value } from '../value/types.js';
import { NULL, booleanValue, displayValue } from '../value/value.js';
import type { RowContext } from './row-context.js';

// =============================================================================
// OPERATORS
// =============================================================================

/**
 * SQL LIKE over values: NULL on either side gives NULL, strings match,
 * anything else is a type error
 */
export function like(a: Value, b: Value): Value {
  if (a.type === 'null' || b.type === 'null') return NULL;
  if (a.type !== 'string' || b.type !== 'string') {
    throw createTypeMismatchError(`Can't LIKE ${displayValue(a)} and ${displayValue(b)}`);
  }
  return booleanValue(new LikeMatcher(b.value).matches(a.value));
}

export function applyPrefix(op: PrefixOperator, operand: Value): Value {
  switch (op) {
    case 'NOT':
      return not(operand);
    case '+':
      return positive(operand);
    case '-':
      return negate(operand);
  }
}

export function applyBinary(op: BinaryOperator, left: Value, right: Value): Value {
  switch (op) {
    case 'OR':
      return or(left, right);
    case 'AND':
      return and(left, right);
    case '=':
      return compareEqual(left, right);
    case '!=':
      return compareNotEqual(left, right);
    case 'LIKE':
      return like(left, right);
    case '>':
      return compareGreater(left, right);
    case '>=':
      return compareGreaterOrEqual(left, right);
    case '<':
      return compareLess(left, right);
    case '<=':
      return compareLessOrEqual(left, right);
    case '+':
      return add(left, right);
    case '-':
      return subtract(left, right);
    case '*':
      return multiply(left, right);
    case '/':
      return divide(left, right);
    case '%':
      return remainder(left, right);
    case '^':
      return exponentiate(left, right);
  }
}

export function applyPostfix(op: PostfixOperator, operand: Value): Value {
  switch (op) {
    case '!':
      return factorial(operand);
    case 'IS NULL':
      return isNull(operand);
    case 'IS NOT NULL':
      return not(isNull(operand));
    case 'IS TRUE':
      return isTrue(operand);
    case 'IS NOT TRUE':
      return not(isTrue(operand));
    case 'IS FALSE':
      return isFalse(operand);
    case 'IS NOT FALSE':
      return not(isFalse(operand));
  }
}

// =============================================================================
// EVALUATION
// =============================================================================

/**
 * Reduce an expression to a value
 *
 * @param node - Parsed expression
 * @param context - Row context for column references; may be omitted for
 *   constant expressions
 * @throws ValueError on type mismatch, overflow, division by zero or
 *   negative factorial; LookupError or the context's own error when a
 *   column cannot be resolved
 */
export function evaluate(node: Expression, context?: RowContext): Value {
  switch (node.type) {
    case 'literal':
      return node.value;

    case 'column':
      if (!context) {
        throw createNoRowError(columnName(node.column));
      }
      return context.resolve(node.column);

    case 'unary':
      return applyPrefix(node.op, evaluate(node.operand, context));

    case 'binary': {
      const left = evaluate(node.left, context);
      const right = evaluate(node.right, context);
      return applyBinary(node.op, left, right);
    }

    case 'postfix':
      return applyPostfix(node.op, evaluate(node.operand, context));
  }
}

/**
 * Whether an expression references no columns
 */
export function isConstant(node: Expression): boolean {
  switch (node.type) {
    case 'literal':
      return true;
    case 'column':
      return false;
    case 'unary':
    case 'postfix':
      return isConstant(node.operand);
    case 'binary':
      return isConstant(node.left) && isConstant(node.right);
  }
}
