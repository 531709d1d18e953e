/**
 * Arithmetic on scalar values
 *
 * Integer operations are checked against the signed 64-bit range; float
 * operations follow IEEE-754. A mixed integer/float pair widens the integer
 * to a double. NULL on either side yields NULL before any type check.
 *
 * @packageDocumentation
 */

import {
  createDivideByZeroError,
  createNegativeFactorialError,
  createTypeMismatchError,
  type ValueError,
} from '../errors/index.js';
import type { Value } from './types.js';
import {
  NULL,
  checkInteger,
  displayValue,
  floatValue,
  integerValue,
} from './value.js';

// =============================================================================
// OPERAND COERCION
// =============================================================================

type NumericPair =
  | { kind: 'integer'; left: bigint; right: bigint }
  | { kind: 'float'; left: number; right: number };

function toFloat(value: Value): number | undefined {
  if (value.type === 'float') return value.value;
  if (value.type === 'integer') return Number(value.value);
  return undefined;
}

function numericPair(a: Value, b: Value): NumericPair | undefined {
  if (a.type === 'integer' && b.type === 'integer') {
    return { kind: 'integer', left: a.value, right: b.value };
  }
  const left = toFloat(a);
  const right = toFloat(b);
  if (left === undefined || right === undefined) return undefined;
  return { kind: 'float', left, right };
}

function binaryMismatch(verb: string, a: Value, b: Value): ValueError {
  return createTypeMismatchError(`Can't ${verb} ${displayValue(a)} and ${displayValue(b)}`);
}

/**
 * pow() with the C99 special cases that Math.pow departs from:
 * 1^y and x^0 are 1 for every y and x, (-1)^±Infinity is 1
 */
export function ieeePow(base: number, exponent: number): number {
  if (base === 1 || exponent === 0) return 1;
  if (base === -1 && (exponent === Infinity || exponent === -Infinity)) return 1;
  return Math.pow(base, exponent);
}

/**
 * Integer power by squaring, failing as soon as an intermediate leaves the
 * 64-bit range
 */
export function checkedPow(base: bigint, exponent: bigint): bigint {
  if (exponent === 0n) return 1n;
  if (base === 0n || base === 1n) return base;
  if (base === -1n) return exponent % 2n === 0n ? 1n : -1n;

  let result = 1n;
  let factor = base;
  let remaining = exponent;
  while (remaining > 0n) {
    if (remaining & 1n) {
      result = checkInteger(result * factor);
    }
    remaining >>= 1n;
    if (remaining > 0n) {
      factor = checkInteger(factor * factor);
    }
  }
  return result;
}

// =============================================================================
// BINARY OPERATORS
// =============================================================================

export function add(a: Value, b: Value): Value {
  if (a.type === 'null' || b.type === 'null') return NULL;
  const pair = numericPair(a, b);
  if (!pair) throw binaryMismatch('add', a, b);
  return pair.kind === 'integer'
    ? integerValue(pair.left + pair.right)
    : floatValue(pair.left + pair.right);
}

export function subtract(a: Value, b: Value): Value {
  if (a.type === 'null' || b.type === 'null') return NULL;
  const pair = numericPair(a, b);
  if (!pair) throw binaryMismatch('subtract', a, b);
  return pair.kind === 'integer'
    ? integerValue(pair.left - pair.right)
    : floatValue(pair.left - pair.right);
}

export function multiply(a: Value, b: Value): Value {
  if (a.type === 'null' || b.type === 'null') return NULL;
  const pair = numericPair(a, b);
  if (!pair) throw binaryMismatch('multiply', a, b);
  return pair.kind === 'integer'
    ? integerValue(pair.left * pair.right)
    : floatValue(pair.left * pair.right);
}

/**
 * Integer division truncates toward zero
 */
export function divide(a: Value, b: Value): Value {
  if (a.type === 'null' || b.type === 'null') return NULL;
  const pair = numericPair(a, b);
  if (!pair) throw binaryMismatch('divide', a, b);
  if (pair.kind === 'float') return floatValue(pair.left / pair.right);
  if (pair.right === 0n) throw createDivideByZeroError();
  return integerValue(pair.left / pair.right);
}

/**
 * Remainder takes the sign of the dividend
 */
export function remainder(a: Value, b: Value): Value {
  if (a.type === 'null' || b.type === 'null') return NULL;
  const pair = numericPair(a, b);
  if (!pair) throw binaryMismatch('take modulo of', a, b);
  if (pair.kind === 'float') return floatValue(pair.left % pair.right);
  if (pair.right === 0n) throw createDivideByZeroError();
  return integerValue(pair.left % pair.right);
}

/**
 * Integer ^ non-negative integer stays integral; a negative exponent or any
 * float operand goes through pow()
 */
export function exponentiate(a: Value, b: Value): Value {
  if (a.type === 'null' || b.type === 'null') return NULL;
  const pair = numericPair(a, b);
  if (!pair) throw binaryMismatch('exponentiate', a, b);
  if (pair.kind === 'integer') {
    if (pair.right >= 0n) return integerValue(checkedPow(pair.left, pair.right));
    return floatValue(ieeePow(Number(pair.left), Number(pair.right)));
  }
  return floatValue(ieeePow(pair.left, pair.right));
}

// =============================================================================
// UNARY OPERATORS
// =============================================================================

/**
 * Unary plus
 */
export function positive(a: Value): Value {
  switch (a.type) {
    case 'null':
    case 'integer':
    case 'float':
      return a;
    default:
      throw createTypeMismatchError(`Can't take the positive of ${displayValue(a)}`);
  }
}

/**
 * Unary minus
 */
export function negate(a: Value): Value {
  switch (a.type) {
    case 'null':
      return NULL;
    case 'integer':
      return integerValue(-a.value);
    case 'float':
      return floatValue(-a.value);
    default:
      throw createTypeMismatchError(`Can't negate ${displayValue(a)}`);
  }
}

export function factorial(a: Value): Value {
  if (a.type === 'null') return NULL;
  if (a.type !== 'integer') {
    throw createTypeMismatchError(`Can't take factorial of ${displayValue(a)}`);
  }
  if (a.value < 0n) throw createNegativeFactorialError();

  let result = 1n;
  for (let i = 2n; i <= a.value; i++) {
    result = checkInteger(result * i);
  }
  return integerValue(result);
}
