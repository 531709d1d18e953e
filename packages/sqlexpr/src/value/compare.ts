/**
 * Comparison of scalar values
 *
 * Booleans compare with booleans (FALSE < TRUE), integers and floats with
 * each other by numeric value, strings by Unicode code point. NaN is
 * unordered: only `!=` holds for it.
 *
 * @packageDocumentation
 */

import { createTypeMismatchError } from '../errors/index.js';
import type { Value } from './types.js';
import { NULL, booleanValue, displayValue } from './value.js';

/**
 * -1, 0 or 1, or null when the operands are unordered (NaN)
 */
export type Ordering = -1 | 0 | 1 | null;

function sign(diff: number): -1 | 0 | 1 {
  return diff < 0 ? -1 : diff > 0 ? 1 : 0;
}

/**
 * Code-point order; differs from UTF-16 order once surrogate pairs meet
 * characters in U+E000..U+FFFF
 */
export function compareStrings(a: string, b: string): -1 | 0 | 1 {
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const x = a.codePointAt(i) ?? 0;
    const y = b.codePointAt(j) ?? 0;
    if (x !== y) return x < y ? -1 : 1;
    i += x > 0xffff ? 2 : 1;
    j += y > 0xffff ? 2 : 1;
  }
  return sign((a.length - i) - (b.length - j));
}

function compareNumbers(a: number, b: number): Ordering {
  if (Number.isNaN(a) || Number.isNaN(b)) return null;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Order two non-null values
 * @throws ValueError "Can't compare a and b" across incompatible families
 */
export function compareValues(a: Value, b: Value): Ordering {
  if (a.type === 'boolean' && b.type === 'boolean') {
    return sign(Number(a.value) - Number(b.value));
  }
  if (a.type === 'integer' && b.type === 'integer') {
    return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  }
  if (a.type === 'integer' && b.type === 'float') {
    return compareNumbers(Number(a.value), b.value);
  }
  if (a.type === 'float' && b.type === 'integer') {
    return compareNumbers(a.value, Number(b.value));
  }
  if (a.type === 'float' && b.type === 'float') {
    return compareNumbers(a.value, b.value);
  }
  if (a.type === 'string' && b.type === 'string') {
    return compareStrings(a.value, b.value);
  }
  throw createTypeMismatchError(`Can't compare ${displayValue(a)} and ${displayValue(b)}`);
}

function comparison(test: (ordering: Ordering) => boolean) {
  return (a: Value, b: Value): Value => {
    if (a.type === 'null' || b.type === 'null') return NULL;
    return booleanValue(test(compareValues(a, b)));
  };
}

export const compareEqual = comparison(o => o === 0);
export const compareNotEqual = comparison(o => o !== 0);
export const compareGreater = comparison(o => o === 1);
export const compareGreaterOrEqual = comparison(o => o === 1 || o === 0);
export const compareLess = comparison(o => o === -1);
export const compareLessOrEqual = comparison(o => o === -1 || o === 0);
