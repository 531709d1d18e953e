/**
 * Three-valued (Kleene) logic and the IS predicates
 *
 * @packageDocumentation
 */

import { createTypeMismatchError } from '../errors/index.js';
import type { BooleanValue, Value } from './types.js';
import { NULL, booleanValue, displayValue } from './value.js';

/** Boolean payload, null for NULL, undefined for anything else */
function truth(value: Value): boolean | null | undefined {
  if (value.type === 'boolean') return value.value;
  if (value.type === 'null') return null;
  return undefined;
}

export function and(a: Value, b: Value): Value {
  const left = truth(a);
  const right = truth(b);
  if (left === undefined || right === undefined) {
    throw createTypeMismatchError(`Can't and ${displayValue(a)} and ${displayValue(b)}`);
  }
  if (left === false || right === false) return booleanValue(false);
  if (left === null || right === null) return NULL;
  return booleanValue(true);
}

export function or(a: Value, b: Value): Value {
  const left = truth(a);
  const right = truth(b);
  if (left === undefined || right === undefined) {
    throw createTypeMismatchError(`Can't or ${displayValue(a)} and ${displayValue(b)}`);
  }
  if (left === true || right === true) return booleanValue(true);
  if (left === null || right === null) return NULL;
  return booleanValue(false);
}

export function not(a: Value): Value {
  const operand = truth(a);
  if (operand === undefined) {
    throw createTypeMismatchError(`Can't negate ${displayValue(a)}`);
  }
  return operand === null ? NULL : booleanValue(!operand);
}

// =============================================================================
// IS PREDICATES (never NULL)
// =============================================================================

export function isNull(a: Value): BooleanValue {
  return booleanValue(a.type === 'null');
}

export function isTrue(a: Value): BooleanValue {
  return booleanValue(a.type === 'boolean' && a.value);
}

export function isFalse(a: Value): BooleanValue {
  return booleanValue(a.type === 'boolean' && !a.value);
}
