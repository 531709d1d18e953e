/**
 * Value construction, display and conversion
 *
 * @packageDocumentation
 */

import { INTEGER_BOUNDS } from '../constants.js';
import { createIntegerOverflowError } from '../errors/index.js';
import type {
  BooleanValue,
  FloatValue,
  IntegerValue,
  JSValue,
  NullValue,
  StringValue,
  Value,
} from './types.js';

// =============================================================================
// CONSTRUCTORS
// =============================================================================

export const NULL: NullValue = Object.freeze({ type: 'null' });

const TRUE: BooleanValue = Object.freeze({ type: 'boolean', value: true });
const FALSE: BooleanValue = Object.freeze({ type: 'boolean', value: false });

export function booleanValue(value: boolean): BooleanValue {
  return value ? TRUE : FALSE;
}

/**
 * Check that a bigint fits in 64 signed bits
 * @throws ValueError "Integer overflow" otherwise
 */
export function checkInteger(value: bigint): bigint {
  if (value > INTEGER_BOUNDS.MAX || value < INTEGER_BOUNDS.MIN) {
    throw createIntegerOverflowError();
  }
  return value;
}

export function integerValue(value: bigint): IntegerValue {
  return { type: 'integer', value: checkInteger(value) };
}

export function floatValue(value: number): FloatValue {
  return { type: 'float', value };
}

export function stringValue(value: string): StringValue {
  return { type: 'string', value };
}

// =============================================================================
// DISPLAY
// =============================================================================

/**
 * Shortest round-trip form of a double, always recognisable as a float
 * literal when read back
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'NAN';
  if (value === Infinity) return 'INFINITY';
  if (value === -Infinity) return '-INFINITY';
  if (Object.is(value, -0)) return '-0.0';

  const text = String(value);
  return /[.e]/.test(text) ? text : `${text}.0`;
}

/**
 * Canonical display form, as embedded in error messages.
 * Strings are shown unquoted.
 */
export function displayValue(value: Value): string {
  switch (value.type) {
    case 'null':
      return 'NULL';
    case 'boolean':
      return value.value ? 'TRUE' : 'FALSE';
    case 'integer':
      return value.value.toString();
    case 'float':
      return formatFloat(value.value);
    case 'string':
      return value.value;
  }
}

/**
 * Expression literal that parses back to the same value
 */
export function formatLiteral(value: Value): string {
  if (value.type === 'string') {
    return `'${value.value.replace(/'/g, "''")}'`;
  }
  return displayValue(value);
}

// =============================================================================
// EQUALITY
// =============================================================================

/**
 * Structural equality. Unlike SQL `=`, NaN equals NaN and 3 differs from 3.0.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.type) {
    case 'null':
      return b.type === 'null';
    case 'boolean':
      return b.type === 'boolean' && a.value === b.value;
    case 'integer':
      return b.type === 'integer' && a.value === b.value;
    case 'float':
      return b.type === 'float' && Object.is(a.value, b.value);
    case 'string':
      return b.type === 'string' && a.value === b.value;
  }
}

// =============================================================================
// JS CONVERSION
// =============================================================================

/**
 * Convert a plain JavaScript value. Safe integers become integers, every
 * other number becomes a float.
 */
export function fromJS(value: JSValue | undefined): Value {
  if (value === null || value === undefined) return NULL;

  if (typeof value === 'boolean') return booleanValue(value);
  if (typeof value === 'bigint') return integerValue(value);
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && !Object.is(value, -0)
      ? integerValue(BigInt(value))
      : floatValue(value);
  }
  return stringValue(value);
}

export function toJS(value: Value): JSValue {
  return value.type === 'null' ? null : value.value;
}
