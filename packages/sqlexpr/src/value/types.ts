/**
 * Scalar Value Types
 *
 * The closed set of values an expression can produce.
 *
 * @packageDocumentation
 */

// =============================================================================
// VALUE VARIANTS
// =============================================================================

export interface NullValue {
  readonly type: 'null';
}

export interface BooleanValue {
  readonly type: 'boolean';
  readonly value: boolean;
}

/**
 * Signed 64-bit integer, held as a bigint that never leaves the
 * [-2^63, 2^63 - 1] range
 */
export interface IntegerValue {
  readonly type: 'integer';
  readonly value: bigint;
}

/**
 * IEEE-754 double. NaN and the infinities are ordinary values.
 */
export interface FloatValue {
  readonly type: 'float';
  readonly value: number;
}

export interface StringValue {
  readonly type: 'string';
  readonly value: string;
}

/**
 * A scalar SQL value
 */
export type Value = NullValue | BooleanValue | IntegerValue | FloatValue | StringValue;

/**
 * Discriminant of a Value
 */
export type ValueType = Value['type'];

/**
 * Plain JavaScript representation of a Value
 */
export type JSValue = null | boolean | bigint | number | string;
