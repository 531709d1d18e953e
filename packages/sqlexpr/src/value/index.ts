/**
 * Scalar value module
 *
 * @packageDocumentation
 */

export * from './types.js';
export * from './value.js';
export * from './arithmetic.js';
export * from './compare.js';
export * from './logic.js';
