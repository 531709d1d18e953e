/**
 * sqlexpr - SQL scalar expression language
 *
 * Lexer, precedence-climbing parser, canonical formatter and three-valued
 * evaluator for the expressions found in WHERE clauses and SELECT lists.
 *
 * @example
 * ```typescript
 * import { evaluateExpression, createRowContext, integerValue, displayValue } from 'sqlexpr';
 *
 * const row = createRowContext({ qty: integerValue(3n) });
 * displayValue(evaluateExpression('qty * 2 + 1', row)); // '7'
 * ```
 *
 * @packageDocumentation
 */

export * from './constants.js';
export * from './config.js';
export * from './errors/index.js';
export * from './value/index.js';
export * from './parser/index.js';
export * from './pattern/index.js';
export * from './evaluator/index.js';
export * from './engine/index.js';
export * from './logging/index.js';
