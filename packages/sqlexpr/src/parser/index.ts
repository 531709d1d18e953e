/**
 * Expression lexer, parser and formatter
 *
 * @packageDocumentation
 */

export * from './types.js';
export * from './tokenizer.js';
export * from './parser.js';
export * from './format.js';
