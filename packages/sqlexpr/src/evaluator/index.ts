export * from './row-context.js';
export * from './evaluator.js';
