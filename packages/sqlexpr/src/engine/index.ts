export * from './cache.js';
export * from './engine.js';
