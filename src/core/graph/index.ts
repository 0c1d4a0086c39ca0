/**
 * Graph module barrel.
 */
export * from './types.js';
export * from './ids.js';
export * from './type-ref.js';
export * from './nodes.js';
export * from './edges.js';
export * from './indexes.js';
export * from './query.js';
export * from './graph.js';
export * from './style.js';
export * from './derived-edges.js';
export * from './builder.js';
