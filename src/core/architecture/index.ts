/**
 * Architecture query public API.
 */
export * from './types.js';
export * from './dependencies.js';
export * from './cycles.js';
export * from './bounded-contexts.js';
export * from './lakos.js';
export * from './coupling.js';
export * from './stability.js';
export * from './aggregates.js';
export * from './architecture-query.js';
