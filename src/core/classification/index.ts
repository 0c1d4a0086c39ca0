/**
 * Classification engine public API.
 */
export * from './types.js';
export * from './evidence.js';
export * from './contribution.js';
export * from './criteria.js';
export * from './priorities.js';
export * from './profile.js';
export * from './compatibility.js';
export * from './decision.js';
export * from './engine.js';
export * from './result.js';
export * from './heuristics.js';
export * from './domain/kinds.js';
export * from './domain/criteria.js';
export * from './domain/classifier.js';
export * from './port/kinds.js';
export * from './port/criteria.js';
export * from './port/classifier.js';
export * from './type-classifier.js';
