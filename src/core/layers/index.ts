export * from './types.js';
export * from './classifier.js';
export * from './validator.js';
