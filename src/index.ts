/**
 * hexprobe: architecture analysis over a typed application graph.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Source model
export * from './core/model/index.js';

// Graph store and derived edges
export * from './core/graph/index.js';

// Classification
export * from './core/classification/index.js';

// Layers
export * from './core/layers/index.js';

// Architecture queries
export * from './core/architecture/index.js';

// Pipeline
export * from './core/pipeline.js';

// Utilities
export * from './utils/index.js';
