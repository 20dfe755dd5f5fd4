/**
 * dyncpa - constraint generation for type inference over functions with
 * dynamically typed values
 *
 * Walks each function once and emits type variables and subtype
 * constraints for an external solver.
 */

// Re-export IR
export * from './ir/index.js';

// Re-export constraint problem model
export * from './cpa/index.js';

// Re-export diagnostics
export * from './diagnostics/index.js';

// Re-export constraint generation
export * from './inference/index.js';

// Re-export parser and front end
export * from './parser/index.js';
export * from './frontend/index.js';

// Re-export output
export * from './output/index.js';
