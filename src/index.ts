/**
 * structdiff - structural matching and edit scripts for syntax trees.
 * Main library exports barrel file.
 */

// Syntax tree model
export * from './core/term/index.js';

// Gram fingerprints
export * from './core/gram/index.js';

// Similarity oracle
export * from './core/similarity/index.js';

// Matching
export * from './core/matcher/index.js';

// Edit scripts
export * from './core/diff/index.js';

// Configuration
export * from './core/config/index.js';

// Utilities
export * from './utils/index.js';
