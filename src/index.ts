/**
 * @arch shiftmap.barrel
 *
 * shiftmap - dependency graph and impact analysis for code reorganizations.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Graph model
export * from './core/graph/index.js';

// Graph builder
export * from './core/builder/index.js';

// Fact snapshots
export * from './core/facts/index.js';

// Impact analysis
export * from './core/impact/index.js';

// Utilities
export * from './utils/index.js';
