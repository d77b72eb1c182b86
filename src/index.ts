/**
 * attrlint - diagnostics for package set attributes.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Report model
export * from './core/report/index.js';

// Attribute resolution
export * from './core/resolver/index.js';

// External checks
export * from './core/checks/index.js';

// Merging
export * from './core/merge/index.js';

// Pipeline
export * from './core/pipeline.js';

// Rendering
export * from './cli/formatters/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
