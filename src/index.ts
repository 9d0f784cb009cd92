/**
 * genmethod: template-driven method generation.
 * Main library exports barrel file.
 */

// Host contract
export * from './core/host/index.js';

// Member classification
export * from './core/classify/index.js';

// Templates
export * from './core/template/index.js';

// Insertion and conflict policies
export * from './core/policy/index.js';

// Generation
export * from './core/generate/index.js';

// Missing-method check
export * from './core/check/index.js';

// Configuration
export * from './core/config/index.js';

// Class models and the in-memory host
export * from './core/model/index.js';
export * from './core/source/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
