/**
 * patternscope - architectural pattern and antipattern detection.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Pattern detection
export * from './core/patterns/index.js';

// Structural analysis
export * from './structure/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
