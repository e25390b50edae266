/**
 * Pattern detection exports.
 */
export * from './types.js';
export * from './confidence.js';
export * from './language-features.js';
export * from './matcher.js';
export * from './summary.js';
export * from './detector.js';
