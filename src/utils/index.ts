/**
 * Utility exports.
 */
export * from './errors.js';
export * from './file-system.js';
export * from './json.js';
export { logger, Logger, type LogLevel } from './logger.js';
export { detectLanguage } from './language.js';
