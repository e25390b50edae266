/**
 * Configuration exports.
 */
export * from './types.js';
export * from './loader.js';
export {
  SeveritySchema,
  PatternDefinitionSchema,
  PatternSetSchema,
  LanguageFeatureDefinitionSchema,
  LanguageFeatureSetSchema,
  TechStackDefinitionSchema,
  TechStackFileSchema,
} from './schema.js';
