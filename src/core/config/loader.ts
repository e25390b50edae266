/**
 * Loads pattern definition sets and tech stack files.
 * Strict: any missing file, malformed JSON, incomplete entry or
 * uncompilable regex throws a ConfigError. There are no fallbacks.
 */
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { loadJsonWithSchemaSync } from '../../utils/json.js';
import {
  LanguageFeatureSetSchema,
  PatternSetSchema,
  TechStackFileSchema,
  type LanguageFeatureDefinition,
  type PatternDefinition,
} from './schema.js';
import type { PatternConfiguration, TechStackMap } from './types.js';

export const ARCHITECTURAL_PATTERNS_FILE = 'architectural_patterns.json';
export const ANTIPATTERNS_FILE = 'antipatterns.json';
export const LANGUAGE_FEATURES_FILE = 'language_features.json';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Directory holding the bundled pattern definitions.
 */
export function getDefaultPatternsDir(): string {
  return path.resolve(__dirname, '../../../config/patterns');
}

/**
 * Compile a configured regex source, reporting where it came from on failure.
 */
export function compileRegex(source: string, context: string, flags: string = ''): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID_REGEX,
      `Invalid regex in ${context}: /${source}/ (${error instanceof Error ? error.message : 'Unknown error'})`,
      { context, source }
    );
  }
}

/**
 * Check every regex of a configuration compiles.
 */
export function validateRegexes(config: PatternConfiguration): void {
  const checkPatterns = (label: string, patterns: Readonly<Record<string, PatternDefinition>>): void => {
    for (const [name, def] of Object.entries(patterns)) {
      def.indicators.forEach((src) => compileRegex(src, `${label} '${name}' indicators`));
      (def.exclude_patterns ?? []).forEach((src) =>
        compileRegex(src, `${label} '${name}' exclude_patterns`)
      );
    }
  };
  checkPatterns('architectural pattern', config.architecturalPatterns);
  checkPatterns('antipattern', config.antipatterns);

  for (const [name, feature] of Object.entries(config.languageFeatures)) {
    feature.patterns.forEach((src) => compileRegex(src, `language feature '${name}' patterns`));
  }
}

function freezeMap<T extends object>(map: Record<string, T>): Readonly<Record<string, T>> {
  for (const value of Object.values(map)) {
    Object.freeze(value);
  }
  return Object.freeze(map);
}

/**
 * Load architectural patterns, antipatterns and language features from a directory.
 *
 * Expected files:
 *   - architectural_patterns.json
 *   - antipatterns.json
 *   - language_features.json
 */
export function loadPatternConfiguration(configDir: string): PatternConfiguration {
  const arch = loadJsonWithSchemaSync(path.join(configDir, ARCHITECTURAL_PATTERNS_FILE), PatternSetSchema);
  const anti = loadJsonWithSchemaSync(path.join(configDir, ANTIPATTERNS_FILE), PatternSetSchema);
  const lang = loadJsonWithSchemaSync(path.join(configDir, LANGUAGE_FEATURES_FILE), LanguageFeatureSetSchema);

  const config: PatternConfiguration = Object.freeze({
    architecturalPatterns: freezeMap<PatternDefinition>(arch.patterns),
    antipatterns: freezeMap<PatternDefinition>(anti.patterns),
    languageFeatures: freezeMap<LanguageFeatureDefinition>(lang.features),
  });

  validateRegexes(config);
  return config;
}

/**
 * Load tech stack definitions from a single JSON file.
 *
 * Expected shape:
 *   { "schema_version": 1, "stacks": { "python": { "name": ..., "primary_languages": [...], ... } } }
 */
export function loadTechStacks(configPath: string): TechStackMap {
  const data = loadJsonWithSchemaSync(configPath, TechStackFileSchema);
  return freezeMap(data.stacks);
}
