/**
 * Configuration types shared by the loader and the detector.
 */
import type { LanguageFeatureDefinition, PatternDefinition, TechStackDefinition } from './schema.js';

export type {
  Severity,
  PatternDefinition,
  LanguageFeatureDefinition,
  TechStackDefinition,
} from './schema.js';

/**
 * The three validated definition sets a detector runs on.
 * Read-only for the lifetime of the detector that owns it.
 */
export interface PatternConfiguration {
  readonly architecturalPatterns: Readonly<Record<string, PatternDefinition>>;
  readonly antipatterns: Readonly<Record<string, PatternDefinition>>;
  readonly languageFeatures: Readonly<Record<string, LanguageFeatureDefinition>>;
}

/** Tech stacks keyed by stack id. */
export type TechStackMap = Readonly<Record<string, TechStackDefinition>>;
