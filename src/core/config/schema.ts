/**
 * Zod schemas for pattern, language-feature and tech-stack configuration files.
 */
import { z } from 'zod';

/** Severity labels a pattern may declare. */
export const SeveritySchema = z.enum(['critical', 'high', 'medium', 'low', 'info']);

/** A single architectural pattern or antipattern definition. */
export const PatternDefinitionSchema = z.object({
  /** Regex sources whose match on a line is evidence for the pattern */
  indicators: z.array(z.string()),
  /** Regex sources that suppress indicator matches on a line */
  exclude_patterns: z.array(z.string()).optional(),
  severity: SeveritySchema,
  description: z.string(),
});

/** `architectural_patterns.json` / `antipatterns.json` */
export const PatternSetSchema = z.object({
  schema_version: z.number().int(),
  patterns: z.record(z.string(), PatternDefinitionSchema),
});

/** A language feature: syntax that must not count as pattern evidence. */
export const LanguageFeatureDefinitionSchema = z.object({
  patterns: z.array(z.string()),
  /** Language tags the feature belongs to */
  languages: z.array(z.string()),
  description: z.string(),
});

/** `language_features.json` */
export const LanguageFeatureSetSchema = z.object({
  schema_version: z.number().int(),
  features: z.record(z.string(), LanguageFeatureDefinitionSchema),
});

/** A tech stack definition. */
export const TechStackDefinitionSchema = z.object({
  name: z.string(),
  primary_languages: z.array(z.string()),
  exclude_patterns: z.array(z.string()),
  dependency_dirs: z.array(z.string()),
  config_files: z.array(z.string()),
  source_patterns: z.array(z.string()),
  build_artifacts: z.array(z.string()),
  boilerplate_patterns: z.array(z.string()).optional(),
});

/** Tech stack definition file. */
export const TechStackFileSchema = z.object({
  schema_version: z.number().int(),
  stacks: z.record(z.string(), TechStackDefinitionSchema),
});

export type Severity = z.infer<typeof SeveritySchema>;
export type PatternDefinition = z.infer<typeof PatternDefinitionSchema>;
export type PatternSet = z.infer<typeof PatternSetSchema>;
export type LanguageFeatureDefinition = z.infer<typeof LanguageFeatureDefinitionSchema>;
export type LanguageFeatureSet = z.infer<typeof LanguageFeatureSetSchema>;
export type TechStackDefinition = z.infer<typeof TechStackDefinitionSchema>;
