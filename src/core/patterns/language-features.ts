/**
 * Language feature filtering.
 *
 * Some syntax looks like pattern evidence but is just the language at work:
 * a decorator in Python, a visibility modifier in Java, generic brackets in
 * TypeScript. Lines carrying a feature of the file's own language are
 * recorded so the matcher ignores indicator hits on them. Features of other
 * languages are skipped entirely.
 */
import { compileRegex } from '../config/loader.js';
import type { LanguageFeatureDefinition } from '../config/types.js';
import type { LanguageFeatureScan } from './types.js';

export interface CompiledLanguageFeature {
  readonly name: string;
  readonly languages: ReadonlySet<string>;
  readonly patterns: readonly RegExp[];
}

export function compileLanguageFeatures(
  features: Readonly<Record<string, LanguageFeatureDefinition>>
): CompiledLanguageFeature[] {
  return Object.entries(features).map(([name, def]) => ({
    name,
    languages: new Set(def.languages),
    patterns: def.patterns.map((src) => compileRegex(src, `language feature '${name}' patterns`)),
  }));
}

/**
 * Find the language features present in the content for the given language.
 * Works line by line so a pattern never matches across lines.
 */
export function identifyLanguageFeatures(
  content: string,
  language: string,
  features: readonly CompiledLanguageFeature[]
): LanguageFeatureScan {
  const scan: LanguageFeatureScan = { features: new Set(), lines: new Set() };
  const applicable = features.filter((f) => f.languages.has(language));
  if (applicable.length === 0) return scan;

  const lines = content.split('\n');
  lines.forEach((line, idx) => {
    for (const feature of applicable) {
      if (feature.patterns.some((re) => re.test(line))) {
        scan.features.add(feature.name);
        scan.lines.add(idx + 1);
      }
    }
  });

  return scan;
}
