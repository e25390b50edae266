/**
 * Builders for pattern matches and definition directories used across tests.
 */
import { mkdtempSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import type { PatternMatch } from '../../src/core/patterns/types.js';
import { getDefaultPatternsDir } from '../../src/core/config/loader.js';

export function makeMatch(overrides: Partial<PatternMatch> = {}): PatternMatch {
  return {
    patternType: 'anti',
    patternName: 'god_class',
    severity: 'high',
    description: 'God class: a class that knows or does too much',
    lineNumber: 1,
    context: 'class UserManager:',
    confidence: 0.9,
    isLanguageFeature: false,
    ...overrides,
  };
}

export const DEFINITION_FILES = [
  'architectural_patterns.json',
  'antipatterns.json',
  'language_features.json',
] as const;

export type DefinitionFile = (typeof DEFINITION_FILES)[number];

/**
 * Copy the bundled definitions into a temp directory, replacing or
 * omitting files. A string override is written verbatim; null omits the file.
 */
export function writeDefinitionsDir(
  overrides: Partial<Record<DefinitionFile, string | object | null>> = {}
): string {
  const dir = mkdtempSync(join(tmpdir(), 'patternscope-config-'));
  for (const file of DEFINITION_FILES) {
    const override = overrides[file];
    if (override === null) continue;
    const content =
      override === undefined
        ? readFileSync(join(getDefaultPatternsDir(), file), 'utf-8')
        : typeof override === 'string'
          ? override
          : JSON.stringify(override);
    writeFileSync(join(dir, file), content);
  }
  return dir;
}

/**
 * Class source with the given number of trivial methods.
 */
export function pythonClassWithMethods(name: string, methodCount: number): string {
  const lines = [`class ${name}:`];
  for (let i = 0; i < methodCount; i++) {
    lines.push(`    def method_${i}(self):`, `        return ${i}`);
  }
  return lines.join('\n') + '\n';
}
