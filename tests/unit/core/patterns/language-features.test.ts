/**
 * Tests for language feature filtering.
 */
import { describe, it, expect } from 'vitest';
import {
  compileLanguageFeatures,
  identifyLanguageFeatures,
} from '../../../../src/core/patterns/language-features.js';
import { getDefaultPatternsDir, loadPatternConfiguration } from '../../../../src/core/config/loader.js';

const features = compileLanguageFeatures(
  loadPatternConfiguration(getDefaultPatternsDir()).languageFeatures
);

describe('identifyLanguageFeatures', () => {
  it('should record decorator lines in python', () => {
    const content = ['@dataclass', 'class Point:', '    x: int'].join('\n');

    const scan = identifyLanguageFeatures(content, 'python', features);

    expect([...scan.features]).toEqual(['decorators']);
    expect([...scan.lines]).toEqual([1]);
  });

  it('should record every applicable feature in java', () => {
    const content = ['public final class Registry {', '    List<String> names;', '}'].join('\n');

    const scan = identifyLanguageFeatures(content, 'java', features);

    expect([...scan.features].sort()).toEqual(['generic_types', 'visibility_modifiers']);
    expect([...scan.lines].sort()).toEqual([1, 2]);
  });

  it('should ignore features of other languages', () => {
    const scan = identifyLanguageFeatures('public class X {}', 'python', features);

    expect(scan.features.size).toBe(0);
    expect(scan.lines.size).toBe(0);
  });

  it('should return an empty scan for a language without features', () => {
    const scan = identifyLanguageFeatures('@Override\nMap<K, V> m;', 'go', features);

    expect(scan.lines.size).toBe(0);
  });

  it('should not match across lines', () => {
    const custom = compileLanguageFeatures({
      arrows: { patterns: ['a\\s+b'], languages: ['python'], description: 'Arrows' },
    });

    const scan = identifyLanguageFeatures('a\nb', 'python', custom);

    expect(scan.lines.size).toBe(0);
  });
});

describe('compileLanguageFeatures', () => {
  it('should keep the language set and compiled patterns', () => {
    const [decorators] = compileLanguageFeatures({
      decorators: { patterns: ['^\\s*@\\w+'], languages: ['python', 'java'], description: 'Decorators' },
    });

    expect(decorators.name).toBe('decorators');
    expect(decorators.languages.has('java')).toBe(true);
    expect(decorators.patterns[0].test('  @property')).toBe(true);
  });
});
