/**
 * Lexical matching of configured indicators, line by line.
 */
import { compileRegex } from '../config/loader.js';
import type { PatternDefinition } from '../config/types.js';
import {
  CONFIDENCE_TUNING,
  calculateConfidence,
  passesConfidenceGate,
  type ConfidenceTuning,
} from './confidence.js';
import type { PatternMatch, PatternType } from './types.js';

/**
 * A pattern definition with its regexes compiled once, up front.
 */
export interface CompiledPattern {
  readonly name: string;
  readonly patternType: PatternType;
  readonly definition: PatternDefinition;
  readonly indicators: readonly RegExp[];
  readonly excludes: readonly RegExp[];
}

export function compilePatterns(
  patterns: Readonly<Record<string, PatternDefinition>>,
  patternType: PatternType
): CompiledPattern[] {
  const label = patternType === 'architectural' ? 'architectural pattern' : 'antipattern';
  return Object.entries(patterns).map(([name, definition]) => ({
    name,
    patternType,
    definition,
    indicators: definition.indicators.map((src) =>
      compileRegex(src, `${label} '${name}' indicators`)
    ),
    // Exclusions are case-insensitive
    excludes: (definition.exclude_patterns ?? []).map((src) =>
      compileRegex(src, `${label} '${name}' exclude_patterns`, 'i')
    ),
  }));
}

export interface MatchOptions {
  /** Lines (1-based) carrying a language feature; never matched */
  suppressedLines?: ReadonlySet<number>;
  gatedPatterns?: ReadonlySet<string>;
  tuning?: ConfidenceTuning;
}

/**
 * Find the matches of one pattern in a file.
 *
 * Indicators are tried in order; the first one to hit a line claims it, so
 * a line yields at most one candidate per pattern. Lines matching an exclude
 * pattern or listed as suppressed are skipped, and confidence heuristics do
 * not read them.
 */
export function findPatternMatches(
  content: string,
  lines: readonly string[],
  pattern: CompiledPattern,
  options: MatchOptions = {}
): PatternMatch[] {
  const suppressed = options.suppressedLines ?? new Set<number>();
  const gated = options.gatedPatterns ?? new Set<string>();
  const tuning = options.tuning ?? CONFIDENCE_TUNING;

  const excluded = new Set<number>(suppressed);
  lines.forEach((line, idx) => {
    if (pattern.excludes.some((re) => re.test(line))) {
      excluded.add(idx + 1);
    }
  });

  const matches: PatternMatch[] = [];
  const claimed = new Set<number>();

  for (const indicator of pattern.indicators) {
    lines.forEach((line, idx) => {
      const lineNumber = idx + 1;
      if (excluded.has(lineNumber) || claimed.has(lineNumber)) return;

      const found = indicator.exec(line);
      if (!found) return;

      const confidence = calculateConfidence(
        { text: found[0], index: found.index, lineNumber },
        content,
        pattern.name,
        { lines, excludedLines: excluded, tuning }
      );
      // Rejected hits do not claim the line
      if (!passesConfidenceGate(pattern.name, confidence, gated, tuning.acceptanceThreshold)) return;

      claimed.add(lineNumber);
      matches.push({
        patternType: pattern.patternType,
        patternName: pattern.name,
        severity: pattern.definition.severity,
        description: pattern.definition.description,
        lineNumber,
        context: line.trim(),
        confidence,
        isLanguageFeature: false,
      });
    });
  }

  return matches.sort((a, b) => a.lineNumber - b.lineNumber);
}
