/**
 * Summary statistics and recommendations for a list of matches.
 */
import type { ConfidenceBucket, PatternMatch, PatternSummary } from './types.js';

export const MAX_RECOMMENDATIONS = 5;

/** More distinct antipatterns than this adds the catch-all recommendation. */
export const GENERIC_RECOMMENDATION_THRESHOLD = 5;

export const HIGH_CONFIDENCE = 0.8;
export const MEDIUM_CONFIDENCE = 0.6;

/**
 * A recommendation that fires once a pattern reaches a match count.
 */
export interface RecommendationRule {
  patternName: string;
  /** Fires when the pattern has more than this many matches */
  minCount: number;
  message: string;
}

/** In priority order. */
export const RECOMMENDATION_RULES: readonly RecommendationRule[] = [
  {
    patternName: 'god_class',
    minCount: 0,
    message: 'Break down large classes into smaller, focused components',
  },
  {
    patternName: 'long_parameter_list',
    minCount: 0,
    message: 'Use parameter objects or builder pattern for methods with many parameters',
  },
  {
    patternName: 'feature_envy',
    minCount: 0,
    message: 'Move methods closer to the data they operate on',
  },
  {
    patternName: 'singleton',
    minCount: 3,
    message: 'Consider dependency injection instead of multiple singletons',
  },
];

export const GENERIC_RECOMMENDATION = 'Consider architectural refactoring to address code smells';

export function confidenceBucket(confidence: number): ConfidenceBucket {
  if (confidence >= HIGH_CONFIDENCE) return 'high';
  if (confidence >= MEDIUM_CONFIDENCE) return 'medium';
  return 'low';
}

function countBy<K extends string>(matches: readonly PatternMatch[], key: (m: PatternMatch) => K): Partial<Record<K, number>> {
  const counts: Partial<Record<K, number>> = {};
  for (const match of matches) {
    const k = key(match);
    counts[k] = (counts[k] ?? 0) + 1;
  }
  return counts;
}

/**
 * Build the recommendation list: specific rules first, then the catch-all,
 * capped at MAX_RECOMMENDATIONS whole entries.
 */
export function generateRecommendations(matches: readonly PatternMatch[]): string[] {
  const recommendations: string[] = [];
  const counts = countBy(matches, (m) => m.patternName);

  for (const rule of RECOMMENDATION_RULES) {
    if ((counts[rule.patternName] ?? 0) > rule.minCount) {
      recommendations.push(rule.message);
    }
  }

  const distinctAnti = new Set(matches.filter((m) => m.patternType === 'anti').map((m) => m.patternName));
  if (distinctAnti.size > GENERIC_RECOMMENDATION_THRESHOLD) {
    recommendations.push(GENERIC_RECOMMENDATION);
  }

  return recommendations.slice(0, MAX_RECOMMENDATIONS);
}

export function getPatternSummary(matches: readonly PatternMatch[]): PatternSummary {
  const byType: Record<string, number> = {};
  for (const [name, count] of Object.entries(countBy(matches, (m) => m.patternName))) {
    byType[name] = count ?? 0;
  }

  const byCategory = countBy(matches, (m) => m.patternType);
  const byConfidence = countBy(matches, (m) => confidenceBucket(m.confidence));

  return {
    totalPatterns: matches.length,
    patternsByType: byType,
    patternsByCategory: {
      architectural: byCategory.architectural ?? 0,
      anti: byCategory.anti ?? 0,
    },
    patternsBySeverity: countBy(matches, (m) => m.severity),
    patternsByConfidence: {
      high: byConfidence.high ?? 0,
      medium: byConfidence.medium ?? 0,
      low: byConfidence.low ?? 0,
    },
    highConfidencePatterns: matches.filter((m) => m.confidence >= HIGH_CONFIDENCE),
    recommendations: generateRecommendations(matches),
  };
}
