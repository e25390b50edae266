/**
 * Pattern detection types.
 */
import type { Severity } from '../config/types.js';

/**
 * Whether a match is a design pattern or a code smell.
 * Fixed per pattern by the configuration file it was loaded from.
 */
export type PatternType = 'architectural' | 'anti';

/**
 * A detected occurrence of a pattern or antipattern.
 */
export interface PatternMatch {
  readonly patternType: PatternType;
  readonly patternName: string;
  readonly severity: Severity;
  readonly description: string;
  /** 1-based line number */
  readonly lineNumber: number;
  /** The matched line, trimmed */
  readonly context: string;
  /** Confidence in [0, 1] */
  readonly confidence: number;
  /** Only set for internal feature bookkeeping; surfaced matches are always false */
  readonly isLanguageFeature: boolean;
}

/**
 * Result of scanning a file for language features.
 */
export interface LanguageFeatureScan {
  /** Features present in the content that apply to the declared language */
  features: Set<string>;
  /** Lines (1-based) carrying such a feature; indicator hits there are ignored */
  lines: Set<number>;
}

/**
 * A regex hit handed to the confidence scorer.
 */
export interface IndicatorHit {
  /** The matched text */
  text: string;
  /** Offset of the match within its line */
  index: number;
  /** 1-based line number */
  lineNumber: number;
}

export type ConfidenceBucket = 'high' | 'medium' | 'low';

/**
 * Aggregated statistics for a list of matches.
 */
export interface PatternSummary {
  totalPatterns: number;
  /** Count per pattern name */
  patternsByType: Record<string, number>;
  /** Count per pattern type (architectural / anti) */
  patternsByCategory: Record<PatternType, number>;
  patternsBySeverity: Partial<Record<Severity, number>>;
  patternsByConfidence: Record<ConfidenceBucket, number>;
  highConfidencePatterns: PatternMatch[];
  recommendations: string[];
}
