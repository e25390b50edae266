/**
 * Formatter type definitions.
 */
import type { PatternMatch, PatternSummary } from '../../core/patterns/types.js';

/**
 * Output format options.
 */
export type OutputFormat = 'human' | 'json';

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Output format */
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
  /** Show severity and pattern type next to each match */
  verbose: boolean;
}

/**
 * Everything one analyzed file produced.
 */
export interface PatternReport {
  file: string;
  language: string;
  matches: PatternMatch[];
  summary: PatternSummary;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  formatReport(report: PatternReport): string;
}
