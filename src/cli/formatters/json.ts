/**
 * JSON output formatter for machine consumption.
 */
import type { PatternMatch } from '../../core/patterns/types.js';
import type { IFormatter, PatternReport } from './types.js';

export class JsonFormatter implements IFormatter {
  private transformMatch(m: PatternMatch): Record<string, unknown> {
    return {
      pattern_type: m.patternType,
      pattern_name: m.patternName,
      severity: m.severity,
      description: m.description,
      line_number: m.lineNumber,
      context: m.context,
      confidence: m.confidence,
    };
  }

  formatReport(report: PatternReport): string {
    const { summary } = report;
    return JSON.stringify(
      {
        file: report.file,
        language: report.language,
        matches: report.matches.map((m) => this.transformMatch(m)),
        summary: {
          total_patterns: summary.totalPatterns,
          patterns_by_type: summary.patternsByType,
          patterns_by_category: summary.patternsByCategory,
          patterns_by_severity: summary.patternsBySeverity,
          patterns_by_confidence: summary.patternsByConfidence,
          high_confidence_patterns: summary.highConfidencePatterns.length,
          recommendations: summary.recommendations,
        },
      },
      null,
      2
    );
  }
}
