/**
 * Human-readable output formatter.
 */
import chalk from 'chalk';
import type { Severity } from '../../core/config/types.js';
import type { PatternMatch } from '../../core/patterns/types.js';
import type { FormatOptions, IFormatter, PatternReport } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'blue' | 'cyan' | 'dim' | 'bold';

const SEVERITY_COLORS: Record<Severity, Color> = {
  critical: 'red',
  high: 'red',
  medium: 'yellow',
  low: 'blue',
  info: 'dim',
};

export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  formatReport(report: PatternReport): string {
    const { summary } = report;
    const lines: string[] = [];

    lines.push(this.colorize(`Pattern Analysis Results: ${report.file}`, 'bold'));
    lines.push('='.repeat(50));
    lines.push(`Total patterns detected: ${summary.totalPatterns}`);
    lines.push(`High confidence patterns: ${summary.highConfidencePatterns.length}`);

    if (report.matches.length > 0) {
      lines.push('');
      lines.push('Detected Patterns:');
      for (const match of report.matches) {
        lines.push(...this.formatMatch(match));
      }
    }

    if (summary.recommendations.length > 0) {
      lines.push('');
      lines.push('Recommendations:');
      for (const rec of summary.recommendations) {
        lines.push(`  ${this.colorize('•', 'cyan')} ${rec}`);
      }
    }

    return lines.join('\n');
  }

  private formatMatch(match: PatternMatch): string[] {
    const name = this.colorize(match.patternName, SEVERITY_COLORS[match.severity]);
    const meta = this.options.verbose ? ` [${match.patternType}, ${match.severity}]` : '';
    return [
      `  ${name} (line ${match.lineNumber}, confidence: ${match.confidence.toFixed(2)})${meta}`,
      `    ${match.description}`,
      `    ${this.colorize(`Context: ${match.context}`, 'dim')}`,
    ];
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'blue':
        return chalk.blue(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}
