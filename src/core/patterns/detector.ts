/**
 * PatternDetector: the entry point tying configuration, language feature
 * filtering, lexical matching, confidence scoring, structural analysis and
 * summaries together.
 *
 * Configuration is loaded and compiled once in the constructor; afterwards
 * the instance holds no mutable state and can be shared.
 */
import { getDefaultPatternsDir, loadPatternConfiguration, validateRegexes } from '../config/loader.js';
import type { PatternConfiguration } from '../config/types.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { STRUCTURAL_PATTERN_NAMES, StructuralAnalyzer } from '../../structure/analyzer.js';
import { CONFIDENCE_TUNING, DEFAULT_GATED_PATTERNS, type ConfidenceTuning } from './confidence.js';
import { compileLanguageFeatures, identifyLanguageFeatures, type CompiledLanguageFeature } from './language-features.js';
import { compilePatterns, findPatternMatches, type CompiledPattern } from './matcher.js';
import { getPatternSummary } from './summary.js';
import type { LanguageFeatureScan, PatternMatch, PatternSummary } from './types.js';

export interface PatternDetectorOptions {
  /** Directory holding the three definition files; defaults to the bundled set */
  configDir?: string;
  /** Already-loaded definitions; takes precedence over configDir */
  configuration?: PatternConfiguration;
  /** Patterns whose matches must reach the acceptance threshold */
  gatedPatterns?: readonly string[];
  tuning?: ConfidenceTuning;
  structuralAnalyzer?: StructuralAnalyzer;
  logger?: Logger;
}

/**
 * Drop repeated (patternName, lineNumber) pairs, keeping the most
 * confident one, and order by line.
 */
export function dedupeMatches(matches: readonly PatternMatch[]): PatternMatch[] {
  const best = new Map<string, PatternMatch>();
  for (const match of matches) {
    const key = `${match.patternName}:${match.lineNumber}`;
    const current = best.get(key);
    if (!current || match.confidence > current.confidence) {
      best.set(key, match);
    }
  }
  return [...best.values()].sort(
    (a, b) => a.lineNumber - b.lineNumber || a.patternName.localeCompare(b.patternName)
  );
}

export class PatternDetector {
  readonly configuration: PatternConfiguration;
  private readonly patterns: readonly CompiledPattern[];
  private readonly features: readonly CompiledLanguageFeature[];
  private readonly gatedPatterns: ReadonlySet<string>;
  private readonly tuning: ConfidenceTuning;
  private readonly structure: StructuralAnalyzer;
  private readonly log: Logger;

  constructor(options: PatternDetectorOptions = {}) {
    this.log = (options.logger ?? defaultLogger).child('patterns');

    if (options.configuration) {
      validateRegexes(options.configuration);
      this.configuration = options.configuration;
    } else {
      const configDir = options.configDir ?? getDefaultPatternsDir();
      this.configuration = loadPatternConfiguration(configDir);
      this.log.debug(`Loaded pattern definitions from ${configDir}`);
    }

    this.patterns = [
      ...compilePatterns(this.configuration.architecturalPatterns, 'architectural'),
      ...compilePatterns(this.configuration.antipatterns, 'anti'),
    ];
    this.features = compileLanguageFeatures(this.configuration.languageFeatures);
    this.gatedPatterns = new Set(options.gatedPatterns ?? DEFAULT_GATED_PATTERNS);
    this.tuning = options.tuning ?? CONFIDENCE_TUNING;
    this.structure = options.structuralAnalyzer ?? new StructuralAnalyzer({ logger: options.logger });
  }

  /**
   * Scan for the language features of the given language.
   */
  scanLanguageFeatures(content: string, language: string): LanguageFeatureScan {
    return identifyLanguageFeatures(content, language, this.features);
  }

  /**
   * Line numbers carrying a language feature of the given language.
   */
  identifyLanguageFeatures(content: string, language: string): Set<number> {
    return this.scanLanguageFeatures(content, language).lines;
  }

  /**
   * Run every configured pattern and antipattern over the content.
   */
  detectPatterns(content: string, filePath: string, language: string): PatternMatch[] {
    const lines = content.split('\n');
    const scan = this.scanLanguageFeatures(content, language);

    const matches: PatternMatch[] = [];
    for (const pattern of this.patterns) {
      matches.push(
        ...findPatternMatches(content, lines, pattern, {
          suppressedLines: scan.lines,
          gatedPatterns: this.gatedPatterns,
          tuning: this.tuning,
        })
      );
    }

    this.log.debug(`${filePath}: ${matches.length} lexical matches`, {
      language,
      suppressedLines: scan.lines.size,
    });
    return dedupeMatches(matches);
  }

  supportsStructure(language: string): boolean {
    return this.structure.supports(language);
  }

  /**
   * Syntax-tree checks (god class, long parameter list).
   */
  analyzeStructure(content: string, filePath: string, language?: string): PatternMatch[] {
    return this.structure.analyzeStructure(content, filePath, language);
  }

  /**
   * Lexical and, where the language is supported, structural matches,
   * deduplicated and ordered by line.
   *
   * When the file parses, god classes and long parameter lists come from the
   * syntax tree only; the lexical indicators for them count commas and names,
   * not parameters and methods.
   */
  analyzeFile(content: string, filePath: string, language: string): PatternMatch[] {
    const lexical = this.detectPatterns(content, filePath, language);
    if (!this.supportsStructure(language)) return lexical;

    const structural = this.structure.measureStructure(content, filePath, language);
    if (structural === null) return lexical;

    const measured = new Set(STRUCTURAL_PATTERN_NAMES);
    return dedupeMatches([
      ...lexical.filter((match) => !measured.has(match.patternName)),
      ...structural,
    ]);
  }

  getPatternSummary(matches: readonly PatternMatch[]): PatternSummary {
    return getPatternSummary(matches);
  }
}
