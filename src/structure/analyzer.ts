/**
 * Structural analysis: shape antipatterns that regex cannot express reliably.
 *
 * Only languages with a registered StructureAdapter are analyzed; Python is
 * the one shipped. Source that does not parse yields no matches.
 */
import { getExtension } from '../utils/file-system.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { PatternMatch } from '../core/patterns/types.js';
import { PythonStructureAdapter } from './tree-sitter/python-ast.js';
import type { FileStructure, StructureAdapter } from './types.js';

export const GOD_CLASS_METHOD_THRESHOLD = 15;
export const LONG_PARAMETER_THRESHOLD = 5;
export const STRUCTURAL_CONFIDENCE = 0.9;

/** Antipatterns measured on the syntax tree */
export const STRUCTURAL_PATTERN_NAMES: readonly string[] = ['god_class', 'long_parameter_list'];

export interface StructuralAnalyzerOptions {
  /** Adapters to use; defaults to the Python adapter */
  adapters?: StructureAdapter[];
  /** Language used when neither a language nor a known extension is given */
  defaultLanguage?: string;
  /** Classes with more methods than this are god classes */
  godClassMethodThreshold?: number;
  /** Functions with more positional parameters than this are flagged */
  longParameterThreshold?: number;
  logger?: Logger;
}

export class StructuralAnalyzer {
  private readonly adapters = new Map<string, StructureAdapter>();
  private readonly defaultLanguage: string;
  private readonly godClassMethodThreshold: number;
  private readonly longParameterThreshold: number;
  private readonly log: Logger;

  constructor(options: StructuralAnalyzerOptions = {}) {
    for (const adapter of options.adapters ?? [new PythonStructureAdapter()]) {
      this.adapters.set(adapter.language, adapter);
    }
    this.defaultLanguage = options.defaultLanguage ?? 'python';
    this.godClassMethodThreshold = options.godClassMethodThreshold ?? GOD_CLASS_METHOD_THRESHOLD;
    this.longParameterThreshold = options.longParameterThreshold ?? LONG_PARAMETER_THRESHOLD;
    this.log = (options.logger ?? defaultLogger).child('structure');
  }

  supports(language: string): boolean {
    return this.adapters.has(language);
  }

  get supportedLanguages(): string[] {
    return [...this.adapters.keys()];
  }

  /**
   * Pick the adapter by language, then by file extension, then the default.
   */
  private resolveAdapter(filePath: string, language?: string): StructureAdapter | undefined {
    if (language !== undefined) {
      return this.adapters.get(language);
    }
    const ext = getExtension(filePath);
    for (const adapter of this.adapters.values()) {
      if (adapter.extensions.includes(ext)) return adapter;
    }
    return this.adapters.get(this.defaultLanguage);
  }

  /**
   * Detect god classes and long parameter lists. Never throws.
   */
  analyzeStructure(content: string, filePath: string, language?: string): PatternMatch[] {
    return this.measureStructure(content, filePath, language) ?? [];
  }

  /**
   * Like analyzeStructure, but null when no adapter applies or the source
   * does not parse, so callers can tell "nothing found" from "not measured".
   */
  measureStructure(content: string, filePath: string, language?: string): PatternMatch[] | null {
    const adapter = this.resolveAdapter(filePath, language);
    if (!adapter) return null;

    let structure: FileStructure | null;
    try {
      structure = adapter.extract(content);
    } catch (error) {
      this.log.debug(`Parser failed on ${filePath}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
    if (!structure) {
      this.log.debug(`Skipping structural analysis of ${filePath}: syntax errors`);
      return null;
    }

    return this.evaluate(structure);
  }

  private evaluate(structure: FileStructure): PatternMatch[] {
    const matches: PatternMatch[] = [];

    for (const cls of structure.classes) {
      if (cls.methodCount > this.godClassMethodThreshold) {
        matches.push({
          patternType: 'anti',
          patternName: 'god_class',
          severity: 'high',
          description: `God class with ${cls.methodCount} methods`,
          lineNumber: cls.line,
          context: `class ${cls.name}:`,
          confidence: STRUCTURAL_CONFIDENCE,
          isLanguageFeature: false,
        });
      }
    }

    for (const fn of structure.functions) {
      if (fn.parameterCount > this.longParameterThreshold) {
        matches.push({
          patternType: 'anti',
          patternName: 'long_parameter_list',
          severity: 'medium',
          description: `Function with ${fn.parameterCount} parameters`,
          lineNumber: fn.line,
          context: `def ${fn.name}(...)`,
          confidence: STRUCTURAL_CONFIDENCE,
          isLanguageFeature: false,
        });
      }
    }

    return matches.sort((a, b) => a.lineNumber - b.lineNumber);
  }
}
