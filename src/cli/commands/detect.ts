/**
 * The detect command: analyze one source file and print its patterns.
 */
import { Command, InvalidArgumentError } from 'commander';
import { PatternDetector } from '../../core/patterns/detector.js';
import { ErrorCodes, SystemError } from '../../utils/errors.js';
import { fileExists, readFile } from '../../utils/file-system.js';
import { detectLanguage } from '../../utils/language.js';
import { logger as log } from '../../utils/logger.js';
import { createFormatter } from '../formatters/index.js';
import type { PatternReport } from '../formatters/types.js';

export const DEFAULT_LANGUAGE = 'python';

export interface DetectOptions {
  language?: string;
  config?: string;
  json?: boolean;
  minConfidence?: number;
  color?: boolean;
  verbose?: boolean;
}

export function parseConfidence(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError('Expected a number between 0 and 1.');
  }
  return parsed;
}

/**
 * Create the detect command.
 */
export function createDetectCommand(): Command {
  return new Command('detect')
    .description('Detect architectural patterns and antipatterns in a source file')
    .argument('<file>', 'Source file to analyze')
    .option('-l, --language <lang>', 'Language of the file (default: inferred from the extension)')
    .option('-c, --config <dir>', 'Directory with pattern definition files')
    .option('--json', 'Output as JSON')
    .option('--min-confidence <n>', 'Only report matches at or above this confidence', parseConfidence)
    .option('--no-color', 'Disable colored output')
    .option('-v, --verbose', 'Show debug logging and match details')
    .action(async (file: string, options: DetectOptions) => {
      try {
        const report = await runDetect(file, options);
        console.log(
          createFormatter({
            format: options.json ? 'json' : 'human',
            colors: options.color !== false,
            verbose: options.verbose ?? false,
          }).formatReport(report)
        );
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

/**
 * Read the file, run lexical and structural detection, and build the report.
 */
export async function runDetect(file: string, options: DetectOptions = {}): Promise<PatternReport> {
  if (options.verbose) {
    log.setLevel('debug');
  }

  if (!(await fileExists(file))) {
    throw new SystemError(ErrorCodes.FILE_NOT_FOUND, `File not found: ${file}`, { file });
  }
  let content: string;
  try {
    content = await readFile(file);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`,
      { file }
    );
  }
  const language = options.language ?? detectLanguage(file) ?? DEFAULT_LANGUAGE;

  const detector = new PatternDetector({ configDir: options.config });
  const minConfidence = options.minConfidence ?? 0;
  const matches = detector
    .analyzeFile(content, file, language)
    .filter((m) => m.confidence >= minConfidence);

  return {
    file,
    language,
    matches,
    summary: detector.getPatternSummary(matches),
  };
}
