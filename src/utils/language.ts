/**
 * Language tags inferred from file extensions.
 */
import { getExtension } from './file-system.js';

const EXTENSION_LANGUAGES: Record<string, string> = {
  '.py': 'python',
  '.pyi': 'python',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.mts': 'typescript',
  '.cts': 'typescript',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.java': 'java',
  '.kt': 'kotlin',
  '.cs': 'csharp',
  '.go': 'go',
  '.rs': 'rust',
  '.swift': 'swift',
  '.php': 'php',
  '.rb': 'ruby',
};

/**
 * Language tag for a path, or undefined for unknown extensions.
 */
export function detectLanguage(filePath: string): string | undefined {
  return EXTENSION_LANGUAGES[getExtension(filePath)];
}
