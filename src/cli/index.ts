/**
 * CLI program.
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createDetectCommand } from './commands/detect.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION = readVersion();

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('patternscope')
    .description('Detect architectural patterns and antipatterns in source files')
    .version(VERSION);
  [createDetectCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
