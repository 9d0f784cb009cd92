/**
 * CLI entry: builds the commander program.
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createGenerateCommand } from './commands/generate.js';
import { createCheckCommand } from './commands/check.js';
import { createTemplatesCommand } from './commands/templates.js';
import { isLogLevel, logger } from '../utils/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('genmethod')
    .description('Generate toString() and compareTo() methods from templates')
    .version(readVersion())
    .option('--log-level <level>', 'Log level: debug, info, warn, error, silent', 'info')
    .option('--verbose', 'Shorthand for --log-level debug')
    .hook('preAction', (command) => {
      const opts = command.opts<{ logLevel: string; verbose?: boolean }>();
      const level = opts.verbose ? 'debug' : opts.logLevel;
      if (!isLogLevel(level)) {
        return command.error(`Invalid --log-level '${level}'`);
      }
      logger.setLevel(level);
    });
  [createGenerateCommand, createCheckCommand, createTemplatesCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
