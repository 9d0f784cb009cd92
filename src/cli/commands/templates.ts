/**
 * List the bundled templates, or print one.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { listTemplates, loadTemplate } from '../../core/template/resources.js';
import { DEFAULT_TEMPLATES, GENERATION_TARGETS } from '../../core/template/targets.js';
import { GenMethodError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

interface TemplatesOptions {
  json?: boolean;
}

/**
 * Create the templates command.
 */
export function createTemplatesCommand(): Command {
  return new Command('templates')
    .description('List bundled templates, or print the named template')
    .argument('[name]', 'Template to print')
    .option('--json', 'Output as JSON')
    .action(async (name: string | undefined, options: TemplatesOptions) => {
      try {
        if (name !== undefined) {
          const template = await loadTemplate(name);
          console.log(options.json ? JSON.stringify(template, null, 2) : template.source);
          return;
        }

        const templates = await listTemplates();
        if (options.json) {
          console.log(JSON.stringify(templates, null, 2));
          return;
        }
        for (const template of templates) {
          const defaultFor = GENERATION_TARGETS.filter((target) => DEFAULT_TEMPLATES[target] === template.name);
          const suffix = defaultFor.length > 0 ? chalk.dim(` (default for ${defaultFor.join(', ')})`) : '';
          console.log(`${chalk.bold(template.name)}${suffix}`);
        }
      } catch (error) {
        if (error instanceof GenMethodError) {
          log.error(`${error.code}: ${error.message}`);
        } else {
          log.error(error instanceof Error ? error.message : 'Unknown error');
        }
        process.exit(1);
      }
    });
}
