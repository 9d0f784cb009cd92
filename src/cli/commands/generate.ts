/**
 * Generate a method into a class described by a class model file.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import chalk from 'chalk';
import { loadConfig, toFilterConfig } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import { findTargetClass, loadClassModel } from '../../core/model/loader.js';
import { InMemoryHost } from '../../core/source/host.js';
import type { Position } from '../../core/source/layout.js';
import { generate } from '../../core/generate/orchestrator.js';
import type { GenerationOutcome } from '../../core/generate/orchestrator.js';
import { loadTemplate } from '../../core/template/resources.js';
import { DEFAULT_TEMPLATES, isGenerationTarget } from '../../core/template/targets.js';
import { isInsertionPolicyName } from '../../core/policy/insertion.js';
import { isConflictPolicyName } from '../../core/policy/conflict.js';
import { ConfigError, ErrorCodes, GenMethodError } from '../../utils/errors.js';
import { writeFile } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';

export interface GenerateCommandOptions {
  config?: string;
  class?: string;
  target?: string;
  template?: string;
  insert?: string;
  conflict?: string;
  cursor?: string;
  includeGetters?: boolean;
  sort?: boolean;
  output?: string;
  json?: boolean;
}

export interface GenerateReport {
  readonly model: string;
  readonly class: string;
  readonly template: string;
  readonly outcome: GenerationOutcome['kind'];
  /** 1-based position of the generated method, when one was inserted. */
  readonly position: Position | null;
  readonly replaced: boolean;
  readonly method: string | null;
  readonly source: string;
}

/** `12:5` -> `{ line: 12, column: 5 }`. */
export function parseCursor(value: string): Position {
  const match = /^(\d+):(\d+)$/.exec(value.trim());
  if (!match) {
    throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Invalid cursor '${value}', expected <line>:<column>`, {
      cursor: value,
    });
  }
  return { line: Number(match[1]), column: Number(match[2]) };
}

/**
 * Command-line options override the config file.
 */
export function applyOverrides(config: Config, options: GenerateCommandOptions): Config {
  const invalid = (option: string, value: string): ConfigError =>
    new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Invalid --${option} '${value}'`, { option, value });

  const target = options.target ?? config.target;
  const insertion = options.insert ?? config.insertion;
  const conflict = options.conflict ?? config.conflict;
  if (!isGenerationTarget(target)) throw invalid('target', target);
  if (!isInsertionPolicyName(insertion)) throw invalid('insert', insertion);
  if (!isConflictPolicyName(conflict)) throw invalid('conflict', conflict);

  return {
    ...config,
    template: options.template ?? config.template,
    target,
    insertion,
    conflict,
    filter: {
      ...config.filter,
      include_getters: options.includeGetters ?? config.filter.include_getters,
      sort_members: options.sort ?? config.filter.sort_members,
    },
  };
}

export async function runGenerate(
  modelPath: string,
  options: GenerateCommandOptions,
  projectRoot: string = process.cwd()
): Promise<GenerateReport> {
  const config = applyOverrides(await loadConfig(projectRoot, options.config), options);
  const { file, resolver } = await loadClassModel(path.resolve(projectRoot, modelPath));
  const cls = findTargetClass(file, options.class);
  const host = new InMemoryHost(file, resolver, {
    cursor: options.cursor !== undefined ? parseCursor(options.cursor) : null,
  });
  const template = await loadTemplate(config.template ?? DEFAULT_TEMPLATES[config.target], projectRoot);

  log.debug('Generating', {
    class: cls.qualifiedName,
    target: config.target,
    template: template.path,
    insertion: config.insertion,
    conflict: config.conflict,
  });

  const result = generate(cls, template.source, host, {
    target: config.target,
    insertion: config.insertion,
    conflict: config.conflict,
    filter: toFilterConfig(config.filter),
    jumpToMethod: config.jump_to_method,
  });
  if (!result.success) {
    throw result.error;
  }

  const { outcome } = result;
  return {
    model: modelPath,
    class: cls.qualifiedName,
    template: template.name,
    outcome: outcome.kind,
    position: outcome.kind === 'generated' ? host.positionOf(outcome.method) : null,
    replaced: outcome.kind === 'generated' && outcome.replaced,
    method: outcome.kind === 'generated' ? outcome.method.text : null,
    source: host.text,
  };
}

function printReport(report: GenerateReport, options: GenerateCommandOptions): void {
  switch (report.outcome) {
    case 'empty':
      log.warn(`No members of ${report.class} to generate from; nothing inserted`);
      return;
    case 'cancelled':
      log.warn(`${report.class} already has the method and the conflict policy is cancel; nothing changed`);
      return;
    case 'generated': {
      const where = report.position ? ` at line ${report.position.line}` : '';
      log.success(`${report.replaced ? 'Replaced' : 'Generated'} method in ${chalk.bold(report.class)}${where}`);
      if (!options.output) {
        console.log(report.source);
      }
    }
  }
}

/**
 * Create the generate command.
 */
export function createGenerateCommand(): Command {
  return new Command('generate')
    .description('Generate a method into a class from a class model file')
    .argument('<model>', 'Class model file (YAML or JSON)')
    .option('-c, --config <path>', 'Path to config file (default: .genmethod.yaml)')
    .option('--class <name>', 'Class to generate into (default: first top-level class)')
    .option('-t, --target <method>', 'Method to generate: toString or compareTo')
    .option('--template <ref>', 'Bundled template name or template file path')
    .option('--insert <policy>', 'Insertion policy: at-caret, after-equals-hashcode, last')
    .option('--conflict <policy>', 'Conflict policy: replace, duplicate, cancel')
    .option('--cursor <line:column>', 'Cursor position for the at-caret policy')
    .option('--include-getters', 'Include getter methods as members')
    .option('--sort', 'Sort members by name')
    .option('-o, --output <file>', 'Write the resulting source to a file')
    .option('--json', 'Output as JSON')
    .action(async (model: string, options: GenerateCommandOptions) => {
      try {
        const report = await runGenerate(model, options);
        if (options.output) {
          await writeFile(path.resolve(process.cwd(), options.output), report.source);
        }
        if (options.json) {
          console.log(JSON.stringify(report, null, 2));
          return;
        }
        printReport(report, options);
      } catch (error) {
        if (error instanceof GenMethodError) {
          log.error(`${error.code}: ${error.message}`, error.details);
        } else {
          log.error(error instanceof Error ? error.message : 'Unknown error');
        }
        process.exit(1);
      }
    });
}
