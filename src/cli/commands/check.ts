/**
 * Report classes that lack the generated method.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import chalk from 'chalk';
import { loadConfig, toCheckOptions, toFilterConfig } from '../../core/config/loader.js';
import { loadClassModel } from '../../core/model/loader.js';
import { checkClass } from '../../core/check/missing-method.js';
import type { ClassCheckResult } from '../../core/check/missing-method.js';
import { isGenerationTarget } from '../../core/template/targets.js';
import { ConfigError, ErrorCodes, GenMethodError } from '../../utils/errors.js';
import { globFiles } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';

export interface CheckCommandOptions {
  config?: string;
  target?: string;
  json?: boolean;
}

export interface FileCheckResult {
  readonly file: string;
  readonly classes: readonly ClassCheckResult[];
}

export interface CheckReport {
  readonly target: string;
  readonly files: readonly FileCheckResult[];
  readonly missing: number;
}

export async function runCheck(
  patterns: readonly string[],
  options: CheckCommandOptions,
  projectRoot: string = process.cwd()
): Promise<CheckReport> {
  const config = await loadConfig(projectRoot, options.config);
  const target = options.target ?? config.target;
  if (!isGenerationTarget(target)) {
    throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Invalid --target '${target}'`, { target });
  }
  const checkOptions = toCheckOptions(config.check);
  const filter = toFilterConfig(config.filter);

  const files = await globFiles([...patterns], { cwd: projectRoot });
  if (files.length === 0) {
    log.warn(`No model files matched: ${patterns.join(', ')}`);
  }

  const results: FileCheckResult[] = [];
  for (const file of files) {
    const { file: source } = await loadClassModel(file);
    results.push({
      file: path.relative(projectRoot, file),
      classes: source.allClasses().map((cls) => checkClass(cls, target, checkOptions, filter)),
    });
  }

  return {
    target,
    files: results,
    missing: results.reduce((n, r) => n + r.classes.filter((c) => c.status === 'missing').length, 0),
  };
}

function printReport(report: CheckReport): void {
  for (const file of report.files) {
    for (const result of file.classes) {
      if (result.status === 'missing') {
        console.log(`${chalk.cyan(file.file)}: ${chalk.yellow(result.message)}`);
      } else if (result.status === 'skipped') {
        log.debug(`${file.file}: skipped ${result.qualifiedName} (${result.reason})`);
      }
    }
  }
  const classes = report.files.reduce((n, f) => n + f.classes.length, 0);
  if (report.missing === 0) {
    log.success(`${classes} classes checked, none missing ${report.target}()`);
  } else {
    log.fail(`${report.missing} of ${classes} classes missing ${report.target}()`);
  }
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Report classes that do not declare the generated method')
    .argument('<models...>', 'Class model files or glob patterns')
    .option('-c, --config <path>', 'Path to config file (default: .genmethod.yaml)')
    .option('-t, --target <method>', 'Method to look for: toString or compareTo')
    .option('--json', 'Output as JSON')
    .action(async (patterns: string[], options: CheckCommandOptions) => {
      let missing = 0;
      try {
        const report = await runCheck(patterns, options);
        missing = report.missing;
        if (options.json) {
          console.log(JSON.stringify(report, null, 2));
        } else {
          printReport(report);
        }
      } catch (error) {
        if (error instanceof GenMethodError) {
          log.error(`${error.code}: ${error.message}`, error.details);
        } else {
          log.error(error instanceof Error ? error.message : 'Unknown error');
        }
        process.exit(1);
      }
      if (missing > 0) {
        process.exit(1);
      }
    });
}
