/**
 * Reports classes that have members worth printing but no method with the
 * generation target's name.
 */
import type { ClassHandle } from '../host/types.js';
import { buildClassFacts } from '../classify/classifier.js';
import { collectAvailableMembers } from '../classify/filter.js';
import type { FilterConfig } from '../classify/filter.js';
import { findMethodByName } from '../policy/signature.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('check');

export interface CheckOptions {
  readonly excludeExceptions: boolean;
  readonly excludeDeprecated: boolean;
  readonly excludeEnums: boolean;
  readonly excludeAbstract: boolean;
  /** Regex matched against the whole simple class name. */
  readonly excludeClassPattern?: string;
}

export const DEFAULT_CHECK_OPTIONS: CheckOptions = {
  excludeExceptions: true,
  excludeDeprecated: true,
  excludeEnums: false,
  excludeAbstract: false,
};

export type SkipReason =
  | 'interface'
  | 'exception'
  | 'deprecated'
  | 'enum'
  | 'abstract'
  | 'excluded-name'
  | 'no-fields'
  | 'no-members';

export type ClassCheckResult =
  | { readonly status: 'missing'; readonly className: string; readonly qualifiedName: string; readonly message: string }
  | { readonly status: 'present'; readonly className: string; readonly qualifiedName: string }
  | { readonly status: 'skipped'; readonly className: string; readonly qualifiedName: string; readonly reason: SkipReason };

function compileClassPattern(pattern: string | undefined): RegExp | null {
  if (!pattern) return null;
  try {
    return new RegExp(`^(?:${pattern})$`);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Invalid exclude_class_pattern '${pattern}': ${error instanceof Error ? error.message : String(error)}`,
      { pattern }
    );
  }
}

/**
 * Check one class for a method named `methodName`.
 * @throws ConfigError when a configured pattern is not a valid regex.
 */
export function checkClass(
  cls: ClassHandle,
  methodName: string,
  options: CheckOptions,
  filter: FilterConfig
): ClassCheckResult {
  const names = { className: cls.name, qualifiedName: cls.qualifiedName };
  const skip = (reason: SkipReason): ClassCheckResult => {
    log.debug('Skipped class', { class: cls.qualifiedName, reason });
    return { status: 'skipped', ...names, reason };
  };

  if (cls.isInterface) return skip('interface');

  const facts = buildClassFacts(cls);
  if (options.excludeExceptions && facts.isException) return skip('exception');
  if (options.excludeDeprecated && facts.isDeprecated) return skip('deprecated');
  if (options.excludeEnums && facts.isEnum) return skip('enum');
  if (options.excludeAbstract && facts.isAbstract) return skip('abstract');
  if (compileClassPattern(options.excludeClassPattern)?.test(cls.name)) return skip('excluded-name');
  if (cls.fields.length === 0) return skip('no-fields');

  const available = collectAvailableMembers(cls, filter);
  if (available.members.length === 0) return skip('no-members');

  if (findMethodByName(cls, methodName) !== null) {
    return { status: 'present', ...names };
  }
  return {
    status: 'missing',
    ...names,
    message: `Class '${cls.name}' does not ${methodName === 'compareTo' ? 'declare' : 'override'} ${methodName}() method`,
  };
}
