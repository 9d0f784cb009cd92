/**
 * Configuration loading.
 */
import * as path from 'node:path';
import { ConfigSchema, type CheckSettings, type Config, type ConfigInput, type FilterSettings } from './schema.js';
import { loadYamlWithSchema, fileExists } from '../../utils/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import type { FilterConfig } from '../classify/filter.js';
import type { CheckOptions } from '../check/missing-method.js';

const DEFAULT_CONFIG_PATH = '.genmethod.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : path.resolve(projectRoot, DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    // an explicitly named file must exist
    if (configPath) {
      throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Config file not found: ${fullPath}`, {
        path: fullPath,
      });
    }
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: ConfigInput): Config {
  return ConfigSchema.parse(partial);
}

export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, DEFAULT_CONFIG_PATH);
}

export function toFilterConfig(settings: FilterSettings): FilterConfig {
  return {
    excludeModifiers: settings.exclude_modifiers,
    excludeNamePattern: settings.exclude_name_pattern,
    excludeTypePattern: settings.exclude_type_pattern,
    excludeConstants: settings.exclude_constants,
    excludeEnums: settings.exclude_enums,
    excludeLoggers: settings.exclude_loggers,
    includeGetters: settings.include_getters,
    sortMembers: settings.sort_members,
  };
}

export function toCheckOptions(settings: CheckSettings): CheckOptions {
  return {
    excludeExceptions: settings.exclude_exceptions,
    excludeDeprecated: settings.exclude_deprecated,
    excludeEnums: settings.exclude_enums,
    excludeAbstract: settings.exclude_abstract,
    excludeClassPattern: settings.exclude_class_pattern,
  };
}
