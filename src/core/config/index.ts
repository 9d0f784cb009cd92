/**
 * Configuration exports barrel file.
 */
export {
  loadConfig,
  getDefaultConfig,
  mergeConfig,
  getConfigPath,
  toFilterConfig,
  toCheckOptions,
} from './loader.js';
export { ConfigSchema, FilterSettingsSchema, CheckSettingsSchema } from './schema.js';
export type { Config, ConfigInput, FilterSettings, CheckSettings } from './schema.js';
