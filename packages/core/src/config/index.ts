/**
 * Configuration loading utilities
 */
export {
  loadConfig,
  parseConfig,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAME,
  validateVersion,
  validateSettings,
  validateResources,
} from './ConfigLoader.js';
export type { ProvisionConfig, ProvisionSettings, LoadedConfig, LoadConfigOptions } from './ConfigLoader.js';
export { buildResources } from './buildResources.js';
