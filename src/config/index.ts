/**
 * Config Module - Public API
 */

export {
  loadConfig,
  resolveConfig,
  readConfigFile,
  parseConfigFile,
  toCatalogAdditions,
  DEFAULT_CONFIG_FILENAME,
} from './loader.js';
export type { LoadConfigOptions, ResolvedConfig } from './loader.js';
export { getDefaultCatalog, readCatalogDefinition, DEFAULT_CATALOG_PATH } from './defaults.js';
export { configFileSchema, catalogFileSchema } from './schema.js';
export type { ConfigFile, ConfigFileInput, EntropySettings, DisplaySettings } from './schema.js';
