export * from './types.js';
export {
  CONFIG_DIR,
  CONFIG_FILE_NAME,
  DEFAULT_HOUSEKEEPING_INTERVALS,
  getDefaultConfig,
} from './defaults.js';
export { parseDuration, parseDurationValue, formatDuration, isDurationString } from './duration.js';
export { parseEnvBoolean, parseEnvInteger, loadEnvConfig, getEnvConfigPath } from './env.js';
export { findConfigDir, discoverConfigFile, parseYamlConfig, convertYamlToConfig, readConfigFile } from './file.js';
export { mergeConfiguration, mergeConfigurations } from './merge.js';
export { validateConfiguration } from './validation.js';
export {
  loadConfig,
  loadConfigWithSource,
  resolveConfigPaths,
  getOrchestratorId,
  type LoadedConfiguration,
} from './config.js';
