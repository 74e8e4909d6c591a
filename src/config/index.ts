/**
 * Config module exports
 */

export {
  configSchema,
  reportFormatSchema,
  outputConfigSchema,
  analysisConfigSchema,
  watchConfigSchema,
  type Config,
  type OutputConfig,
  type AnalysisConfig,
  type WatchConfig,
} from './schema.js';

export {
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  toAnalyzeOptions,
  CONFIG_FILE_NAMES,
  DEFAULT_CONFIG_FILE,
} from './loader.js';
