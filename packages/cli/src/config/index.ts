/**
 * Configuration module exports
 */

// Schema types
export type {
  StderrMode,
  OutputFormat,
  EngineConfigSchema,
  SearchConfigSchema,
  OutputConfigSchema,
  UcibridgeConfig,
  PartialUcibridgeConfig,
  CliOptions,
} from './schema.js';

// Defaults
export {
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_SEARCH_CONFIG,
  DEFAULT_OUTPUT_CONFIG,
  DEFAULT_CONFIG,
} from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  outputFormatSchema,
  stderrModeSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
} from './validation.js';

// Loader
export {
  loadConfig,
  formatConfig,
  mapCliToConfig,
  parseAssignments,
  ENV_VARS,
  type EnvSource,
} from './loader.js';
