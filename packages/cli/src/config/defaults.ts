/**
 * Default configuration values
 */

import { DEFAULT_SHUTDOWN_TIMEOUT_MS } from '@ucibridge/engine';

import type { UcibridgeConfig } from './schema.js';

/**
 * Default engine configuration
 */
export const DEFAULT_ENGINE_CONFIG: UcibridgeConfig['engine'] = {
  options: {},
  shutdownTimeoutMs: DEFAULT_SHUTDOWN_TIMEOUT_MS,
  stderr: 'inherit',
};

/**
 * Default search limits (none: the engine decides)
 */
export const DEFAULT_SEARCH_CONFIG: UcibridgeConfig['search'] = {};

/**
 * Default output configuration
 */
export const DEFAULT_OUTPUT_CONFIG: UcibridgeConfig['output'] = {
  format: 'text',
  verbose: false,
  color: true,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: UcibridgeConfig = {
  engine: DEFAULT_ENGINE_CONFIG,
  search: DEFAULT_SEARCH_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
};
