/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';

import { ConfigError, InputError } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG } from './defaults.js';
import type { CliOptions, PartialUcibridgeConfig, UcibridgeConfig } from './schema.js';
import { ConfigValidationError, validateConfig, validatePartialConfig } from './validation.js';

/**
 * Environment variables read by loadConfig
 */
export const ENV_VARS = {
  enginePath: 'UCIBRIDGE_ENGINE_PATH',
  shutdownTimeout: 'UCIBRIDGE_SHUTDOWN_TIMEOUT',
  verbose: 'UCIBRIDGE_VERBOSE',
  format: 'UCIBRIDGE_FORMAT',
} as const;

export type EnvSource = Record<string, string | undefined>;

/**
 * Deep merge a partial configuration into a complete one
 * Source values override target values; engine options merge by name
 */
function deepMerge(target: UcibridgeConfig, source: PartialUcibridgeConfig): UcibridgeConfig {
  const timeControl =
    source.search?.timeControl !== undefined
      ? { ...target.search.timeControl, ...source.search.timeControl }
      : target.search.timeControl;

  return {
    engine: {
      ...target.engine,
      ...source.engine,
      options: { ...target.engine.options, ...source.engine?.options },
    },
    search: {
      ...target.search,
      ...source.search,
      ...(timeControl !== undefined ? { timeControl } : {}),
    },
    output: { ...target.output, ...source.output },
  };
}

function readEnv(env: EnvSource, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Load configuration from environment variables
 */
function loadEnvConfig(env: EnvSource): PartialUcibridgeConfig {
  const engine: Record<string, unknown> = {};
  const output: Record<string, unknown> = {};

  const enginePath = readEnv(env, ENV_VARS.enginePath);
  if (enginePath !== undefined) {
    engine['path'] = enginePath;
  }

  const shutdownTimeout = readEnv(env, ENV_VARS.shutdownTimeout);
  if (shutdownTimeout !== undefined) {
    // NaN is rejected by validation below
    engine['shutdownTimeoutMs'] = Number(shutdownTimeout);
  }

  const verbose = readEnv(env, ENV_VARS.verbose);
  if (verbose !== undefined) {
    output['verbose'] = verbose.toLowerCase() === 'true' || verbose === '1';
  }

  const format = readEnv(env, ENV_VARS.format);
  if (format !== undefined) {
    output['format'] = format;
  }

  return validatePartialConfig({ engine, output });
}

/**
 * Load configuration from config file using cosmiconfig
 *
 * Returns null when no config file is found. A file that exists but cannot be
 * read or parsed is an error.
 */
async function loadConfigFile(configPath?: string): Promise<PartialUcibridgeConfig | null> {
  const explorer = cosmiconfig('ucibridge', {
    searchPlaces: [
      'package.json',
      '.ucibridgerc',
      '.ucibridgerc.json',
      '.ucibridgerc.yaml',
      '.ucibridgerc.yml',
      '.ucibridgerc.js',
      '.ucibridgerc.cjs',
      'ucibridge.config.js',
      'ucibridge.config.cjs',
    ],
  });

  let result: CosmiconfigResult;
  try {
    result = configPath ? await explorer.load(configPath) : await explorer.search();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      `Could not read config file${configPath ? ` ${configPath}` : ''}: ${reason}`,
      'Check that the file exists and is valid JSON, YAML or JavaScript',
    );
  }

  if (!result || result.isEmpty) {
    return null;
  }

  const { filepath } = result;
  try {
    return validatePartialConfig(result.config);
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      throw new ConfigValidationError(
        error.errors.map((e) => ({ ...e, path: `${filepath}: ${e.path}` })),
      );
    }
    throw error;
  }
}

/**
 * Split `name=value` entries given with a repeatable flag
 *
 * The name is everything before the first `=` and must not be blank; the
 * value may be empty.
 * @throws InputError on an entry without `=`
 */
export function parseAssignments(
  entries: readonly string[],
  flag: string,
): Array<[name: string, value: string]> {
  return entries.map((entry) => {
    const separator = entry.indexOf('=');
    const name = separator === -1 ? '' : entry.slice(0, separator).trim();
    if (name === '') {
      throw new InputError(
        `Invalid ${flag} value '${entry}'`,
        `Write it as ${flag} name=value`,
      );
    }
    return [name, entry.slice(separator + 1)];
  });
}

/**
 * Map CLI options to config object
 */
export function mapCliToConfig(options: CliOptions): PartialUcibridgeConfig {
  const engine: Partial<UcibridgeConfig['engine']> = {};
  const search: UcibridgeConfig['search'] = {};
  const output: Partial<UcibridgeConfig['output']> = {};

  if (options.engine !== undefined) {
    engine.path = options.engine;
  }

  if (options.option !== undefined && options.option.length > 0) {
    engine.options = Object.fromEntries(parseAssignments(options.option, '--option'));
  }

  if (options.depth !== undefined) {
    search.depth = options.depth;
  }

  if (options.movetime !== undefined) {
    search.movetime = options.movetime;
  }

  if (options.nodes !== undefined) {
    search.nodes = options.nodes;
  }

  const clock: NonNullable<UcibridgeConfig['search']['timeControl']> = {};
  if (options.wtime !== undefined) clock.wtime = options.wtime;
  if (options.winc !== undefined) clock.winc = options.winc;
  if (options.btime !== undefined) clock.btime = options.btime;
  if (options.binc !== undefined) clock.binc = options.binc;
  if (Object.keys(clock).length > 0) {
    search.timeControl = clock;
  }

  if (options.json) {
    output.format = 'json';
  }

  if (options.verbose !== undefined) {
    output.verbose = options.verbose;
  }

  if (options.noColor) {
    output.color = false;
  }

  return { engine, search, output };
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: EnvSource = process.env,
): Promise<UcibridgeConfig> {
  // 1. Start with defaults
  let config: UcibridgeConfig = deepMerge(DEFAULT_CONFIG, {});

  // 2. Load and merge config file (if exists)
  const fileConfig = await loadConfigFile(cliOptions.config);
  if (fileConfig) {
    config = deepMerge(config, fileConfig);
  }

  // 3. Apply environment variables
  config = deepMerge(config, loadEnvConfig(env));

  // 4. Apply CLI arguments (highest priority)
  config = deepMerge(config, mapCliToConfig(cliOptions));

  // 5. Validate final config
  return validateConfig(config);
}

/**
 * Format configuration for display
 */
export function formatConfig(config: UcibridgeConfig): string {
  return JSON.stringify(config, null, 2);
}
