/**
 * Go command implementation
 */

import {
  Positions,
  UciSession,
  createSearchJob,
  createTimeControl,
  withEngineOption,
  withGoOption,
  withPosition,
  withTimeControl,
  type Position,
  type SearchJob,
  type SearchResult,
  type SpawnFunction,
} from '@ucibridge/engine';

import { VERSION, parseCliOptions } from '../cli.js';
import {
  ENV_VARS,
  formatConfig,
  loadConfig,
  parseAssignments,
  type CliOptions,
  type EnvSource,
  type UcibridgeConfig,
} from '../config/index.js';
import { ConfigError, InputError, createEngineError } from '../errors/index.js';
import {
  SearchReporter,
  describeJob,
  formatConfigDisplay,
  formatResultJson,
  formatResultText,
} from '../progress/index.js';

/**
 * Where results are written
 */
export interface OutputStream {
  write(chunk: string): unknown;
}

/**
 * Injection points for tests
 */
export interface GoDependencies {
  spawn?: SpawnFunction;
  stdout?: OutputStream;
  reporter?: SearchReporter;
  env?: EnvSource;
}

/**
 * Turn --fen and --moves into a position
 */
export function resolvePosition(options: Pick<CliOptions, 'fen' | 'moves'>): Position {
  const moves = (options.moves ?? '').split(/\s+/).filter((move) => move !== '');

  if (options.fen === undefined) {
    return moves.length > 0 ? Positions.startposWithMoves(moves) : Positions.startpos();
  }

  const fen = options.fen.trim();
  if (fen === '') {
    throw new InputError('Empty FEN', 'Pass a FEN string with --fen, or omit it for the start position');
  }
  return moves.length > 0 ? Positions.fenWithMoves(fen, moves) : Positions.fen(fen);
}

/**
 * Build the search job from resolved configuration and the position flags
 *
 * Engine options come from configuration (file, environment and --option);
 * --param entries are applied last and override limits with the same key.
 */
export function buildSearchJob(config: UcibridgeConfig, options: CliOptions): SearchJob {
  let job = createSearchJob();

  for (const [name, value] of Object.entries(config.engine.options)) {
    job = withEngineOption(job, name, value);
  }

  job = withPosition(job, resolvePosition(options));

  if (config.search.timeControl !== undefined) {
    job = withTimeControl(job, createTimeControl(config.search.timeControl));
  }
  if (config.search.depth !== undefined) {
    job = withGoOption(job, 'depth', config.search.depth);
  }
  if (config.search.movetime !== undefined) {
    job = withGoOption(job, 'movetime', config.search.movetime);
  }
  if (config.search.nodes !== undefined) {
    job = withGoOption(job, 'nodes', config.search.nodes);
  }

  for (const [key, value] of parseAssignments(options.param ?? [], '--param')) {
    job = withGoOption(job, key, value);
  }

  return job;
}

/**
 * Resolve configuration, run one search and print the result
 *
 * @returns the search result, or null when only the configuration was shown
 */
export async function runGo(
  options: CliOptions,
  deps: GoDependencies = {},
): Promise<SearchResult | null> {
  const stdout: OutputStream = deps.stdout ?? process.stdout;
  const config = await loadConfig(options, deps.env);

  if (options.showConfig) {
    stdout.write(`${formatConfigDisplay(config)}\n\nRaw configuration:\n${formatConfig(config)}\n`);
    return null;
  }

  const enginePath = config.engine.path;
  if (enginePath === undefined) {
    throw new ConfigError(
      'No engine executable configured',
      `Pass --engine <path>, set ${ENV_VARS.enginePath}, or add engine.path to .ucibridgerc`,
    );
  }

  const job = buildSearchJob(config, options);
  const reporter =
    deps.reporter ??
    new SearchReporter({ color: config.output.color, verbose: config.output.verbose });

  reporter.printHeader(VERSION, enginePath);

  let session: UciSession;
  try {
    session = await UciSession.start(enginePath, {
      spawn: deps.spawn,
      stderr: config.engine.stderr,
      shutdownTimeoutMs: config.engine.shutdownTimeoutMs,
      logger: reporter.createEngineLogger(),
    });
  } catch (error) {
    throw createEngineError(error, enginePath);
  }

  try {
    reporter.startSearch(describeJob(job));
    const result = await session.submitSearch(job);
    reporter.finishSearch();

    const line = config.output.format === 'json' ? formatResultJson(result) : formatResultText(result);
    stdout.write(`${line}\n`);
    return result;
  } catch (error) {
    reporter.failSearch('Search failed');
    throw createEngineError(error, enginePath);
  } finally {
    await session.close();
  }
}

/**
 * Main go command handler
 */
export async function goCommand(rawOptions: Record<string, unknown>): Promise<void> {
  await runGo(parseCliOptions(rawOptions));
}
