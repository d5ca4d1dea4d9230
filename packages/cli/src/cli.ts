/**
 * CLI definition using Commander.js
 */

import { Command, InvalidArgumentError } from 'commander';

import type { CliOptions } from './config/schema.js';
import { withErrorHandling } from './errors/handler.js';

export const VERSION = '0.1.0';

/**
 * Clock flags help text
 */
const CLOCK_HELP = `Clock flags (ms). When any is given, the others default to
    one minute per side and no increment`;

/**
 * Commander parser for non-negative integer arguments
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

/**
 * Commander parser for repeatable options
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('ucibridge')
    .description('Drive a UCI chess engine from the command line and print its best move')
    .version(VERSION);

  // Go command
  program
    .command('go')
    .description('Run one search and print the best move')
    .option('-e, --engine <path>', 'Engine executable (e.g. ./stockfish)')
    .option('--fen <fen>', 'Position in FEN (default: start position)')
    .option('-m, --moves <moves>', 'Moves played from the position, e.g. "e2e4 e7e5"')
    .option('-o, --option <name=value>', 'Engine option sent with setoption (repeatable)', collect, [])
    .option('-p, --param <key=value>', 'Extra go parameter, e.g. mate=3 (repeatable)', collect, [])
    .option('-d, --depth <plies>', 'Search depth', parseInteger)
    .option('--movetime <ms>', 'Fixed time per move', parseInteger)
    .option('--nodes <count>', 'Node limit', parseInteger)
    .option('--wtime <ms>', CLOCK_HELP, parseInteger)
    .option('--winc <ms>', 'White increment', parseInteger)
    .option('--btime <ms>', 'Black time', parseInteger)
    .option('--binc <ms>', 'Black increment', parseInteger)
    .option('--json', 'Print the result as JSON')
    .option('--verbose', 'Show commands sent to the engine and its output on stderr')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .option('-c, --config <file>', 'Path to config file')
    .option('--show-config', 'Print resolved configuration and exit')
    .action(
      withErrorHandling(async (options: Record<string, unknown>) => {
        // Import dynamically to avoid circular dependencies
        const { goCommand } = await import('./commands/go.js');
        await goCommand(options);
      }),
    );

  return program;
}

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function numberOption(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function booleanOption(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function listOption(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter((entry): entry is string => typeof entry === 'string');
}

/**
 * Parse CLI options from command options object
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  const engine = stringOption(options['engine']);
  if (engine !== undefined) result.engine = engine;
  const fen = stringOption(options['fen']);
  if (fen !== undefined) result.fen = fen;
  const moves = stringOption(options['moves']);
  if (moves !== undefined) result.moves = moves;
  const option = listOption(options['option']);
  if (option !== undefined) result.option = option;
  const param = listOption(options['param']);
  if (param !== undefined) result.param = param;

  const depth = numberOption(options['depth']);
  if (depth !== undefined) result.depth = depth;
  const movetime = numberOption(options['movetime']);
  if (movetime !== undefined) result.movetime = movetime;
  const nodes = numberOption(options['nodes']);
  if (nodes !== undefined) result.nodes = nodes;
  const wtime = numberOption(options['wtime']);
  if (wtime !== undefined) result.wtime = wtime;
  const winc = numberOption(options['winc']);
  if (winc !== undefined) result.winc = winc;
  const btime = numberOption(options['btime']);
  if (btime !== undefined) result.btime = btime;
  const binc = numberOption(options['binc']);
  if (binc !== undefined) result.binc = binc;

  const json = booleanOption(options['json']);
  if (json !== undefined) result.json = json;
  const verbose = booleanOption(options['verbose']);
  if (verbose !== undefined) result.verbose = verbose;
  const config = stringOption(options['config']);
  if (config !== undefined) result.config = config;
  const showConfig = booleanOption(options['showConfig']);
  if (showConfig !== undefined) result.showConfig = showConfig;
  // Note: Commander.js uses 'color' (negated) when --no-color is used
  if (options['color'] === false) result.noColor = true;

  return result;
}
