/**
 * UCI command formatting and result-line parsing
 */

import type { Position } from '../types/position.js';
import type { SearchJob, SearchResult } from '../types/search.js';

export const BESTMOVE_PREFIX = 'bestmove';

export function formatSetOption(name: string, value: string): string {
  return `setoption name ${name} value ${value}`;
}

export function formatPosition(position: Position): string {
  switch (position.kind) {
    case 'startpos':
      return 'position startpos';
    case 'fen':
      return `position fen ${position.fen}`;
    case 'startposAndMoves':
      return `position startpos moves ${position.moves}`;
    case 'fenAndMoves':
      return `position fen ${position.fen} moves ${position.moves}`;
  }
}

/**
 * Build the go command; with no options this is exactly "go"
 */
export function formatGo(goOptions: ReadonlyMap<string, string>): string {
  let command = 'go';
  for (const [key, value] of goOptions) {
    command += ` ${key} ${value}`;
  }
  return command;
}

/**
 * Commands for one search, in send order: setoption lines, position, go
 */
export function serializeSearchJob(job: SearchJob): string[] {
  const commands: string[] = [];
  for (const [name, value] of job.engineOptions) {
    commands.push(formatSetOption(name, value));
  }
  commands.push(formatPosition(job.position));
  commands.push(formatGo(job.goOptions));
  return commands;
}

export function isBestMoveLine(line: string): boolean {
  return line.startsWith(BESTMOVE_PREFIX);
}

/**
 * Parse "bestmove <move> [ponder <move>]"
 *
 * Tokens are split on single spaces: token 1 is the best move when present,
 * token 3 the ponder move when present.
 */
export function parseBestMove(line: string): SearchResult {
  const parts = line.split(' ');
  const result: SearchResult = {};

  if (parts.length > 1) {
    result.bestMove = parts[1];
  }

  if (parts.length > 3) {
    result.ponder = parts[3];
  }

  return result;
}

/**
 * Render a result back to its protocol form
 */
export function formatSearchResult(result: SearchResult): string {
  let line = BESTMOVE_PREFIX;
  if (result.bestMove !== undefined) {
    line += ` ${result.bestMove}`;
    if (result.ponder !== undefined) {
      line += ` ponder ${result.ponder}`;
    }
  }
  return line;
}
