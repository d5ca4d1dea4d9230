/**
 * Output formatting utilities
 */

import {
  formatGo,
  formatPosition,
  formatSearchResult,
  type SearchJob,
  type SearchResult,
} from '@ucibridge/engine';
import chalk from 'chalk';

import type { UcibridgeConfig } from '../config/schema.js';

/**
 * Format a search result as the engine's own result line
 */
export function formatResultText(result: SearchResult): string {
  return formatSearchResult(result);
}

/**
 * Format a search result as JSON; absent moves are null
 */
export function formatResultJson(result: SearchResult): string {
  return JSON.stringify({
    bestMove: result.bestMove ?? null,
    ponder: result.ponder ?? null,
  });
}

/**
 * One-line summary of what a job asks the engine to do
 */
export function describeJob(job: SearchJob): string {
  return `${formatPosition(job.position)}, ${formatGo(job.goOptions)}`;
}

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: UcibridgeConfig): string {
  const lines: string[] = [];

  lines.push(chalk.bold('Configuration:'));
  lines.push('');

  // Engine
  lines.push(chalk.dim('Engine:'));
  lines.push(`  Path: ${config.engine.path ?? chalk.yellow('not set')}`);
  lines.push(`  Shutdown timeout: ${formatDuration(config.engine.shutdownTimeoutMs)}`);
  lines.push(`  Stderr: ${config.engine.stderr}`);
  const options = Object.entries(config.engine.options);
  if (options.length > 0) {
    lines.push('  Options:');
    for (const [name, value] of options) {
      lines.push(`    ${name} = ${value}`);
    }
  }
  lines.push('');

  // Search
  lines.push(chalk.dim('Search:'));
  if (config.search.depth !== undefined) {
    lines.push(`  Depth: ${config.search.depth}`);
  }
  if (config.search.movetime !== undefined) {
    lines.push(`  Move time: ${formatDuration(config.search.movetime)}`);
  }
  if (config.search.nodes !== undefined) {
    lines.push(`  Nodes: ${config.search.nodes}`);
  }
  const clock = config.search.timeControl;
  if (clock !== undefined) {
    const fields = (['wtime', 'winc', 'btime', 'binc'] as const)
      .filter((field) => clock[field] !== undefined)
      .map((field) => `${field} ${clock[field]}`);
    lines.push(`  Time control: ${fields.join(', ')}`);
  }
  if (lines[lines.length - 1] === chalk.dim('Search:')) {
    lines.push('  (engine defaults)');
  }
  lines.push('');

  // Output
  lines.push(chalk.dim('Output:'));
  lines.push(`  Format: ${config.output.format}`);
  lines.push(`  Verbose: ${config.output.verbose ? 'yes' : 'no'}`);
  lines.push(`  Color: ${config.output.color ? 'yes' : 'no'}`);

  return lines.join('\n');
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}
