/**
 * Error handling utilities
 */

import { UciError, type UciErrorKind } from '@ucibridge/engine';
import chalk from 'chalk';

import { ConfigValidationError } from '../config/validation.js';

import { CliError, EngineError, resolveAbsolutePath } from './cli-errors.js';

/**
 * Format and display an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigValidationError) {
    return chalk.red(error.format());
  }

  if (error instanceof CliError) {
    return chalk.red(error.format());
  }

  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`);
  }

  return chalk.red(`Error: ${String(error)}`);
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown): never {
  console.error(formatError(error));

  let exitCode = 1;
  if (error instanceof CliError) {
    exitCode = error.exitCode;
  }

  process.exit(exitCode);
}

/**
 * Wrap an async function with error handling
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

function suggestionFor(kind: UciErrorKind, enginePath: string): string | undefined {
  switch (kind) {
    case 'spawn-failure':
      return `Check that ${resolveAbsolutePath(enginePath)} exists and is executable`;
    case 'stdio-unavailable':
    case 'write-failure':
    case 'engine-terminated':
      return 'Run with --verbose to see the commands sent and the engine output';
    case 'invalid-argument':
      return 'Use --help to see available options';
    case 'session-closed':
      return undefined;
  }
}

/**
 * Wrap an engine failure in an EngineError with a helpful suggestion
 *
 * Errors that are not engine errors are returned unchanged.
 */
export function createEngineError(error: unknown, enginePath: string): unknown {
  if (!(error instanceof UciError)) {
    return error;
  }
  return new EngineError(enginePath, error.message, suggestionFor(error.kind, enginePath));
}
