/**
 * Error module exports
 */

export {
  CliError,
  ConfigError,
  InputError,
  EngineError,
  resolveAbsolutePath,
} from './cli-errors.js';

export { formatError, handleError, withErrorHandling, createEngineError } from './handler.js';
