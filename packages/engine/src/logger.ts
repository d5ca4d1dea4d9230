/**
 * Logging hooks for engine sessions
 *
 * Sessions log through an injected EngineLogger. The default console logger
 * always prints warnings and errors; debug and info lines (every command sent
 * and every line the engine prints) only appear when verbose.
 */

export interface EngineLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Print debug and info messages (default: false) */
  verbose?: boolean;
  /** Tag prepended to every message (default: "[UciSession]") */
  prefix?: string;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): EngineLogger {
  const { verbose = false, prefix = '[UciSession]' } = options;
  const tag = (message: string): string => `${prefix} ${message}`;

  return {
    debug: (message) => {
      if (verbose) console.debug(tag(message));
    },
    info: (message) => {
      if (verbose) console.info(tag(message));
    },
    warn: (message) => console.warn(tag(message)),
    error: (message) => console.error(tag(message)),
  };
}

const noop = (): void => {};

/**
 * Logger that discards everything
 */
export const silentLogger: EngineLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
