/**
 * Configuration schema types for the ucibridge CLI
 */

import type { TimeControl } from '@ucibridge/engine';

/**
 * What to do with the engine's stderr
 */
export type StderrMode = 'inherit' | 'ignore';

/**
 * How search results are printed
 */
export type OutputFormat = 'text' | 'json';

/**
 * Engine process configuration
 */
export interface EngineConfigSchema {
  /** Engine executable, e.g. ./stockfish (required to run a search) */
  path?: string;
  /** Engine options sent with setoption before every search */
  options: Record<string, string>;
  /** Time allowed for the engine to quit before it is killed (ms) */
  shutdownTimeoutMs: number;
  /** Engine stderr handling */
  stderr: StderrMode;
}

/**
 * Default search limits
 */
export interface SearchConfigSchema {
  /** Search depth in plies */
  depth?: number;
  /** Fixed time per move (ms) */
  movetime?: number;
  /** Node limit */
  nodes?: number;
  /** Clock state; unset fields fall back to one minute, no increment */
  timeControl?: Partial<TimeControl>;
}

/**
 * Output configuration
 */
export interface OutputConfigSchema {
  /** Result format */
  format: OutputFormat;
  /** Print commands and engine output to stderr */
  verbose: boolean;
  /** Colored messages */
  color: boolean;
}

/**
 * Complete ucibridge configuration
 */
export interface UcibridgeConfig {
  engine: EngineConfigSchema;
  search: SearchConfigSchema;
  output: OutputConfigSchema;
}

/**
 * Partial configuration as found in config files and the environment
 */
export interface PartialUcibridgeConfig {
  engine?: Partial<EngineConfigSchema>;
  search?: SearchConfigSchema;
  output?: Partial<OutputConfigSchema>;
}

/**
 * CLI options from command line arguments
 */
export interface CliOptions {
  /** Engine executable path */
  engine?: string;
  /** Position in FEN (default: start position) */
  fen?: string;
  /** Moves played from the position, space separated */
  moves?: string;
  /** Engine options as name=value */
  option?: string[];
  /** Extra go parameters as key=value */
  param?: string[];
  /** Search depth */
  depth?: number;
  /** Fixed time per move (ms) */
  movetime?: number;
  /** Node limit */
  nodes?: number;
  /** White time (ms) */
  wtime?: number;
  /** White increment (ms) */
  winc?: number;
  /** Black time (ms) */
  btime?: number;
  /** Black increment (ms) */
  binc?: number;
  /** Print the result as JSON */
  json?: boolean;
  /** Show engine traffic on stderr */
  verbose?: boolean;
  /** Disable colored output */
  noColor?: boolean;
  /** Path to config file */
  config?: string;
  /** Print resolved configuration and exit */
  showConfig?: boolean;
}
