/**
 * @ucibridge/engine - drive UCI chess engines over stdin/stdout
 *
 * This package provides:
 * - Search request model (positions, time controls, search jobs)
 * - UCI command formatting and bestmove parsing
 * - UciSession: spawns an engine and runs searches one at a time
 */

export const VERSION = '0.1.0';

// Request model
export {
  Positions,
  DEFAULT_TIME_CONTROL,
  createTimeControl,
  timeControlSchema,
  type Position,
  type PositionKind,
  type TimeControl,
  type SearchJob,
  type SearchResult,
} from './types/index.js';

export {
  SearchJobBuilder,
  createSearchJob,
  withPosition,
  withEngineOption,
  withGoOption,
  withTimeControl,
} from './builders/search-job.js';

// Protocol
export {
  BESTMOVE_PREFIX,
  formatSetOption,
  formatPosition,
  formatGo,
  formatSearchResult,
  serializeSearchJob,
  isBestMoveLine,
  parseBestMove,
} from './protocol/commands.js';

// Session and process plumbing
export {
  UciSession,
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
  type SessionOptions,
} from './session/uci-session.js';
export { CommandQueue, type QueuedTask } from './session/command-queue.js';
export {
  ProcessSupervisor,
  type ExitStatus,
  type SupervisorOptions,
} from './process/supervisor.js';
export { OutputScanner } from './process/output-scanner.js';
export { LineChannel } from './process/line-channel.js';
export {
  defaultSpawn,
  type ChildHandle,
  type SpawnFunction,
  type SpawnSettings,
} from './process/child-handle.js';

// Logging
export {
  createConsoleLogger,
  silentLogger,
  type EngineLogger,
  type ConsoleLoggerOptions,
} from './logger.js';

// Errors
export {
  UciError,
  SpawnError,
  StdioUnavailableError,
  WriteError,
  EngineTerminatedError,
  SessionClosedError,
  InvalidArgumentError,
  toError,
  type UciErrorKind,
} from './errors.js';
