/**
 * Error classes for UCI engine sessions
 */

/**
 * Discriminator for the failure modes of a session
 */
export type UciErrorKind =
  | 'spawn-failure'
  | 'stdio-unavailable'
  | 'write-failure'
  | 'engine-terminated'
  | 'session-closed'
  | 'invalid-argument';

/**
 * Base error class for UCI engine errors
 */
export class UciError extends Error {
  constructor(
    message: string,
    public readonly kind: UciErrorKind,
    public override readonly cause?: Error,
  ) {
    super(message);
    this.name = 'UciError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UciError);
    }
  }
}

/**
 * Error thrown when the engine executable cannot be started
 */
export class SpawnError extends UciError {
  constructor(
    public readonly enginePath: string,
    cause?: Error,
  ) {
    super(
      `Failed to spawn engine '${enginePath}'${cause ? `: ${cause.message}` : ''}`,
      'spawn-failure',
      cause,
    );
    this.name = 'SpawnError';
  }
}

/**
 * Error thrown when the child process lacks an expected pipe
 */
export class StdioUnavailableError extends UciError {
  constructor(
    public readonly enginePath: string,
    public readonly stream: 'stdin' | 'stdout',
  ) {
    super(`Engine '${enginePath}' has no ${stream} handle`, 'stdio-unavailable');
    this.name = 'StdioUnavailableError';
  }
}

/**
 * Error thrown when a command cannot be written to the engine
 */
export class WriteError extends UciError {
  constructor(
    public readonly command: string,
    cause?: Error,
  ) {
    super(
      `Failed to write command '${command}'${cause ? `: ${cause.message}` : ''}`,
      'write-failure',
      cause,
    );
    this.name = 'WriteError';
  }
}

/**
 * Error thrown when engine output ends before a result line arrives
 */
export class EngineTerminatedError extends UciError {
  constructor(
    public readonly enginePath: string,
    cause?: Error,
  ) {
    super(
      `Engine '${enginePath}' stopped producing output${cause ? `: ${cause.message}` : ''}`,
      'engine-terminated',
      cause,
    );
    this.name = 'EngineTerminatedError';
  }
}

/**
 * Error thrown for calls on a session that has been closed
 */
export class SessionClosedError extends UciError {
  constructor(public readonly enginePath: string) {
    super(`Session for engine '${enginePath}' is closed`, 'session-closed');
    this.name = 'SessionClosedError';
  }
}

/**
 * Error thrown when invalid arguments are provided
 */
export class InvalidArgumentError extends UciError {
  constructor(message: string) {
    super(message, 'invalid-argument');
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
