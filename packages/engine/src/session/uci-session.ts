/**
 * UCI engine session
 *
 * Public entry point: owns one engine process for its whole lifetime and
 * turns search jobs into commands and `bestmove` lines into results.
 */

import { SessionClosedError, WriteError, toError } from '../errors.js';
import { createConsoleLogger, type EngineLogger } from '../logger.js';
import { LineChannel } from '../process/line-channel.js';
import { OutputScanner } from '../process/output-scanner.js';
import {
  ProcessSupervisor,
  type ExitStatus,
  type SupervisorOptions,
} from '../process/supervisor.js';
import { parseBestMove, serializeSearchJob } from '../protocol/commands.js';
import type { SearchJob, SearchResult } from '../types/search.js';

import { CommandQueue } from './command-queue.js';

export interface SessionOptions extends SupervisorOptions {
  /** How long close() waits for the engine to exit before killing it (default: 1000) */
  shutdownTimeoutMs?: number;
}

export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 1000;

export class UciSession {
  private readonly queue = new CommandQueue();
  private closing: Promise<void> | null = null;

  private constructor(
    private readonly supervisor: ProcessSupervisor,
    private readonly channel: LineChannel,
    private readonly scanner: OutputScanner,
    private readonly logger: EngineLogger,
    private readonly shutdownTimeoutMs: number,
  ) {}

  /**
   * Spawn the engine and start reading its output
   *
   * @param enginePath - Executable to launch, e.g. `./stockfish`
   * @throws SpawnError | StdioUnavailableError when the process cannot be set up
   */
  static async start(enginePath: string, options: SessionOptions = {}): Promise<UciSession> {
    const { shutdownTimeoutMs = DEFAULT_SHUTDOWN_TIMEOUT_MS, ...supervisorOptions } = options;
    const logger = supervisorOptions.logger ?? createConsoleLogger();

    const supervisor = await ProcessSupervisor.spawn(enginePath, { ...supervisorOptions, logger });
    const channel = new LineChannel();
    const scanner = new OutputScanner(enginePath, supervisor.stdout, channel, logger);

    return new UciSession(supervisor, channel, scanner, logger, shutdownTimeoutMs);
  }

  get enginePath(): string {
    return this.supervisor.enginePath;
  }

  get pid(): number | undefined {
    return this.supervisor.pid;
  }

  get isClosed(): boolean {
    return this.closing !== null;
  }

  /** Resolves with the exit status once the engine process is gone */
  get exited(): Promise<ExitStatus> {
    return this.supervisor.exited;
  }

  /**
   * Run one search and wait for the engine's answer
   *
   * Calls are queued and run strictly one after another. Rejects with
   * EngineTerminatedError if engine output ends first, SessionClosedError if
   * the session is closed (also while the job is still being sent),
   * WriteError if a command cannot be sent.
   */
  submitSearch(job: SearchJob): Promise<SearchResult> {
    if (this.isClosed) {
      return Promise.reject(new SessionClosedError(this.enginePath));
    }

    return this.queue.enqueue(async () => {
      if (this.isClosed) {
        throw new SessionClosedError(this.enginePath);
      }

      for (const stale of this.channel.drain()) {
        this.logger.warn(`discarding unsolicited result line: ${stale}`);
      }

      for (const command of serializeSearchJob(job)) {
        if (this.isClosed) {
          throw new SessionClosedError(this.enginePath);
        }
        try {
          await this.supervisor.write(command);
        } catch (err) {
          // close() ends the engine's input while the job is still being sent
          if (this.isClosed && err instanceof WriteError) {
            throw new SessionClosedError(this.enginePath);
          }
          throw err;
        }
      }

      const line = await this.channel.receive();
      return parseBestMove(line);
    });
  }

  /**
   * Shut the engine down; safe to call more than once
   *
   * Pending and queued searches reject with SessionClosedError. The engine is
   * asked to quit, its input is closed, and it is killed if it has not exited
   * within the shutdown timeout.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    this.channel.close(new SessionClosedError(this.enginePath));

    if (this.supervisor.isRunning) {
      try {
        await this.supervisor.write('quit');
      } catch (err) {
        this.logger.debug(`could not send quit: ${toError(err).message}`);
      }
    }
    this.supervisor.endInput();

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.shutdownTimeoutMs);
    });

    try {
      const outcome = await Promise.race([this.supervisor.exited, timedOut]);
      if (outcome === 'timeout' && this.supervisor.kill()) {
        this.logger.warn(
          `engine '${this.enginePath}' did not exit within ${this.shutdownTimeoutMs}ms, killed`,
        );
        await this.supervisor.exited;
      }
    } finally {
      clearTimeout(timer);
    }

    await this.scanner.done;
  }
}
