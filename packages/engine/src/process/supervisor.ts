/**
 * Engine process supervision
 *
 * Spawns the engine with piped stdin/stdout, owns the write handle and
 * watches for process exit.
 */

import type { Readable, Writable } from 'node:stream';

import { SpawnError, StdioUnavailableError, WriteError, toError } from '../errors.js';
import { createConsoleLogger, type EngineLogger } from '../logger.js';

import { defaultSpawn, type ChildHandle, type SpawnFunction } from './child-handle.js';

/**
 * Exit status reported by the child process
 */
export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface SupervisorOptions {
  /** Spawn implementation (default: node:child_process spawn) */
  spawn?: SpawnFunction;
  /** What to do with the engine's stderr (default: 'inherit') */
  stderr?: 'inherit' | 'ignore';
  logger?: EngineLogger;
}

export class ProcessSupervisor {
  private exitStatus: ExitStatus | null = null;

  /** Resolves once the child has exited */
  readonly exited: Promise<ExitStatus>;

  private constructor(
    readonly enginePath: string,
    private readonly child: ChildHandle,
    private readonly stdin: Writable,
    readonly stdout: Readable,
    private readonly logger: EngineLogger,
  ) {
    this.exited = new Promise<ExitStatus>((resolve) => {
      child.once('exit', (code, signal) => {
        this.exitStatus = { code, signal };
        this.logger.info(`engine '${enginePath}' exited (code ${code}, signal ${signal})`);
        resolve(this.exitStatus);
      });
    });

    child.on('error', (err) => {
      this.logger.error(`engine '${enginePath}' process error: ${err.message}`);
    });

    // EPIPE and friends surface through write callbacks; keep them from
    // becoming uncaught stream errors
    stdin.on('error', (err) => {
      this.logger.debug(`stdin error: ${err.message}`);
    });
  }

  /**
   * Launch the engine executable with no arguments
   *
   * @throws SpawnError if the executable cannot be started
   * @throws StdioUnavailableError if stdin or stdout is not piped
   */
  static async spawn(enginePath: string, options: SupervisorOptions = {}): Promise<ProcessSupervisor> {
    const {
      spawn = defaultSpawn,
      stderr = 'inherit',
      logger = createConsoleLogger(),
    } = options;

    let child: ChildHandle;
    try {
      child = spawn(enginePath, [], { stdio: ['pipe', 'pipe', stderr] });
    } catch (err) {
      throw new SpawnError(enginePath, toError(err));
    }

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        reject(new SpawnError(enginePath, err));
      };
      child.once('error', onError);
      child.once('spawn', () => {
        child.off('error', onError);
        resolve();
      });
    });

    const { stdin, stdout } = child;
    if (!stdin || !stdout) {
      child.kill();
      throw new StdioUnavailableError(enginePath, stdin ? 'stdout' : 'stdin');
    }

    logger.info(`spawned engine '${enginePath}' (pid ${child.pid ?? 'unknown'})`);

    return new ProcessSupervisor(enginePath, child, stdin, stdout, logger);
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get isRunning(): boolean {
    return this.exitStatus === null && this.child.exitCode === null;
  }

  /**
   * Write one command line to the engine
   * @throws WriteError if the pipe is closed or the write fails
   */
  write(command: string): Promise<void> {
    this.logger.debug(`> ${command}`);

    if (this.stdin.destroyed || this.stdin.writableEnded) {
      return Promise.reject(new WriteError(command, new Error('engine input is closed')));
    }

    return new Promise<void>((resolve, reject) => {
      this.stdin.write(`${command}\n`, (err) => {
        if (err) {
          reject(new WriteError(command, err));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Close the engine's standard input
   */
  endInput(): void {
    if (!this.stdin.writableEnded && !this.stdin.destroyed) {
      this.stdin.end();
    }
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    if (!this.isRunning) {
      return false;
    }
    return this.child.kill(signal);
  }
}
