/**
 * Mock UCI engine process for testing
 *
 * Stands in for a spawned child process: the session writes commands into
 * `stdin`, the mock answers on `stdout`. Everything runs in-process.
 *
 * Note: the child-process shape is structural, so nothing is imported from
 * @ucibridge/engine here
 */

import { EventEmitter } from 'node:events';
import * as readline from 'node:readline';
import { PassThrough } from 'node:stream';

import { vi } from 'vitest';

export interface MockEngineConfig {
  /** Result lines answered to successive `go` commands */
  bestMoves?: string[];
  /** Result line once `bestMoves` is exhausted (default: DEFAULT_BEST_MOVE) */
  defaultBestMove?: string;
  /** Diagnostic lines printed before each result line */
  infoLines?: string[];
  /** Never answer `go` */
  silent?: boolean;
  /** Exit with this code on `go` instead of answering */
  exitOnGo?: number;
  /** Emit this error instead of `spawn` */
  spawnError?: Error;
  /** Ignore `quit` and end of input, so only kill() stops the mock */
  ignoreQuit?: boolean;
  /** Pretend the child has no stdin pipe */
  omitStdin?: boolean;
  /** Pretend the child has no stdout pipe */
  omitStdout?: boolean;
  /** Process id to report */
  pid?: number;
}

/**
 * Default engine answer
 */
export const DEFAULT_BEST_MOVE = 'bestmove e2e4 ponder e7e5';

export class MockUciEngine extends EventEmitter {
  /** Every command line received, in order */
  readonly commands: string[] = [];
  /** Signals passed to kill() */
  readonly killSignals: Array<NodeJS.Signals | number> = [];
  readonly pid: number;
  exitCode: number | null = null;

  private readonly input = new PassThrough();
  private readonly output = new PassThrough();
  private readonly bestMoves: string[];
  private exited = false;

  constructor(private readonly config: MockEngineConfig = {}) {
    super();
    this.pid = config.pid ?? 4242;
    this.bestMoves = [...(config.bestMoves ?? [])];

    const lines = readline.createInterface({ input: this.input, crlfDelay: Infinity });
    lines.on('line', (line) => this.handleCommand(line));
    lines.on('close', () => {
      if (!this.config.ignoreQuit) {
        this.exitLater(0);
      }
    });
  }

  /**
   * Report the launch outcome on the next tick, as child_process.spawn does
   */
  launch(): void {
    process.nextTick(() => {
      if (this.config.spawnError) {
        this.emit('error', this.config.spawnError);
      } else {
        this.emit('spawn');
      }
    });
  }

  get stdin(): PassThrough | null {
    return this.config.omitStdin ? null : this.input;
  }

  get stdout(): PassThrough | null {
    return this.config.omitStdout ? null : this.output;
  }

  get hasExited(): boolean {
    return this.exited;
  }

  /** Commands received that start with the given word */
  commandsStartingWith(word: string): string[] {
    return this.commands.filter((command) => command === word || command.startsWith(`${word} `));
  }

  /**
   * Print a line on stdout, e.g. an unsolicited result line
   */
  emitLine(line: string): void {
    if (!this.exited) {
      this.output.write(`${line}\n`);
    }
  }

  /**
   * Terminate: end stdout, close stdin, then emit `exit`
   */
  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exited) return;
    this.exited = true;
    this.exitCode = code;
    this.output.end();
    this.input.destroy();
    process.nextTick(() => this.emit('exit', code, signal));
  }

  kill(signal: NodeJS.Signals | number = 'SIGTERM'): boolean {
    this.killSignals.push(signal);
    if (this.exited) {
      return false;
    }
    this.exit(null, typeof signal === 'string' ? signal : null);
    return true;
  }

  private handleCommand(command: string): void {
    this.commands.push(command);

    if (command === 'quit') {
      if (!this.config.ignoreQuit) {
        this.exitLater(0);
      }
      return;
    }

    if (command === 'go' || command.startsWith('go ')) {
      if (this.config.exitOnGo !== undefined) {
        this.exitLater(this.config.exitOnGo);
        return;
      }
      if (!this.config.silent) {
        const answer = this.bestMoves.shift() ?? this.config.defaultBestMove ?? DEFAULT_BEST_MOVE;
        setImmediate(() => {
          for (const info of this.config.infoLines ?? []) {
            this.emitLine(info);
          }
          this.emitLine(answer);
        });
      }
    }
  }

  private exitLater(code: number): void {
    setImmediate(() => this.exit(code));
  }
}

/**
 * Create a spawn stub that hands out the given mock engine
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function createMockSpawn(engine: MockUciEngine) {
  return vi.fn(
    (_command: string, _args: readonly string[], _options: { stdio: unknown }): MockUciEngine => {
      engine.launch();
      return engine;
    },
  );
}

/**
 * Create a mock engine together with its spawn stub
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function createMockEngine(config: MockEngineConfig = {}) {
  const engine = new MockUciEngine(config);
  return { engine, spawn: createMockSpawn(engine) };
}

export type MockSpawn = ReturnType<typeof createMockSpawn>;
