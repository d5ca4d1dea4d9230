/**
 * The slice of a child process the supervisor relies on
 *
 * Node's ChildProcess satisfies this interface; tests substitute an
 * in-process stand-in through the spawn option.
 */

import { spawn as nodeSpawn, type StdioOptions } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';

export interface ChildHandle {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: 'spawn', listener: () => void): this;
  once(event: 'error', listener: (err: Error) => void): this;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
  off(event: 'error', listener: (err: Error) => void): this;
}

export interface SpawnSettings {
  stdio: StdioOptions;
}

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnSettings,
) => ChildHandle;

export const defaultSpawn: SpawnFunction = (command, args, options) =>
  nodeSpawn(command, args, { stdio: options.stdio });
