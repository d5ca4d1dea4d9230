/**
 * Background reader for engine output
 *
 * Forwards `bestmove` lines to the line channel and discards everything
 * else. When the stream ends or fails the channel is closed, which wakes any
 * pending receiver.
 */

import * as readline from 'node:readline';
import type { Readable } from 'node:stream';

import { EngineTerminatedError, toError } from '../errors.js';
import type { EngineLogger } from '../logger.js';
import { isBestMoveLine } from '../protocol/commands.js';

import type { LineChannel } from './line-channel.js';

export class OutputScanner {
  /** Resolves when the read loop has finished; never rejects */
  readonly done: Promise<void>;

  constructor(
    private readonly enginePath: string,
    stdout: Readable,
    private readonly channel: LineChannel,
    private readonly logger: EngineLogger,
  ) {
    stdout.setEncoding('utf8');
    this.done = this.run(stdout);
  }

  private async run(stdout: Readable): Promise<void> {
    const lines = readline.createInterface({ input: stdout, crlfDelay: Infinity });

    try {
      for await (const line of lines) {
        this.logger.debug(`< ${line}`);
        if (isBestMoveLine(line)) {
          this.channel.push(line);
        }
      }
      this.logger.info(`output of engine '${this.enginePath}' ended`);
      this.channel.close(new EngineTerminatedError(this.enginePath));
    } catch (err) {
      const error = toError(err);
      this.logger.error(`reading output of engine '${this.enginePath}' failed: ${error.message}`);
      this.channel.close(new EngineTerminatedError(this.enginePath, error));
    } finally {
      lines.close();
    }
  }
}
