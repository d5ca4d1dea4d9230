/**
 * Progress reporter with an ora spinner
 *
 * Everything goes to stderr so stdout carries only the search result.
 */

import type { EngineLogger } from '@ucibridge/engine';
import chalk from 'chalk';
import ora, { type Ora, type Color } from 'ora';

import { formatDuration } from './formatters.js';
import type { ColorFunctions, SearchReporterOptions } from './types.js';

export type { SearchReporterOptions } from './types.js';

// Helper function for colorized output
function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
    };
  }
  // No colors - return text as-is
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
    cyan: identity,
  };
}

/**
 * Progress reporter for the go command
 */
export class SearchReporter {
  private spinner: Ora | null = null;
  private searchStartTime = 0;
  private readonly silent: boolean;
  private readonly useColor: boolean;
  private readonly verbose: boolean;

  // Color functions
  private readonly c: ColorFunctions;

  constructor(options: SearchReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.verbose = options.verbose ?? false;
    this.c = createColorFns(this.useColor);
  }

  /**
   * Print the version header
   */
  printHeader(version: string, enginePath: string): void {
    if (this.silent) return;
    console.error(this.c.bold(`ucibridge v${version}`));
    console.error(this.c.dim(`Engine: ${enginePath}`));
    console.error('');
  }

  /**
   * Start the spinner for a search
   */
  startSearch(description: string): void {
    this.searchStartTime = Date.now();
    if (this.silent) return;

    if (this.spinner) {
      this.spinner.stop();
    }

    // Build ora options - only include color if colors are enabled
    const oraOptions: { text: string; prefixText: string; color?: Color } = {
      text: `Searching ${this.c.cyan(description)}`,
      prefixText: ' ',
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }

    this.spinner = ora(oraOptions).start();
  }

  /**
   * Mark the search as finished
   */
  finishSearch(): void {
    if (this.silent) return;
    const elapsed = formatDuration(Date.now() - this.searchStartTime);
    if (this.spinner) {
      this.spinner.succeed(`Search finished in ${elapsed}`);
      this.spinner = null;
    } else {
      this.printSuccess(`Search finished in ${elapsed}`);
    }
  }

  /**
   * Mark the search as failed
   */
  failSearch(message: string): void {
    if (this.silent) return;
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    }
  }

  /**
   * Print a plain message
   */
  printMessage(message: string): void {
    if (this.silent) return;
    this.withSpinnerPaused(() => console.error(message));
  }

  /**
   * Print a success message
   */
  printSuccess(message: string): void {
    if (this.silent) return;
    this.withSpinnerPaused(() => console.error(this.c.green(`✓ ${message}`)));
  }

  /**
   * Print a warning message
   */
  printWarning(message: string): void {
    if (this.silent) return;
    this.withSpinnerPaused(() => console.error(this.c.yellow(`⚠ ${message}`)));
  }

  /**
   * Print an error message
   */
  printError(message: string): void {
    if (this.silent) return;
    this.withSpinnerPaused(() => console.error(this.c.red(`✗ ${message}`)));
  }

  /**
   * Logger for the engine session
   *
   * Commands and engine output are shown only in verbose mode; warnings and
   * errors always are.
   */
  createEngineLogger(): EngineLogger {
    return {
      debug: (message) => {
        if (this.verbose) this.printMessage(this.c.dim(`  ${message}`));
      },
      info: (message) => {
        if (this.verbose) this.printMessage(this.c.dim(message));
      },
      warn: (message) => this.printWarning(message),
      error: (message) => this.printError(message),
    };
  }

  /**
   * Print something while the spinner is active without garbling its line
   */
  private withSpinnerPaused(print: () => void): void {
    if (this.spinner?.isSpinning) {
      const text = this.spinner.text;
      this.spinner.stop();
      print();
      this.spinner.start(text);
    } else {
      print();
    }
  }
}
