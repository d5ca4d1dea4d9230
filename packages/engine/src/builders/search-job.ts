/**
 * Search job construction
 *
 * The functions below never mutate their input; each returns a fresh job.
 * SearchJobBuilder chains them for call sites that prefer a fluent style.
 */

import { Positions, type Position } from '../types/position.js';
import type { SearchJob } from '../types/search.js';
import type { TimeControl } from '../types/time-control.js';

/**
 * Create an empty job searching from the starting position
 */
export function createSearchJob(): SearchJob {
  return {
    engineOptions: new Map(),
    position: Positions.startpos(),
    goOptions: new Map(),
  };
}

export function withPosition(job: SearchJob, position: Position): SearchJob {
  return { ...job, position };
}

/**
 * Set an engine option; a later call with the same name replaces the value
 */
export function withEngineOption(job: SearchJob, name: string, value: string | number): SearchJob {
  const engineOptions = new Map(job.engineOptions);
  engineOptions.set(name, String(value));
  return { ...job, engineOptions };
}

/**
 * Set a go-option; a later call with the same key replaces the value
 */
export function withGoOption(job: SearchJob, key: string, value: string | number): SearchJob {
  const goOptions = new Map(job.goOptions);
  goOptions.set(key, String(value));
  return { ...job, goOptions };
}

/**
 * Overwrite the wtime/winc/btime/binc go-options with the clock values
 */
export function withTimeControl(job: SearchJob, timeControl: TimeControl): SearchJob {
  const goOptions = new Map(job.goOptions);
  goOptions.set('wtime', String(timeControl.wtime));
  goOptions.set('winc', String(timeControl.winc));
  goOptions.set('btime', String(timeControl.btime));
  goOptions.set('binc', String(timeControl.binc));
  return { ...job, goOptions };
}

/**
 * Fluent builder for SearchJob
 *
 * @example
 * const job = new SearchJobBuilder()
 *   .position(Positions.startposWithMoves(['e2e4', 'e7e5']))
 *   .engineOption('Threads', 2)
 *   .goOption('depth', 18)
 *   .build();
 */
export class SearchJobBuilder {
  private job: SearchJob;

  constructor(base: SearchJob = createSearchJob()) {
    this.job = base;
  }

  position(position: Position): this {
    this.job = withPosition(this.job, position);
    return this;
  }

  engineOption(name: string, value: string | number): this {
    this.job = withEngineOption(this.job, name, value);
    return this;
  }

  engineOptions(options: Record<string, string | number>): this {
    for (const [name, value] of Object.entries(options)) {
      this.job = withEngineOption(this.job, name, value);
    }
    return this;
  }

  goOption(key: string, value: string | number): this {
    this.job = withGoOption(this.job, key, value);
    return this;
  }

  timeControl(timeControl: TimeControl): this {
    this.job = withTimeControl(this.job, timeControl);
    return this;
  }

  build(): SearchJob {
    return this.job;
  }
}
