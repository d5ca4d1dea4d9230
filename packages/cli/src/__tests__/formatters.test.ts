/**
 * Output formatter tests
 */

import { Positions, SearchJobBuilder } from '@ucibridge/engine';
import chalk from 'chalk';
import { describe, it, expect, beforeAll } from 'vitest';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import {
  describeJob,
  formatConfigDisplay,
  formatDuration,
  formatResultJson,
  formatResultText,
} from '../progress/formatters.js';

beforeAll(() => {
  chalk.level = 0;
});

describe('formatResultText', () => {
  it('should print best move and ponder move', () => {
    expect(formatResultText({ bestMove: 'e2e4', ponder: 'e7e5' })).toBe(
      'bestmove e2e4 ponder e7e5',
    );
  });

  it('should print the bare keyword for an empty result', () => {
    expect(formatResultText({})).toBe('bestmove');
  });
});

describe('formatResultJson', () => {
  it('should use null for absent moves', () => {
    expect(formatResultJson({ bestMove: 'e2e4' })).toBe('{"bestMove":"e2e4","ponder":null}');
    expect(formatResultJson({})).toBe('{"bestMove":null,"ponder":null}');
  });
});

describe('describeJob', () => {
  it('should show the position and go commands', () => {
    const job = new SearchJobBuilder()
      .position(Positions.fen('4k3/8/8/8/8/8/8/4K3 w - - 0 1'))
      .goOption('depth', 3)
      .build();

    expect(describeJob(job)).toBe('position fen 4k3/8/8/8/8/8/8/4K3 w - - 0 1, go depth 3');
  });
});

describe('formatDuration', () => {
  it('should format milliseconds', () => {
    expect(formatDuration(500)).toBe('500ms');
  });

  it('should format seconds', () => {
    expect(formatDuration(1500)).toBe('1.5s');
  });

  it('should format minutes', () => {
    expect(formatDuration(90000)).toBe('1m 30s');
  });
});

describe('formatConfigDisplay', () => {
  it('should show defaults', () => {
    expect(formatConfigDisplay(DEFAULT_CONFIG).split('\n')).toEqual([
      'Configuration:',
      '',
      'Engine:',
      '  Path: not set',
      '  Shutdown timeout: 1.0s',
      '  Stderr: inherit',
      '',
      'Search:',
      '  (engine defaults)',
      '',
      'Output:',
      '  Format: text',
      '  Verbose: no',
      '  Color: yes',
    ]);
  });

  it('should list engine options and search limits', () => {
    const lines = formatConfigDisplay({
      ...DEFAULT_CONFIG,
      engine: { ...DEFAULT_CONFIG.engine, path: './sf', options: { Hash: '64' } },
      search: { depth: 18, timeControl: { wtime: 1000, binc: 5 } },
    }).split('\n');

    expect(lines).toContain('  Path: ./sf');
    expect(lines).toContain('    Hash = 64');
    expect(lines).toContain('  Depth: 18');
    expect(lines).toContain('  Time control: wtime 1000, binc 5');
    expect(lines).not.toContain('  (engine defaults)');
  });
});
