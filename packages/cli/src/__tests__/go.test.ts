/**
 * Go command tests
 *
 * The engine is an in-process mock; no executable is launched.
 */

import { fileURLToPath } from 'node:url';

import { Positions, serializeSearchJob } from '@ucibridge/engine';
import { createMockEngine } from '@ucibridge/test-utils';
import { describe, it, expect } from 'vitest';

import { buildSearchJob, resolvePosition, runGo } from '../commands/go.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { UcibridgeConfig } from '../config/schema.js';
import { ConfigError, EngineError, InputError } from '../errors/cli-errors.js';
import { SearchReporter } from '../progress/reporter.js';

const EMPTY_RC_FILE = fileURLToPath(new URL('./fixtures/empty-rc.json', import.meta.url));

function captureOutput(): { chunks: string[]; write(chunk: string): void } {
  const chunks: string[] = [];
  return {
    chunks,
    write(chunk: string) {
      chunks.push(chunk);
    },
  };
}

const silentReporter = (): SearchReporter => new SearchReporter({ silent: true });

describe('resolvePosition', () => {
  it('should default to the start position', () => {
    expect(resolvePosition({})).toEqual(Positions.startpos());
  });

  it('should normalize whitespace between moves', () => {
    expect(resolvePosition({ moves: ' e2e4   e7e5 ' })).toEqual({
      kind: 'startposAndMoves',
      moves: 'e2e4 e7e5',
    });
  });

  it('should use the FEN when given', () => {
    expect(resolvePosition({ fen: '4k3/8/8/8/8/8/8/4K3 w - - 0 1' })).toEqual({
      kind: 'fen',
      fen: '4k3/8/8/8/8/8/8/4K3 w - - 0 1',
    });
  });

  it('should combine FEN and moves', () => {
    expect(resolvePosition({ fen: '4k3/8/8/8/8/8/8/4K3 w - - 0 1', moves: 'e1e2' })).toEqual({
      kind: 'fenAndMoves',
      fen: '4k3/8/8/8/8/8/8/4K3 w - - 0 1',
      moves: 'e1e2',
    });
  });

  it('should treat empty moves as none', () => {
    expect(resolvePosition({ moves: '  ' })).toEqual(Positions.startpos());
  });

  it('should reject a blank FEN', () => {
    expect(() => resolvePosition({ fen: '  ' })).toThrow(InputError);
  });
});

describe('buildSearchJob', () => {
  const config: UcibridgeConfig = {
    ...DEFAULT_CONFIG,
    engine: { ...DEFAULT_CONFIG.engine, options: { Hash: '64', Threads: '2' } },
    search: { depth: 12, timeControl: { wtime: 30000 } },
  };

  it('should send configured options, the position and the limits', () => {
    const job = buildSearchJob(config, { moves: 'e2e4' });

    expect(serializeSearchJob(job)).toEqual([
      'setoption name Hash value 64',
      'setoption name Threads value 2',
      'position startpos moves e2e4',
      'go wtime 30000 winc 0 btime 60000 binc 0 depth 12',
    ]);
  });

  it('should apply --param entries last', () => {
    const job = buildSearchJob(config, { param: ['depth=5', 'mate=3'] });

    expect(job.goOptions.get('depth')).toBe('5');
    expect(job.goOptions.get('mate')).toBe('3');
    expect(serializeSearchJob(job).at(-1)).toBe(
      'go wtime 30000 winc 0 btime 60000 binc 0 depth 5 mate 3',
    );
  });

  it('should produce a bare go with no limits', () => {
    const job = buildSearchJob(DEFAULT_CONFIG, {});
    expect(serializeSearchJob(job)).toEqual(['position startpos', 'go']);
  });

  it('should include movetime and nodes', () => {
    const job = buildSearchJob({ ...DEFAULT_CONFIG, search: { movetime: 250, nodes: 10000 } }, {});
    expect(serializeSearchJob(job)).toEqual(['position startpos', 'go movetime 250 nodes 10000']);
  });
});

describe('runGo', () => {
  it('should run one search and print the result line', async () => {
    const { engine, spawn } = createMockEngine({ bestMoves: ['bestmove g1f3 ponder d7d5'] });
    const stdout = captureOutput();

    const result = await runGo(
      { engine: './mock-engine', depth: 8, config: EMPTY_RC_FILE },
      { spawn, stdout, reporter: silentReporter(), env: {} },
    );

    expect(result).toEqual({ bestMove: 'g1f3', ponder: 'd7d5' });
    expect(stdout.chunks).toEqual(['bestmove g1f3 ponder d7d5\n']);
    expect(spawn).toHaveBeenCalledWith('./mock-engine', [], {
      stdio: ['pipe', 'pipe', 'inherit'],
    });
    expect(engine.commands).toEqual(['position startpos', 'go depth 8', 'quit']);
    expect(engine.hasExited).toBe(true);
  });

  it('should send engine options before the position', async () => {
    const { engine, spawn } = createMockEngine();

    await runGo(
      {
        engine: './mock-engine',
        option: ['Skill Level=5'],
        fen: '4k3/8/8/8/8/8/8/4K3 w - - 0 1',
        param: ['movetime=100'],
        config: EMPTY_RC_FILE,
      },
      { spawn, stdout: captureOutput(), reporter: silentReporter(), env: {} },
    );

    expect(engine.commands).toEqual([
      'setoption name Skill Level value 5',
      'position fen 4k3/8/8/8/8/8/8/4K3 w - - 0 1',
      'go movetime 100',
      'quit',
    ]);
  });

  it('should print JSON when asked', async () => {
    const { spawn } = createMockEngine({ bestMoves: ['bestmove e2e4'] });
    const stdout = captureOutput();

    await runGo(
      { engine: './mock-engine', json: true, config: EMPTY_RC_FILE },
      { spawn, stdout, reporter: silentReporter(), env: {} },
    );

    expect(stdout.chunks).toEqual(['{"bestMove":"e2e4","ponder":null}\n']);
  });

  it('should take the engine path from the environment', async () => {
    const { spawn } = createMockEngine();

    await runGo(
      { config: EMPTY_RC_FILE },
      {
        spawn,
        stdout: captureOutput(),
        reporter: silentReporter(),
        env: { UCIBRIDGE_ENGINE_PATH: './env-engine' },
      },
    );

    expect(spawn).toHaveBeenCalledWith('./env-engine', [], {
      stdio: ['pipe', 'pipe', 'inherit'],
    });
  });

  it('should show the configuration without starting the engine', async () => {
    const { spawn } = createMockEngine();
    const stdout = captureOutput();

    const result = await runGo(
      { engine: './mock-engine', showConfig: true, config: EMPTY_RC_FILE },
      { spawn, stdout, reporter: silentReporter(), env: {} },
    );

    expect(result).toBeNull();
    expect(spawn).not.toHaveBeenCalled();
    expect(stdout.chunks).toHaveLength(1);
    expect(stdout.chunks[0]).toContain('  Path: ./mock-engine\n');
    expect(stdout.chunks[0]).toContain('Raw configuration:\n{\n  "engine": {');
  });

  it('should fail without an engine path', async () => {
    const { spawn } = createMockEngine();

    await expect(
      runGo(
        { config: EMPTY_RC_FILE },
        { spawn, stdout: captureOutput(), reporter: silentReporter(), env: {} },
      ),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(spawn).not.toHaveBeenCalled();
  });

  it('should report a spawn failure as an engine error', async () => {
    const { spawn } = createMockEngine({ spawnError: new Error('spawn ./missing ENOENT') });

    const running = runGo(
      { engine: './missing', config: EMPTY_RC_FILE },
      { spawn, stdout: captureOutput(), reporter: silentReporter(), env: {} },
    );

    await expect(running).rejects.toBeInstanceOf(EngineError);
    await expect(running).rejects.toMatchObject({
      enginePath: './missing',
      message: "Failed to spawn engine './missing': spawn ./missing ENOENT",
    });
  });

  it('should report an engine that exits mid-search and still clean up', async () => {
    const { engine, spawn } = createMockEngine({ exitOnGo: 1 });
    const stdout = captureOutput();

    await expect(
      runGo(
        { engine: './mock-engine', config: EMPTY_RC_FILE },
        { spawn, stdout, reporter: silentReporter(), env: {} },
      ),
    ).rejects.toBeInstanceOf(EngineError);

    expect(stdout.chunks).toEqual([]);
    expect(engine.hasExited).toBe(true);
    expect(engine.commandsStartingWith('quit')).toEqual([]);
  });
});
