import { describe, it, expect } from 'vitest';

import { createSearchJob, withEngineOption, withGoOption, withPosition } from '../builders/search-job.js';
import {
  formatGo,
  formatPosition,
  formatSearchResult,
  formatSetOption,
  isBestMoveLine,
  parseBestMove,
  serializeSearchJob,
} from '../protocol/commands.js';
import { Positions } from '../types/position.js';

describe('UCI commands', () => {
  describe('formatSetOption', () => {
    it('should render name and value', () => {
      expect(formatSetOption('Hash', '128')).toBe('setoption name Hash value 128');
    });

    it('should keep option names containing spaces', () => {
      expect(formatSetOption('Skill Level', '5')).toBe('setoption name Skill Level value 5');
    });
  });

  describe('formatPosition', () => {
    const fen = 'rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1';

    it('should format startpos', () => {
      expect(formatPosition(Positions.startpos())).toBe('position startpos');
    });

    it('should format fen', () => {
      expect(formatPosition(Positions.fen(fen))).toBe(`position fen ${fen}`);
    });

    it('should format startpos with moves', () => {
      expect(formatPosition(Positions.startposWithMoves('e2e4 e7e5'))).toBe(
        'position startpos moves e2e4 e7e5',
      );
    });

    it('should format fen with moves', () => {
      expect(formatPosition(Positions.fenWithMoves(fen, ['e7e5', 'g1f3']))).toBe(
        `position fen ${fen} moves e7e5 g1f3`,
      );
    });
  });

  describe('formatGo', () => {
    it('should be a bare go without options', () => {
      expect(formatGo(new Map())).toBe('go');
    });

    it('should append each option as key and value', () => {
      const command = formatGo(
        new Map([
          ['depth', '12'],
          ['movetime', '500'],
        ]),
      );
      expect(command.split(' ')).toHaveLength(5);
      expect(command.startsWith('go ')).toBe(true);
      expect(command).toContain(' depth 12');
      expect(command).toContain(' movetime 500');
    });
  });

  describe('serializeSearchJob', () => {
    it('should emit exactly position startpos then go for an empty job', () => {
      expect(serializeSearchJob(createSearchJob())).toEqual(['position startpos', 'go']);
    });

    it('should send options first, then position, then go', () => {
      let job = withEngineOption(createSearchJob(), 'Threads', '2');
      job = withPosition(job, Positions.startposWithMoves('d2d4'));
      job = withGoOption(job, 'depth', '10');

      expect(serializeSearchJob(job)).toEqual([
        'setoption name Threads value 2',
        'position startpos moves d2d4',
        'go depth 10',
      ]);
    });

    it('should emit one setoption per unique key with the last value', () => {
      let job = withEngineOption(createSearchJob(), 'Hash', '64');
      job = withEngineOption(job, 'Hash', '256');

      const setOptions = serializeSearchJob(job).filter((c) => c.startsWith('setoption'));
      expect(setOptions).toEqual(['setoption name Hash value 256']);
    });
  });

  describe('isBestMoveLine', () => {
    it('should match lines starting with bestmove', () => {
      expect(isBestMoveLine('bestmove e2e4')).toBe(true);
      expect(isBestMoveLine('bestmove (none)')).toBe(true);
    });

    it('should reject other engine output', () => {
      expect(isBestMoveLine('info depth 12 score cp 34 pv e2e4')).toBe(false);
      expect(isBestMoveLine('readyok')).toBe(false);
      expect(isBestMoveLine('bestmov')).toBe(false);
      expect(isBestMoveLine(' bestmove e2e4')).toBe(false);
    });
  });

  describe('parseBestMove', () => {
    it('should parse best move and ponder move', () => {
      expect(parseBestMove('bestmove e2e4 ponder e7e5')).toEqual({
        bestMove: 'e2e4',
        ponder: 'e7e5',
      });
    });

    it('should leave ponder absent when not given', () => {
      const result = parseBestMove('bestmove e2e4');
      expect(result.bestMove).toBe('e2e4');
      expect(result.ponder).toBeUndefined();
    });

    it('should return an empty result for a bare bestmove', () => {
      expect(parseBestMove('bestmove')).toEqual({});
    });

    it('should not validate move tokens', () => {
      expect(parseBestMove('bestmove (none)')).toEqual({ bestMove: '(none)' });
    });

    it('should ignore a dangling ponder keyword', () => {
      expect(parseBestMove('bestmove g1f3 ponder')).toEqual({ bestMove: 'g1f3' });
    });
  });

  describe('formatSearchResult', () => {
    it('should render best move and ponder', () => {
      expect(formatSearchResult({ bestMove: 'e2e4', ponder: 'e7e5' })).toBe(
        'bestmove e2e4 ponder e7e5',
      );
    });

    it('should render a result without ponder', () => {
      expect(formatSearchResult({ bestMove: 'e2e4' })).toBe('bestmove e2e4');
    });

    it('should render an empty result as bare bestmove', () => {
      expect(formatSearchResult({})).toBe('bestmove');
    });
  });
});
