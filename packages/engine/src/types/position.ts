/**
 * Board position setup sent with the `position` command
 * Moves are a space-separated list of UCI move tokens (e.g. "e2e4 e7e5")
 */
export type Position =
  | { kind: 'fen'; fen: string }
  | { kind: 'fenAndMoves'; fen: string; moves: string }
  | { kind: 'startpos' }
  | { kind: 'startposAndMoves'; moves: string };

export type PositionKind = Position['kind'];

function joinMoves(moves: string | readonly string[]): string {
  return typeof moves === 'string' ? moves : moves.join(' ');
}

/**
 * Constructors for each position variant
 */
export const Positions = {
  startpos(): Position {
    return { kind: 'startpos' };
  },

  fen(fen: string): Position {
    return { kind: 'fen', fen };
  },

  startposWithMoves(moves: string | readonly string[]): Position {
    return { kind: 'startposAndMoves', moves: joinMoves(moves) };
  },

  fenWithMoves(fen: string, moves: string | readonly string[]): Position {
    return { kind: 'fenAndMoves', fen, moves: joinMoves(moves) };
  },
} as const;
