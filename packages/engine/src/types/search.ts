/**
 * Search request and result types
 */

import type { Position } from './position.js';

/**
 * Everything needed for one search: engine options, position, go limits
 *
 * Both maps have unique keys and are unordered as far as the protocol is
 * concerned; the engine accepts options in any order.
 */
export interface SearchJob {
  /** Engine options sent as `setoption name <key> value <value>` */
  engineOptions: ReadonlyMap<string, string>;
  /** Position sent before searching */
  position: Position;
  /** Search limits appended to `go` (e.g. depth, movetime, wtime) */
  goOptions: ReadonlyMap<string, string>;
}

/**
 * Outcome of a search as reported by the `bestmove` line
 */
export interface SearchResult {
  /** Move chosen by the engine, if any */
  bestMove?: string;
  /** Expected reply the engine would ponder on, if any */
  ponder?: string;
}
