/**
 * Request model exports
 */

export { Positions, type Position, type PositionKind } from './position.js';
export {
  DEFAULT_TIME_CONTROL,
  createTimeControl,
  timeControlSchema,
  type TimeControl,
} from './time-control.js';
export type { SearchJob, SearchResult } from './search.js';
