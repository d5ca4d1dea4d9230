/**
 * Progress module exports
 */

export { SearchReporter, type SearchReporterOptions } from './reporter.js';
export {
  describeJob,
  formatConfigDisplay,
  formatDuration,
  formatResultJson,
  formatResultText,
} from './formatters.js';
export type { ColorFn, ColorFunctions } from './types.js';
