/**
 * Shared types for progress reporter components
 */

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  green: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
  cyan: ColorFn;
}

/**
 * Search reporter options
 */
export interface SearchReporterOptions {
  /** Print nothing (tests, --json piping) */
  silent?: boolean;
  /** Colored output (default: true) */
  color?: boolean;
  /** Show engine traffic (default: false) */
  verbose?: boolean;
}
