/**
 * Shared types for progress reporting
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
 * Options for the progress reporter
 */
export interface ProgressReporterOptions {
  /** Use colors (default: true) */
  color?: boolean;
  /** Print engine protocol traffic */
  debug?: boolean;
  /** Where lines are written (default: console.error) */
  write?: (line: string) => void;
}
