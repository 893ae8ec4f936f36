/**
 * Progress reporting exports
 */

export { ProgressReporter, createColorFns } from './reporter.js';
export type { ColorFn, ColorFunctions, ProgressReporterOptions } from './types.js';
