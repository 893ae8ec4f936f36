/**
 * Progress reporter with ora spinners
 *
 * Everything goes to stderr so stdout stays free for `--show-config`.
 */

import type { EngineLogger } from '@termchess/engine';
import chalk from 'chalk';
import ora, { type Color, type Ora } from 'ora';

import type { ColorFunctions, ProgressReporterOptions } from './types.js';

export type { ColorFunctions, ProgressReporterOptions } from './types.js';

// Helper function for colorized output
export function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
    };
  }
  // No colors - return text as-is
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
    cyan: identity,
  };
}

/**
 * Progress reporter for CLI output
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private startTime = 0;
  private readonly useColor: boolean;
  private readonly debug: boolean;
  private readonly write: (line: string) => void;
  private readonly c: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.useColor = options.color ?? true;
    this.debug = options.debug ?? false;
    this.write = options.write ?? ((line: string) => console.error(line));
    this.c = createColorFns(this.useColor);
  }

  /**
   * Print the version header
   */
  printHeader(version: string): void {
    this.write(this.c.bold(`termchess v${version}`));
  }

  /**
   * Start the engine startup spinner
   */
  startEngine(): void {
    this.startTime = Date.now();
    this.spinner?.stop();

    // Build ora options - only include color if colors are enabled
    const oraOptions: { text: string; color?: Color } = { text: 'Starting engine...' };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }
    this.spinner = ora(oraOptions).start();
  }

  /**
   * Mark the engine as started
   */
  engineReady(path: string): void {
    const duration = this.startTime > 0 ? Date.now() - this.startTime : 0;
    const durationStr = duration > 1000 ? this.c.dim(` (${(duration / 1000).toFixed(1)}s)`) : '';
    const text = `Engine ready: ${path}${durationStr}`;

    if (this.spinner) {
      this.spinner.succeed(text);
      this.spinner = null;
    } else {
      this.write(`${this.c.green('✓')} ${text}`);
    }
  }

  /**
   * Mark engine startup as failed
   */
  engineFailed(message: string): void {
    const text = `Engine failed to start: ${message}`;

    if (this.spinner) {
      this.spinner.fail(text);
      this.spinner = null;
    } else {
      this.write(`${this.c.red('✗')} ${text}`);
    }
  }

  /**
   * Display a plain message
   */
  printMessage(message: string): void {
    this.write(message);
  }

  /**
   * Display a warning message
   */
  warn(message: string): void {
    this.write(this.c.yellow(`⚠ ${message}`));
  }

  /**
   * Logger for the engine bridge and the interaction loop.
   * Debug lines are only printed with --debug.
   */
  engineLogger(): EngineLogger {
    return {
      debug: (message: string) => {
        if (this.debug) {
          this.write(this.c.dim(message));
        }
      },
      warn: (message: string) => this.warn(message),
    };
  }

  /**
   * Stop any running spinner
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}
