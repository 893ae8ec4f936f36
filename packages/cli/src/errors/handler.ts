/**
 * Error handling utilities
 */

import { LaunchError, toError } from '@termchess/engine';
import chalk from 'chalk';

import { ConfigValidationError } from '../config/validation.js';

import { CliError, EngineStartError } from './cli-errors.js';

/**
 * Format and display an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigValidationError) {
    return chalk.red(error.format());
  }

  if (error instanceof CliError) {
    return chalk.red(error.format());
  }

  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`);
  }

  return chalk.red(`Error: ${String(error)}`);
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown): never {
  console.error(formatError(error));

  let exitCode = 1;
  if (error instanceof CliError) {
    exitCode = error.exitCode;
  }

  process.exit(exitCode);
}

/**
 * Wrap an engine startup failure with a helpful suggestion
 */
export function createEngineStartError(enginePath: string, error: unknown): EngineStartError {
  const cause = toError(error);
  const suggestion =
    error instanceof LaunchError
      ? 'Check the engine path with --engine or TERMCHESS_ENGINE_PATH'
      : 'Check that the program is a UCI engine';
  return new EngineStartError(enginePath, cause.message, suggestion);
}
