/**
 * Error formatting tests
 */

import { LaunchError, ProtocolError } from '@termchess/engine';
import chalk from 'chalk';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { ConfigValidationError } from '../config/validation.js';
import { CliError, ConfigError, EngineStartError } from '../errors/cli-errors.js';
import { createEngineStartError, formatError } from '../errors/handler.js';

describe('CliError', () => {
  it('should format message and suggestion', () => {
    const error = new ConfigError('Bad config', 'Fix it');
    expect(error.format()).toBe('Error: Bad config\n\nSuggestion: Fix it');
    expect(error.exitCode).toBe(1);
  });

  it('should format without a suggestion', () => {
    expect(new CliError('Broken').format()).toBe('Error: Broken');
  });
});

describe('createEngineStartError', () => {
  it('should suggest checking the path for launch failures', () => {
    const error = createEngineStartError(
      '/missing/engine',
      new LaunchError('/missing/engine', new Error('spawn /missing/engine ENOENT')),
    );
    expect(error).toBeInstanceOf(EngineStartError);
    expect(error.exitCode).toBe(2);
    expect(error.format()).toBe(
      [
        'Error [engine /missing/engine]: Failed to launch engine at /missing/engine: spawn /missing/engine ENOENT',
        '',
        'Suggestion: Check the engine path with --engine or TERMCHESS_ENGINE_PATH',
      ].join('\n'),
    );
  });

  it('should suggest a UCI engine for handshake failures', () => {
    const error = createEngineStartError('/bin/cat', new ProtocolError('uci', new Error('EPIPE')));
    expect(error.suggestion).toBe('Check that the program is a UCI engine');
  });
});

describe('formatError', () => {
  let level: typeof chalk.level;

  beforeEach(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterEach(() => {
    chalk.level = level;
  });

  it('should format CLI errors', () => {
    expect(formatError(new ConfigError('Bad config'))).toBe('Error: Bad config');
  });

  it('should format validation errors', () => {
    const error = new ConfigValidationError([{ path: 'ui.tickMs', message: 'Too small' }]);
    expect(formatError(error)).toBe(error.format());
  });

  it('should format plain errors and other values', () => {
    expect(formatError(new Error('boom'))).toBe('Error: boom');
    expect(formatError('boom')).toBe('Error: boom');
  });
});
