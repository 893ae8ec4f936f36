/**
 * Error module exports
 */

export { CliError, ConfigError, EngineStartError, resolveAbsolutePath } from './cli-errors.js';

export { formatError, handleError, createEngineStartError } from './handler.js';
