/**
 * Error classes for engine bridge operations
 */

/**
 * Base error class for engine errors
 */
export class EngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Error thrown when the engine executable cannot be spawned
 */
export class LaunchError extends EngineError {
  constructor(
    public readonly path: string,
    cause?: Error,
  ) {
    super(`Failed to launch engine at ${path}${cause ? `: ${cause.message}` : ''}`, { cause });
    this.name = 'LaunchError';
  }
}

/**
 * Error thrown when a command cannot be written to the engine.
 * The session should be treated as dead once this is raised.
 */
export class ProtocolError extends EngineError {
  constructor(
    public readonly command: string,
    cause?: Error,
  ) {
    super(`Failed to send "${command}" to engine${cause ? `: ${cause.message}` : ''}`, { cause });
    this.name = 'ProtocolError';
  }
}

/**
 * Error thrown when an operation is not allowed in the bridge's current state
 */
export class EngineStateError extends ProtocolError {
  constructor(
    operation: string,
    public readonly state: string,
  ) {
    super(operation, new Error(`engine bridge is ${state}`));
    this.name = 'EngineStateError';
  }
}

/**
 * Normalise an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
