import { spawn } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import type { Readable, Writable } from 'node:stream';

/**
 * The parts of a child process the bridge uses.
 *
 * Emits `spawn`, `error` and `exit` like a `ChildProcess`.
 */
export interface EngineProcess extends EventEmitter {
  readonly stdin: Writable;
  readonly stdout: Readable;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnProcess = (path: string) => EngineProcess;

/**
 * Spawn the engine executable with piped stdin/stdout and no arguments
 */
export const spawnEngineProcess: SpawnProcess = (path) =>
  spawn(path, [], { stdio: ['pipe', 'pipe', 'ignore'] });
