/**
 * In-process stand-in for a UCI engine child process
 *
 * Structurally matches the EngineProcess interface used by the engine
 * bridge. Types are inlined to avoid a circular dependency with
 * @termchess/engine.
 */

import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';

export interface FakeEngineOptions {
  /** Lines to print in response to each command received */
  respond?: (command: string) => string[];
  /** Destroy stdin as soon as the process spawns */
  brokenInput?: boolean;
  /** Leave stdout open after kill, so late lines can still be printed */
  keepOutputOpenOnKill?: boolean;
}

/**
 * Fake engine process backed by PassThrough streams
 */
export class FakeEngineProcess extends EventEmitter {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  /** Every command line the bridge has written, in order */
  readonly received: string[] = [];
  killed = false;

  private pending = '';

  constructor(private readonly options: FakeEngineOptions = {}) {
    super();
    this.stdin.setEncoding('utf8');
    this.stdin.on('data', (chunk: string) => this.onInput(chunk));
  }

  /**
   * Print a line on the engine's stdout
   */
  emitLine(line: string): void {
    if (!this.stdout.writableEnded) {
      this.stdout.write(`${line}\n`);
    }
  }

  /**
   * Simulate the engine dying on its own
   */
  crash(code = 1): void {
    this.stdout.end();
    this.emit('exit', code, null);
  }

  kill(): boolean {
    if (this.killed) {
      return false;
    }
    this.killed = true;
    if (!this.options.keepOutputOpenOnKill) {
      this.stdout.end();
    }
    this.emit('exit', null, 'SIGTERM');
    return true;
  }

  /**
   * Called by the spawner once listeners are attached
   */
  start(failure?: Error): void {
    if (failure) {
      this.emit('error', failure);
      return;
    }
    if (this.options.brokenInput) {
      this.stdin.destroy();
    }
    this.emit('spawn');
  }

  private onInput(chunk: string): void {
    this.pending += chunk;
    const lines = this.pending.split('\n');
    this.pending = lines.pop() ?? '';
    for (const line of lines) {
      this.received.push(line);
      for (const reply of this.options.respond?.(line) ?? []) {
        this.emitLine(reply);
      }
    }
  }
}

export interface FakeSpawnerOptions extends FakeEngineOptions {
  /** Emit this error instead of `spawn` */
  failWith?: Error;
}

/**
 * Create a spawn function that hands out fake engine processes
 */
export function createFakeSpawner(options: FakeSpawnerOptions = {}) {
  const processes: FakeEngineProcess[] = [];
  const paths: string[] = [];

  const spawn = (path: string): FakeEngineProcess => {
    const child = new FakeEngineProcess(options);
    processes.push(child);
    paths.push(path);
    setImmediate(() => child.start(options.failWith));
    return child;
  };

  return {
    spawn,
    processes,
    paths,
    /** The most recently spawned process */
    get last(): FakeEngineProcess | undefined {
      return processes[processes.length - 1];
    },
  };
}

export type FakeSpawner = ReturnType<typeof createFakeSpawner>;

/**
 * Reply to every `go` command with a fixed best move
 */
export function replyWithBestMove(move: string): (command: string) => string[] {
  return (command) => (command.startsWith('go ') ? [`info depth 1 score cp 20 pv ${move}`, `bestmove ${move}`] : []);
}
