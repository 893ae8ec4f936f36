/**
 * Engine bridge: owns a UCI engine child process
 */

import * as readline from 'node:readline';
import type { Readable } from 'node:stream';

import { EngineStateError, LaunchError, ProtocolError, toError } from '../errors.js';
import {
  QUIT,
  goMoveTimeCommand,
  handshakeCommands,
  parseBestMove,
  positionCommand,
  type HandshakeSettings,
} from '../uci/commands.js';

import { spawnEngineProcess, type EngineProcess, type SpawnProcess } from './engine-process.js';
import { MoveChannel } from './move-channel.js';

/**
 * Configuration for an engine bridge
 */
export interface EngineConfig extends HandshakeSettings {
  /** Path to the engine executable */
  path: string;
  /** Think time per move in milliseconds */
  moveTimeMs: number;
}

/**
 * Default engine configuration
 */
export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  path: '/usr/games/stockfish',
  skillLevel: 10,
  threads: 4,
  hashMb: 128,
  moveTimeMs: 2000,
};

/**
 * Sink for protocol traffic and listener events
 */
export interface EngineLogger {
  debug(message: string): void;
  warn(message: string): void;
}

const SILENT_LOGGER: EngineLogger = {
  debug: () => undefined,
  warn: () => undefined,
};

export interface EngineBridgeOptions extends Partial<EngineConfig> {
  logger?: EngineLogger;
  /** Process factory, replaced in tests */
  spawnProcess?: SpawnProcess;
}

export type BridgeState = 'not-started' | 'running' | 'stopped';

export interface EngineHealth {
  state: BridgeState;
  /** Whether the output listener is still reading */
  listening: boolean;
  /** Whether the process has exited */
  exited: boolean;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * What the interaction loop needs from an engine
 */
export interface EngineClient {
  requestMove(fen: string): Promise<void>;
  pollMove(): string | undefined;
  health(): EngineHealth;
  stop(): void;
}

function waitForSpawn(child: EngineProcess, path: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = (): void => {
      child.off('error', onError);
      resolve();
    };
    const onError = (err: Error): void => {
      child.off('spawn', onSpawn);
      reject(new LaunchError(path, err));
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

/**
 * Bridge to an external UCI engine.
 *
 * Lifecycle is `not-started -> running -> stopped`; a stopped bridge cannot
 * be restarted. The engine's stdout belongs to a readline listener for the
 * life of the process; `bestmove` replies are queued on a move channel and
 * picked up with `pollMove`, so the caller never waits on the engine.
 */
export class EngineBridge implements EngineClient {
  private readonly config: EngineConfig;
  private readonly logger: EngineLogger;
  private readonly spawnProcess: SpawnProcess;
  private readonly channel = new MoveChannel();

  private state: BridgeState = 'not-started';
  private process: EngineProcess | null = null;
  private lines: readline.Interface | null = null;
  private listening = false;
  private exited = false;
  private exitCode: number | null = null;
  private exitSignal: NodeJS.Signals | null = null;

  constructor(options: EngineBridgeOptions = {}) {
    this.config = {
      path: options.path ?? DEFAULT_ENGINE_CONFIG.path,
      skillLevel: options.skillLevel ?? DEFAULT_ENGINE_CONFIG.skillLevel,
      threads: options.threads ?? DEFAULT_ENGINE_CONFIG.threads,
      hashMb: options.hashMb ?? DEFAULT_ENGINE_CONFIG.hashMb,
      moveTimeMs: options.moveTimeMs ?? DEFAULT_ENGINE_CONFIG.moveTimeMs,
    };
    this.logger = options.logger ?? SILENT_LOGGER;
    this.spawnProcess = options.spawnProcess ?? spawnEngineProcess;
  }

  get path(): string {
    return this.config.path;
  }

  get currentState(): BridgeState {
    return this.state;
  }

  /**
   * Spawn the engine, attach the output listener and send the handshake.
   * A `stop` that lands before the handshake is written kills the child and
   * rejects the start; the bridge never returns to running.
   * @throws LaunchError if the executable cannot be spawned
   * @throws ProtocolError if a handshake line cannot be written
   * @throws EngineStateError if the bridge was stopped while starting
   */
  async start(): Promise<void> {
    if (this.state !== 'not-started') {
      throw new EngineStateError('start', this.state);
    }

    const { path } = this.config;
    let child: EngineProcess;
    try {
      child = this.spawnProcess(path);
    } catch (err) {
      this.state = 'stopped';
      throw new LaunchError(path, toError(err));
    }

    // Visible to stop() while the spawn is pending
    this.process = child;
    child.stdin.on('error', (err: Error) => {
      this.logger.warn(`Engine input error: ${err.message}`);
    });

    try {
      await waitForSpawn(child, path);
    } catch (err) {
      this.process = null;
      this.state = 'stopped';
      throw err;
    }

    if (this.isStopped()) {
      throw new EngineStateError('start', 'stopped');
    }

    this.state = 'running';
    this.logger.debug(`Engine started: ${path}`);

    child.on('error', (err: Error) => {
      this.logger.warn(`Engine process error: ${err.message}`);
    });
    child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      this.exited = true;
      this.exitCode = code;
      this.exitSignal = signal;
      this.logger.debug(`Engine exited (code ${code ?? 'none'}, signal ${signal ?? 'none'})`);
    });

    this.listen(child.stdout);

    // send() rejects with EngineStateError once stop() has run
    for (const command of handshakeCommands(this.config)) {
      await this.send(command);
    }
  }

  /**
   * Send the position and start a timed search. Resolves once both lines
   * are written; the reply arrives later through `pollMove`.
   * @throws ProtocolError if either line cannot be written
   */
  async requestMove(fen: string): Promise<void> {
    await this.send(positionCommand(fen));
    await this.send(goMoveTimeCommand(this.config.moveTimeMs));
  }

  /**
   * Next queued best move, or undefined if none has arrived
   */
  pollMove(): string | undefined {
    return this.channel.tryReceive();
  }

  health(): EngineHealth {
    return {
      state: this.state,
      listening: this.listening,
      exited: this.exited,
      exitCode: this.exitCode,
      signal: this.exitSignal,
    };
  }

  /**
   * Ask the engine to quit, then kill it. Never throws; safe to call more
   * than once and after the process has died. Replies still in flight are
   * discarded.
   */
  stop(): void {
    if (this.state === 'stopped') {
      return;
    }
    this.state = 'stopped';

    this.channel.close();
    this.lines?.close();
    this.lines = null;

    const child = this.process;
    this.process = null;
    if (!child) {
      return;
    }

    try {
      if (child.stdin.writable) {
        child.stdin.write(`${QUIT}\n`);
        child.stdin.end();
      }
    } catch (err) {
      this.logger.debug(`Could not send quit: ${toError(err).message}`);
    }

    try {
      child.kill();
    } catch (err) {
      this.logger.debug(`Could not kill engine: ${toError(err).message}`);
    }
  }

  private isStopped(): boolean {
    return this.state === 'stopped';
  }

  private listen(stdout: Readable): void {
    const lines = readline.createInterface({ input: stdout, crlfDelay: Infinity });
    this.listening = true;

    lines.on('line', (line: string) => {
      this.logger.debug(`← ${line}`);
      const move = parseBestMove(line);
      if (move !== null) {
        // Dropped once the channel is closed
        this.channel.send(move);
      }
    });
    lines.on('close', () => {
      this.listening = false;
      this.logger.debug('Engine output closed');
    });

    this.lines = lines;
  }

  private send(command: string): Promise<void> {
    const stdin = this.process?.stdin;
    if (this.state !== 'running' || !stdin) {
      return Promise.reject(new EngineStateError(command, this.state));
    }
    if (!stdin.writable) {
      return Promise.reject(new ProtocolError(command, new Error('engine input is closed')));
    }

    this.logger.debug(`→ ${command}`);
    return new Promise((resolve, reject) => {
      stdin.write(`${command}\n`, (err) => {
        if (err) {
          reject(new ProtocolError(command, err));
        } else {
          resolve();
        }
      });
    });
  }
}
