/**
 * Interaction loop
 *
 * Drives one game: drains the engine's replies, forwards the human's input
 * to the game state machine, asks the engine for a move when it is its
 * turn, and hands a snapshot to the renderer. Each tick runs to completion
 * before the next one starts.
 */

import { setTimeout as sleep } from 'node:timers/promises';

import { toError, type EngineClient, type EngineLogger } from '@termchess/engine';
import type { GameStateMachine, InputSource, Renderer } from '@termchess/game';
import { formatOutcome } from '@termchess/rules';

export const ENGINE_EXITED_MESSAGE = 'Engine process exited';

export interface GameLoopOptions {
  /** Delay between ticks (ms) */
  tickMs: number;
  logger?: Pick<EngineLogger, 'warn'>;
}

export class GameLoop {
  private readonly tickMs: number;
  private readonly logger: Pick<EngineLogger, 'warn'> | undefined;

  private engineFailed = false;
  private exitReported = false;
  private stopped = false;

  constructor(
    private readonly game: GameStateMachine,
    private readonly engine: EngineClient,
    private readonly input: InputSource,
    private readonly renderer: Renderer,
    options: GameLoopOptions,
  ) {
    this.tickMs = options.tickMs;
    this.logger = options.logger;
  }

  /**
   * Whether the engine can no longer be asked for moves
   */
  get hasEngineFailed(): boolean {
    return this.engineFailed;
  }

  /**
   * Run one tick.
   *
   * A reply that is not legal in the current position is dropped with a
   * warning and the thinking flag stays set: the loop keeps waiting for
   * another reply and never repeats the request. Quitting still works.
   * @returns false once the human has asked to quit
   */
  async tick(): Promise<boolean> {
    // Engine replies first so they are never starved by input
    const notation = this.engine.pollMove();
    if (notation !== undefined) {
      if (this.game.applyEngineMove(notation)) {
        this.checkGameOver();
      } else {
        this.logger?.warn(`Discarded engine move that is not legal here: ${notation} (still waiting, q quits)`);
      }
    }

    const event = this.input.poll();
    if (event?.type === 'quit') {
      return false;
    }
    if (event && this.acceptsInput()) {
      if (event.type === 'square') {
        if (this.game.select(event.square)) {
          this.checkGameOver();
        }
      } else {
        this.game.setMessage(`Invalid square: ${event.input}`);
      }
    }

    if (this.shouldRequestMove()) {
      this.game.setThinking(true);
      try {
        await this.engine.requestMove(this.game.fen());
      } catch (error) {
        const message = toError(error).message;
        this.engineFailed = true;
        this.game.setThinking(false);
        this.game.setMessage(`Engine error: ${message}`);
        this.logger?.warn(`Engine request failed: ${message}`);
      }
    }

    this.checkEngineAlive();

    this.renderer.render(this.game.snapshot(this.input.pending?.() ?? null));
    return true;
  }

  /**
   * Tick until the human quits or `stop` is called
   */
  async run(): Promise<void> {
    this.stopped = false;
    while (!this.stopped && (await this.tick())) {
      await sleep(this.tickMs);
    }
  }

  stop(): void {
    this.stopped = true;
  }

  private acceptsInput(): boolean {
    return this.game.isHumanTurn() && !this.game.isThinking && this.game.gameResult() === null;
  }

  private shouldRequestMove(): boolean {
    return (
      !this.engineFailed &&
      !this.game.isThinking &&
      this.game.sideToMove() === this.game.engineSide &&
      this.game.gameResult() === null
    );
  }

  private checkGameOver(): void {
    const result = this.game.gameResult();
    if (result) {
      this.game.setMessage(`Game over: ${formatOutcome(result)}`);
    }
  }

  private checkEngineAlive(): void {
    if (this.exitReported || !this.game.isThinking) {
      return;
    }
    const health = this.engine.health();
    if (health.exited || !health.listening) {
      this.exitReported = true;
      this.engineFailed = true;
      this.game.setThinking(false);
      this.game.setMessage(ENGINE_EXITED_MESSAGE);
      this.logger?.warn(`Engine exited while thinking (code ${health.exitCode ?? 'none'})`);
    }
  }
}
