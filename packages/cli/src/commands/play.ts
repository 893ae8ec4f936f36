/**
 * Play command implementation
 */

import { EngineBridge, toError } from '@termchess/engine';
import { GameStateMachine } from '@termchess/game';
import { ChessRules } from '@termchess/rules';
import { render } from 'ink';
import React from 'react';

import { parseCliOptions, VERSION } from '../cli.js';
import { formatConfig, loadConfig } from '../config/loader.js';
import { CliError, createEngineStartError, handleError } from '../errors/index.js';
import { GameLoop } from '../orchestrator/game-loop.js';
import { KeyQueue } from '../orchestrator/key-queue.js';
import { ProgressReporter } from '../progress/reporter.js';
import { App } from '../ui/App.js';
import { renderBoardText } from '../ui/board-format.js';
import { storeRenderer } from '../ui/store.js';

/**
 * Main play command handler
 */
export async function playCommand(rawOptions: Record<string, unknown>): Promise<void> {
  let reporter = new ProgressReporter();
  let bridge: EngineBridge | null = null;

  try {
    const options = parseCliOptions(rawOptions);
    reporter = new ProgressReporter({ color: !options.noColor, debug: options.debug ?? false });

    // Load configuration
    const config = await loadConfig(options);

    // Show config and exit if requested
    if (options.showConfig) {
      console.log(formatConfig(config));
      return;
    }

    // Raw key input needs a terminal
    if (!process.stdin.isTTY) {
      throw new CliError(
        'termchess needs an interactive terminal',
        'Run it directly in a terminal rather than through a pipe',
      );
    }

    reporter.printHeader(VERSION);

    const logger = reporter.engineLogger();
    const engine = new EngineBridge({ ...config.engine, logger });
    bridge = engine;
    process.once('exit', () => engine.stop());

    reporter.startEngine();
    try {
      await engine.start();
    } catch (error) {
      reporter.engineFailed(toError(error).message);
      throw createEngineStartError(config.engine.path, error);
    }
    reporter.engineReady(config.engine.path);

    const game = new GameStateMachine(new ChessRules(config.game.startFen), {
      humanSide: config.game.humanSide,
      promotionPiece: config.game.promotionPiece,
    });
    const keys = new KeyQueue();
    const loop = new GameLoop(game, engine, keys, storeRenderer, {
      tickMs: config.ui.tickMs,
      logger,
    });

    process.once('SIGTERM', () => loop.stop());

    const app = render(React.createElement(App, { keys, color: config.ui.color }), {
      exitOnCtrlC: false,
    });

    try {
      await loop.run();
    } finally {
      app.unmount();
      engine.stop();
    }

    // Leave the final position on screen
    const final = game.snapshot();
    reporter.printMessage(renderBoardText(final));
    reporter.printMessage(final.message);
  } catch (error) {
    reporter.stop();
    bridge?.stop();
    handleError(error);
  }
}
