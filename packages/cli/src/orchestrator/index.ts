/**
 * Orchestrator module exports
 */

export { GameLoop, ENGINE_EXITED_MESSAGE, type GameLoopOptions } from './game-loop.js';
export { KeyQueue } from './key-queue.js';
