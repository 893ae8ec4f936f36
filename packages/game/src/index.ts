/**
 * @termchess/game - Game state machine for termchess
 */

export const VERSION = '0.1.0';

export { GameStateMachine, THINKING_MESSAGE, welcomeMessage } from './game-state.js';
export { SquareInput } from './square-input.js';
export type { SquareInputResult, SquareInputState } from './square-input.js';
export type {
  BoardCell,
  GameOptions,
  GamePhase,
  GameSnapshot,
  InputEvent,
  InputSource,
  Renderer,
} from './types.js';
