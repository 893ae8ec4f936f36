/**
 * Types shared between the game state machine, the interaction loop and
 * the terminal UI
 */

import type { GameOutcome, PieceKind, PromotionPiece, Side, Square } from '@termchess/rules';

export interface GameOptions {
  /** Side the human plays (default: white) */
  humanSide?: Side;
  /** Piece chosen when a selected destination is a promotion (default: queen) */
  promotionPiece?: PromotionPiece;
}

/**
 * Informal game phase. Selection and the thinking flag are independent;
 * the phase reports whichever one gates input first.
 */
export type GamePhase = 'idle' | 'square-selected' | 'awaiting-engine' | 'game-over';

export interface BoardCell {
  readonly square: Square;
  readonly piece: PieceKind | null;
  readonly color: Side | null;
}

/**
 * Read-only view handed to renderers.
 * Board rows run from the eighth rank down to the first, files a to h.
 */
export interface GameSnapshot {
  readonly fen: string;
  readonly board: ReadonlyArray<ReadonlyArray<BoardCell>>;
  readonly selected: Square | null;
  readonly destinations: readonly Square[];
  readonly message: string;
  readonly thinking: boolean;
  readonly sideToMove: Side;
  readonly humanSide: Side;
  readonly result: GameOutcome | null;
  /** File letter typed while waiting for a rank, if any */
  readonly pendingInput: string | null;
}

export type InputEvent =
  | { type: 'square'; square: Square }
  | { type: 'invalid'; input: string }
  | { type: 'quit' };

/**
 * Source of discrete input events, polled once per tick
 */
export interface InputSource {
  poll(): InputEvent | undefined;
  /** Partially typed square, shown in the status bar */
  pending?(): string | null;
}

export interface Renderer {
  render(snapshot: GameSnapshot): void;
}
