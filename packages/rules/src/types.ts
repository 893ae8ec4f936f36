/**
 * Shared rules types
 */

import type { Square } from './square.js';

export type Side = 'white' | 'black';

/**
 * Piece letters as used in FEN, lowercase
 */
export type PieceKind = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/**
 * Pieces a pawn may promote to
 */
export type PromotionPiece = 'q' | 'r' | 'b' | 'n';

export const PROMOTION_PIECES: readonly PromotionPiece[] = ['q', 'r', 'b', 'n'];

/**
 * A move as produced by the rules engine
 */
export interface Move {
  readonly from: Square;
  readonly to: Square;
  readonly promotion?: PromotionPiece | undefined;
}

/**
 * Terminal result of a game
 */
export type GameOutcome =
  | { kind: 'checkmate'; winner: Side }
  | { kind: 'stalemate' }
  | { kind: 'insufficient-material' }
  | { kind: 'threefold-repetition' }
  | { kind: 'fifty-move-rule' };

/**
 * The rules collaborator consumed by the game state machine.
 *
 * Implementations own the current position; it only changes through
 * `apply`.
 */
export interface RulesEngine {
  /** Current position as FEN */
  fen(): string;
  sideToMove(): Side;
  /** Legal moves from the current position, in generation order */
  legalMoves(): Move[];
  /** Apply a move; returns false and leaves the position untouched if it is not legal */
  apply(move: Move): boolean;
  /** Terminal result, or null while the game continues */
  result(): GameOutcome | null;
  pieceAt(square: Square): PieceKind | null;
  colorAt(square: Square): Side | null;
}
