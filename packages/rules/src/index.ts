/**
 * @termchess/rules - Chess rules collaborator for termchess
 *
 * This package handles:
 * - Square coordinates with range validation
 * - Move equality and promotion pieces
 * - Legal move generation, move application and game results (via chess.js)
 */

export const VERSION = '0.1.0';

export type { Side, PieceKind, PromotionPiece, Move, GameOutcome, RulesEngine } from './types.js';
export { PROMOTION_PIECES } from './types.js';

export type { Square, FileLetter } from './square.js';
export {
  FILES,
  makeSquare,
  parseSquare,
  squareName,
  squaresEqual,
  fileIndex,
  rankIndex,
  isLightSquare,
} from './square.js';

export { movesEqual, isPromotionPiece, opposite, formatOutcome } from './move.js';

export { ChessRules, STARTING_FEN } from './chess-rules.js';

export { InvalidSquareError, InvalidFenError, IllegalMoveError } from './errors.js';
