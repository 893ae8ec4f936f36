import { squaresEqual } from './square.js';
import { PROMOTION_PIECES, type GameOutcome, type Move, type PromotionPiece, type Side } from './types.js';

/**
 * Moves are equal when source, destination and promotion all match
 */
export function movesEqual(a: Move, b: Move): boolean {
  return squaresEqual(a.from, b.from) && squaresEqual(a.to, b.to) && a.promotion === b.promotion;
}

export function isPromotionPiece(value: string): value is PromotionPiece {
  return PROMOTION_PIECES.some((piece) => piece === value);
}

export function opposite(side: Side): Side {
  return side === 'white' ? 'black' : 'white';
}

/**
 * Human-readable description of a game outcome (e.g. "checkmate, White wins")
 */
export function formatOutcome(outcome: GameOutcome): string {
  switch (outcome.kind) {
    case 'checkmate':
      return `checkmate, ${outcome.winner === 'white' ? 'White' : 'Black'} wins`;
    case 'stalemate':
      return 'draw by stalemate';
    case 'insufficient-material':
      return 'draw by insufficient material';
    case 'threefold-repetition':
      return 'draw by threefold repetition';
    case 'fifty-move-rule':
      return 'draw by the fifty-move rule';
  }
}
