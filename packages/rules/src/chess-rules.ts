import { Chess, SQUARES, type Color, type Square as ChessSquare } from 'chess.js';

import { InvalidFenError, IllegalMoveError, InvalidSquareError } from './errors.js';
import { isPromotionPiece, movesEqual, opposite } from './move.js';
import { parseSquare, type Square } from './square.js';
import type { GameOutcome, Move, PieceKind, RulesEngine, Side } from './types.js';

/**
 * Standard starting position FEN
 */
export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

function toSide(color: Color): Side {
  return color === 'w' ? 'white' : 'black';
}

/**
 * chess.js lists squares from a8 to h1, rank by rank
 */
function toChessSquare(square: Square): ChessSquare {
  const chessSquare = SQUARES[(7 - square.rank) * 8 + square.file];
  if (chessSquare === undefined) {
    throw new InvalidSquareError(`Square out of range: file ${square.file}, rank ${square.rank}`);
  }
  return chessSquare;
}

/**
 * Rules engine backed by chess.js
 *
 * Owns a single game; the position only changes through `apply`, so the
 * move history needed for repetition detection stays intact.
 */
export class ChessRules implements RulesEngine {
  private chess: Chess;

  constructor(fen?: string) {
    if (fen) {
      try {
        this.chess = new Chess(fen);
      } catch {
        throw new InvalidFenError(`Invalid FEN: ${fen}`);
      }
    } else {
      this.chess = new Chess();
    }
  }

  /**
   * Create a game from the standard starting position
   */
  static startingPosition(): ChessRules {
    return new ChessRules();
  }

  /**
   * Create a game from a FEN string
   * @throws InvalidFenError if the FEN is invalid
   */
  static fromFen(fen: string): ChessRules {
    return new ChessRules(fen);
  }

  fen(): string {
    return this.chess.fen();
  }

  sideToMove(): Side {
    return toSide(this.chess.turn());
  }

  legalMoves(): Move[] {
    return this.chess.moves({ verbose: true }).map((m) => {
      const promotion = m.promotion !== undefined && isPromotionPiece(m.promotion) ? m.promotion : undefined;
      return {
        from: parseSquare(m.from),
        to: parseSquare(m.to),
        ...(promotion ? { promotion } : {}),
      };
    });
  }

  apply(move: Move): boolean {
    if (!this.legalMoves().some((legal) => movesEqual(legal, move))) {
      return false;
    }

    const from = toChessSquare(move.from);
    const to = toChessSquare(move.to);
    try {
      this.chess.move(move.promotion ? { from, to, promotion: move.promotion } : { from, to });
    } catch {
      // chess.js throws Error for invalid moves, wrap in our custom error
      throw new IllegalMoveError(`${from}${to}${move.promotion ?? ''}`, this.chess.fen());
    }
    return true;
  }

  result(): GameOutcome | null {
    if (this.chess.isCheckmate()) {
      return { kind: 'checkmate', winner: opposite(this.sideToMove()) };
    }
    if (this.chess.isStalemate()) {
      return { kind: 'stalemate' };
    }
    if (this.chess.isInsufficientMaterial()) {
      return { kind: 'insufficient-material' };
    }
    if (this.chess.isThreefoldRepetition()) {
      return { kind: 'threefold-repetition' };
    }
    // Remaining draw condition is the fifty-move rule
    if (this.chess.isDraw()) {
      return { kind: 'fifty-move-rule' };
    }
    return null;
  }

  pieceAt(square: Square): PieceKind | null {
    const piece = this.chess.get(toChessSquare(square));
    if (!piece) return null;
    return piece.type;
  }

  colorAt(square: Square): Side | null {
    const piece = this.chess.get(toChessSquare(square));
    if (!piece) return null;
    return toSide(piece.color);
  }
}
