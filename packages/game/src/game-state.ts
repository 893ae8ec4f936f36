/**
 * Game State Machine
 *
 * Holds the selection, the cached legal moves for the selected square, the
 * status message and the engine thinking flag. The position itself lives in
 * the rules engine and only changes through `select` or `applyEngineMove`.
 */

import { decodeMove, encodeMove } from '@termchess/engine';
import {
  FILES,
  makeSquare,
  opposite,
  squaresEqual,
  type GameOutcome,
  type Move,
  type PromotionPiece,
  type RulesEngine,
  type Side,
  type Square,
} from '@termchess/rules';

import type { BoardCell, GameOptions, GamePhase, GameSnapshot } from './types.js';

export const THINKING_MESSAGE = 'Engine is thinking...';

function sideLabel(side: Side): string {
  return side === 'white' ? 'White' : 'Black';
}

export function welcomeMessage(humanSide: Side): string {
  return `Welcome! You play as ${sideLabel(humanSide)}.`;
}

export class GameStateMachine {
  readonly humanSide: Side;
  readonly promotionPiece: PromotionPiece;

  private selected: Square | null = null;
  private moves: Move[] = [];
  private status: string;
  private thinking = false;

  constructor(
    private readonly rules: RulesEngine,
    options: GameOptions = {},
  ) {
    this.humanSide = options.humanSide ?? 'white';
    this.promotionPiece = options.promotionPiece ?? 'q';
    this.status = welcomeMessage(this.humanSide);
  }

  get engineSide(): Side {
    return opposite(this.humanSide);
  }

  get message(): string {
    return this.status;
  }

  get isThinking(): boolean {
    return this.thinking;
  }

  get selectedSquare(): Square | null {
    return this.selected;
  }

  /**
   * Legal moves from the selected square, in rules engine order
   */
  get cachedMoves(): readonly Move[] {
    return this.moves;
  }

  fen(): string {
    return this.rules.fen();
  }

  sideToMove(): Side {
    return this.rules.sideToMove();
  }

  isHumanTurn(): boolean {
    return this.rules.sideToMove() === this.humanSide;
  }

  /**
   * Destinations of the cached moves, without duplicates from promotions
   */
  legalDestinations(): Square[] {
    const destinations: Square[] = [];
    for (const move of this.moves) {
      if (!destinations.some((square) => squaresEqual(square, move.to))) {
        destinations.push(move.to);
      }
    }
    return destinations;
  }

  /**
   * Handle a square chosen by the human.
   *
   * With nothing selected, selects the square if it holds a piece of the
   * side to move. With a selection, plays the cached move to that square if
   * there is one, reselects if the square holds another piece of the side to
   * move, and otherwise deselects.
   *
   * @returns true if a move was made
   */
  select(square: Square): boolean {
    if (this.selected === null) {
      if (this.ownsPiece(square)) {
        this.selectSquare(square);
      }
      return false;
    }

    const candidates = this.moves.filter((move) => squaresEqual(move.to, square));
    const move = candidates.find((m) => m.promotion === this.promotionPiece) ?? candidates[0];
    if (move) {
      this.clearSelection();
      if (!this.rules.apply(move)) {
        return false;
      }
      this.status = `Move: ${encodeMove(move)}`;
      return true;
    }

    if (this.ownsPiece(square)) {
      this.selectSquare(square);
    } else {
      this.clearSelection();
    }
    return false;
  }

  /**
   * Apply a move chosen by the engine.
   *
   * Notation that matches no legal move is discarded and leaves every
   * piece of state untouched.
   *
   * @returns true if the move was applied
   */
  applyEngineMove(notation: string): boolean {
    const move = decodeMove(notation, this.rules.legalMoves());
    if (!move || !this.rules.apply(move)) {
      return false;
    }
    this.thinking = false;
    this.clearSelection();
    this.status = `Engine moved: ${encodeMove(move)}`;
    return true;
  }

  /**
   * Setting the flag shows the thinking message; clearing it leaves the
   * message alone.
   */
  setThinking(thinking: boolean): void {
    this.thinking = thinking;
    if (thinking) {
      this.status = THINKING_MESSAGE;
    }
  }

  setMessage(message: string): void {
    this.status = message;
  }

  gameResult(): GameOutcome | null {
    return this.rules.result();
  }

  phase(): GamePhase {
    if (this.rules.result() !== null) return 'game-over';
    if (this.thinking) return 'awaiting-engine';
    if (this.selected !== null) return 'square-selected';
    return 'idle';
  }

  snapshot(pendingInput: string | null = null): GameSnapshot {
    return Object.freeze({
      fen: this.rules.fen(),
      board: this.board(),
      selected: this.selected,
      destinations: Object.freeze(this.legalDestinations()),
      message: this.status,
      thinking: this.thinking,
      sideToMove: this.rules.sideToMove(),
      humanSide: this.humanSide,
      result: this.rules.result(),
      pendingInput,
    });
  }

  private ownsPiece(square: Square): boolean {
    return this.rules.colorAt(square) === this.rules.sideToMove();
  }

  private selectSquare(square: Square): void {
    this.selected = square;
    this.moves = this.rules.legalMoves().filter((move) => squaresEqual(move.from, square));
  }

  private clearSelection(): void {
    this.selected = null;
    this.moves = [];
  }

  private board(): ReadonlyArray<ReadonlyArray<BoardCell>> {
    const rows: ReadonlyArray<BoardCell>[] = [];
    for (let rank = 7; rank >= 0; rank--) {
      const row = FILES.map((_letter, file) => {
        const square = makeSquare(file, rank);
        return Object.freeze({
          square,
          piece: this.rules.pieceAt(square),
          color: this.rules.colorAt(square),
        });
      });
      rows.push(Object.freeze(row));
    }
    return Object.freeze(rows);
  }
}
