/**
 * Error thrown when a square is built from out-of-range coordinates
 */
export class InvalidSquareError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSquareError';
  }
}

/**
 * Error thrown when a FEN string is invalid
 */
export class InvalidFenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFenError';
  }
}

/**
 * Error thrown when an illegal move is attempted
 */
export class IllegalMoveError extends Error {
  constructor(move: string, fen: string) {
    super(`Illegal move "${move}" in position: ${fen}`);
    this.name = 'IllegalMoveError';
  }
}
