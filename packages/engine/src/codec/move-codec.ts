/**
 * Move codec between rules moves and UCI long algebraic text
 *
 * A move is written as `<from><to>` with an optional lowercase promotion
 * letter, e.g. "e2e4" or "a7a8q". Decoding only ever returns an entry of the
 * supplied legal move list.
 */

import {
  fileIndex,
  makeSquare,
  rankIndex,
  squareName,
  squaresEqual,
  type Move,
  type Square,
} from '@termchess/rules';

/**
 * Encode a move as UCI text
 */
export function encodeMove(move: Move): string {
  return `${squareName(move.from)}${squareName(move.to)}${move.promotion ?? ''}`;
}

function readSquare(fileChar: string, rankChar: string): Square | null {
  const file = fileIndex(fileChar);
  const rank = rankIndex(rankChar);
  if (file < 0 || rank < 0) {
    return null;
  }
  return makeSquare(file, rank);
}

/**
 * Resolve UCI text against a list of legal moves.
 *
 * Returns null when the text is shorter than four characters, names a square
 * off the board, or matches no legal move. Without a promotion letter the
 * first listed promotion for the square pair is accepted; with one, only the
 * move promoting to that piece matches. Characters after the fifth are
 * ignored.
 */
export function decodeMove(text: string, legalMoves: readonly Move[]): Move | null {
  if (text.length < 4) {
    return null;
  }

  const from = readSquare(text.charAt(0), text.charAt(1));
  const to = readSquare(text.charAt(2), text.charAt(3));
  if (!from || !to) {
    return null;
  }

  const promotion = text.charAt(4);

  return (
    legalMoves.find(
      (move) =>
        squaresEqual(move.from, from) &&
        squaresEqual(move.to, to) &&
        (promotion === '' || move.promotion === promotion),
    ) ?? null
  );
}
