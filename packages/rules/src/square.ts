/**
 * Square Utilities
 *
 * A square is a (file, rank) pair of indices 0-7. Squares are only built
 * through `makeSquare` or `parseSquare`, both of which reject coordinates
 * outside the board.
 */

import { InvalidSquareError } from './errors.js';

/**
 * A board square; file 0 is the a-file, rank 0 is the first rank
 */
export interface Square {
  readonly file: number;
  readonly rank: number;
}

/**
 * File letters indexed 0-7
 */
export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

/**
 * File letter a-h
 */
export type FileLetter = (typeof FILES)[number];

function isBoardIndex(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 7;
}

/**
 * Create a square from file and rank indices (0-7)
 * @throws InvalidSquareError if either index is off the board
 */
export function makeSquare(file: number, rank: number): Square {
  if (!isBoardIndex(file) || !isBoardIndex(rank)) {
    throw new InvalidSquareError(`Square out of range: file ${file}, rank ${rank}`);
  }
  return Object.freeze({ file, rank });
}

/**
 * Get file index (0-7) from a file letter, or -1 if it is not a-h
 */
export function fileIndex(letter: string): number {
  return FILES.findIndex((f) => f === letter);
}

/**
 * Get rank index (0-7) from a rank digit, or -1 if it is not 1-8
 */
export function rankIndex(digit: string): number {
  if (digit.length !== 1 || digit < '1' || digit > '8') {
    return -1;
  }
  return digit.charCodeAt(0) - '1'.charCodeAt(0);
}

/**
 * Parse a square in algebraic notation (e.g. "e4")
 * @throws InvalidSquareError if the name is not a board square
 */
export function parseSquare(name: string): Square {
  if (name.length !== 2) {
    throw new InvalidSquareError(`Invalid square name: "${name}"`);
  }
  const file = fileIndex(name.charAt(0));
  const rank = rankIndex(name.charAt(1));
  if (file < 0 || rank < 0) {
    throw new InvalidSquareError(`Invalid square name: "${name}"`);
  }
  return makeSquare(file, rank);
}

/**
 * Get the algebraic name of a square (e.g. "e4")
 */
export function squareName(square: Square): string {
  return `${FILES[square.file]}${square.rank + 1}`;
}

/**
 * Check if two squares are the same square
 */
export function squaresEqual(a: Square, b: Square): boolean {
  return a.file === b.file && a.rank === b.rank;
}

/**
 * Check if a square is a light square
 */
export function isLightSquare(square: Square): boolean {
  return (square.file + square.rank) % 2 === 1;
}
