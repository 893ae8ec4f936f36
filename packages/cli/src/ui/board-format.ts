/**
 * Board formatting shared by the Ink board panel and the plain-text board
 * printed when a game ends.
 *
 * Example output (white's perspective, e2 selected):
 * ```
 *    a   b   c   d   e   f   g   h
 * 8 [r] [n] [b] [q] [k] [b] [n] [r]  8
 * ...
 * 4  .   .   .   .   *   .   .   .   4
 * 3  .   .   .   .   *   .   .   .   3
 * 2 [P] [P] [P] [P] <P> [P] [P] [P]  2
 * 1 [R] [N] [B] [Q] [K] [B] [N] [R]  1
 *    a   b   c   d   e   f   g   h
 * ```
 * Uppercase is White. `<X>` marks the selected piece, ` * ` an empty
 * destination and `(x)` a capture.
 */

import type { BoardCell, GameSnapshot } from '@termchess/game';
import { FILES, isLightSquare, squaresEqual, type Side } from '@termchess/rules';

export type CellHighlight = 'selected' | 'destination' | null;

export interface BoardCellView {
  /** Three-character cell text */
  text: string;
  side: Side | null;
  light: boolean;
  highlight: CellHighlight;
}

export interface BoardRowView {
  /** Rank digit */
  label: string;
  cells: BoardCellView[];
}

/**
 * FEN letter for the piece on a cell, or '.' when empty
 */
export function pieceSymbol(cell: BoardCell): string {
  if (!cell.piece) return '.';
  return cell.color === 'white' ? cell.piece.toUpperCase() : cell.piece;
}

function cellText(symbol: string, occupied: boolean, highlight: CellHighlight): string {
  if (highlight === 'selected') return `<${symbol}>`;
  if (highlight === 'destination') return occupied ? `(${symbol})` : ' * ';
  return occupied ? `[${symbol}]` : ` ${symbol} `;
}

/**
 * Lay out the board rows as seen from one side
 */
export function boardRows(snapshot: GameSnapshot, perspective: Side = snapshot.humanSide): BoardRowView[] {
  const rows = snapshot.board.map((row) =>
    row.map((cell): BoardCellView => {
      const selected = snapshot.selected !== null && squaresEqual(snapshot.selected, cell.square);
      const destination = snapshot.destinations.some((square) => squaresEqual(square, cell.square));
      const highlight: CellHighlight = selected ? 'selected' : destination ? 'destination' : null;
      return {
        text: cellText(pieceSymbol(cell), cell.piece !== null, highlight),
        side: cell.color,
        light: isLightSquare(cell.square),
        highlight,
      };
    }),
  );

  const ordered = perspective === 'white' ? rows : rows.map((row) => [...row].reverse()).reverse();
  const labels = ['8', '7', '6', '5', '4', '3', '2', '1'];
  const orderedLabels = perspective === 'white' ? labels : [...labels].reverse();

  return ordered.map((cells, index) => ({ label: orderedLabels[index] ?? '', cells }));
}

/**
 * File letters header, spaced to line up with the cells
 */
export function fileHeader(perspective: Side): string {
  const files = perspective === 'white' ? [...FILES] : [...FILES].reverse();
  return `   ${files.join('   ')}`;
}

/**
 * Render the board as plain text
 */
export function renderBoardText(snapshot: GameSnapshot, perspective: Side = snapshot.humanSide): string {
  const header = fileHeader(perspective);
  const lines = [header];
  for (const row of boardRows(snapshot, perspective)) {
    lines.push(`${row.label} ${row.cells.map((cell) => cell.text).join(' ')}  ${row.label}`);
  }
  lines.push(header);
  return lines.join('\n');
}
