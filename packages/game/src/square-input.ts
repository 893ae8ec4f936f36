/**
 * Square Input
 *
 * Two-key square entry (file letter, then rank digit) as an explicit state
 * machine: awaiting-file -> awaiting-rank -> square complete. A key that is
 * not a rank digit after a file letter rejects the partial input and
 * returns to awaiting-file.
 */

import { fileIndex, makeSquare, rankIndex, type Square } from '@termchess/rules';

export type SquareInputState = 'awaiting-file' | 'awaiting-rank';

export type SquareInputResult =
  | { kind: 'pending'; file: string }
  | { kind: 'square'; square: Square }
  | { kind: 'rejected'; input: string }
  | { kind: 'ignored' };

export class SquareInput {
  private file: string | null = null;

  get state(): SquareInputState {
    return this.file === null ? 'awaiting-file' : 'awaiting-rank';
  }

  /**
   * File letter waiting for its rank, or null
   */
  get pending(): string | null {
    return this.file;
  }

  /**
   * Feed one key. Letters are matched case-insensitively.
   */
  feed(key: string): SquareInputResult {
    const normalized = key.toLowerCase();

    if (this.file === null) {
      if (fileIndex(normalized) < 0) {
        return { kind: 'ignored' };
      }
      this.file = normalized;
      return { kind: 'pending', file: normalized };
    }

    const file = this.file;
    this.file = null;
    const rank = rankIndex(normalized);
    if (rank < 0) {
      return { kind: 'rejected', input: `${file}${key}` };
    }
    return { kind: 'square', square: makeSquare(fileIndex(file), rank) };
  }

  /**
   * Drop a partially typed square
   */
  reset(): void {
    this.file = null;
  }
}
