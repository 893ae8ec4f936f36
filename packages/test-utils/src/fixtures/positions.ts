/**
 * FEN fixtures shared across package tests
 */

export const POSITIONS = {
  start: 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1',
  /** After 1.e4 */
  afterE4: 'rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 0 1',
  /** After 1.e4 e5 */
  afterE4E5: 'rnbqkbnr/pppp1ppp/8/4p3/4P3/8/PPPP1PPP/RNBQKBNR w KQkq - 0 2',
  /** White pawn on a7 ready to promote; white to move */
  whitePromotion: '8/P7/8/8/8/8/8/k6K w - - 0 1',
  /** Black pawn on h2 ready to promote; black to move */
  blackPromotion: 'K7/8/8/8/8/8/7p/k7 b - - 0 1',
  /** White mates with Ra1-a8 */
  backRankMate: '6k1/5ppp/8/8/8/8/8/R5K1 w - - 0 1',
  /** Black mates with Rb8-b1 */
  blackBackRankMate: '1r4k1/8/8/8/8/8/5PPP/6K1 b - - 0 1',
} as const;

export type PositionName = keyof typeof POSITIONS;
