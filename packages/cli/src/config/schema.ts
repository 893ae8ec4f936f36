/**
 * Configuration schema types for the termchess CLI
 */

import type { PromotionPiece, Side } from '@termchess/rules';

/**
 * Engine process configuration
 */
export interface EngineConfigSchema {
  /** Path to the UCI engine executable */
  path: string;
  /** Engine skill level (0-20) */
  skillLevel: number;
  /** Search threads */
  threads: number;
  /** Hash table size in MB */
  hashMb: number;
  /** Think time per engine move (ms) */
  moveTimeMs: number;
}

/**
 * Game setup configuration
 */
export interface GameConfigSchema {
  /** Side the human plays */
  humanSide: Side;
  /** Piece chosen when the human promotes a pawn */
  promotionPiece: PromotionPiece;
  /** Start from this position instead of the standard one */
  startFen?: string | undefined;
}

/**
 * Terminal UI configuration
 */
export interface UiConfigSchema {
  /** Interaction loop tick interval (ms) */
  tickMs: number;
  /** Use colors in the board and status bar */
  color: boolean;
}

/**
 * Complete termchess configuration
 */
export interface TermchessConfig {
  engine: EngineConfigSchema;
  game: GameConfigSchema;
  ui: UiConfigSchema;
}

/**
 * CLI options from command line arguments
 */
export interface CliOptions {
  /** Engine executable path */
  engine?: string;
  /** Engine skill level */
  skill?: number;
  /** Engine search threads */
  threads?: number;
  /** Engine hash size (MB) */
  hash?: number;
  /** Engine think time per move (ms) */
  moveTime?: number;
  /** Side the human plays */
  side?: Side;
  /** Starting position */
  fen?: string;
  /** Promotion piece for human moves */
  promotion?: PromotionPiece;
  /** Path to config file */
  config?: string;
  /** Print resolved config and exit */
  showConfig?: boolean;
  /** Print engine protocol traffic */
  debug?: boolean;
  /** Disable colored output */
  noColor?: boolean;
}
