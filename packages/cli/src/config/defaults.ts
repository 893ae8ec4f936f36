/**
 * Default configuration values
 */

import { DEFAULT_ENGINE_CONFIG } from '@termchess/engine';

import type { GameConfigSchema, TermchessConfig, UiConfigSchema } from './schema.js';

/**
 * Default game configuration
 */
export const DEFAULT_GAME_CONFIG: GameConfigSchema = {
  humanSide: 'white',
  promotionPiece: 'q',
};

/**
 * Default UI configuration
 */
export const DEFAULT_UI_CONFIG: UiConfigSchema = {
  tickMs: 250,
  color: true,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: TermchessConfig = {
  engine: { ...DEFAULT_ENGINE_CONFIG },
  game: DEFAULT_GAME_CONFIG,
  ui: DEFAULT_UI_CONFIG,
};
