/**
 * Configuration module exports
 */

// Schema types
export type {
  EngineConfigSchema,
  GameConfigSchema,
  UiConfigSchema,
  TermchessConfig,
  CliOptions,
} from './schema.js';

// Defaults
export { DEFAULT_GAME_CONFIG, DEFAULT_UI_CONFIG, DEFAULT_CONFIG } from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  sideSchema,
  promotionPieceSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
  type PartialConfig,
} from './validation.js';

// Loader
export { loadConfig, loadConfigFile, loadEnvConfig, mapCliToConfig, formatConfig } from './loader.js';
