/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { toError } from '@termchess/engine';
import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';

import { ConfigError, resolveAbsolutePath } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG } from './defaults.js';
import type { CliOptions, TermchessConfig } from './schema.js';
import { validateConfig, validatePartialConfig, type PartialConfig } from './validation.js';

/**
 * Environment variable mapping
 * Maps env var names to config paths
 */
const ENV_VAR_MAP: Record<string, string> = {
  // Engine
  TERMCHESS_ENGINE_PATH: 'engine.path',
  TERMCHESS_SKILL_LEVEL: 'engine.skillLevel',
  TERMCHESS_THREADS: 'engine.threads',
  TERMCHESS_HASH_MB: 'engine.hashMb',
  TERMCHESS_MOVE_TIME_MS: 'engine.moveTimeMs',

  // Game
  TERMCHESS_HUMAN_SIDE: 'game.humanSide',
  TERMCHESS_PROMOTION: 'game.promotionPiece',

  // UI
  TERMCHESS_TICK_MS: 'ui.tickMs',
};

const NUMERIC_PATHS = new Set([
  'engine.skillLevel',
  'engine.threads',
  'engine.hashMb',
  'engine.moveTimeMs',
  'ui.tickMs',
]);

/**
 * Deep merge a partial configuration over a complete one
 * Source values override target values
 */
function deepMerge(target: TermchessConfig, source: PartialConfig): TermchessConfig {
  return {
    engine: { ...target.engine, ...source.engine },
    game: { ...target.game, ...source.game },
    ui: { ...target.ui, ...source.ui },
  };
}

/**
 * Set a `section.key` property, creating the section if needed
 */
function setNestedProperty(
  obj: Record<string, Record<string, unknown>>,
  path: string,
  value: unknown,
): void {
  const [section, key] = path.split('.');
  if (!section || !key) {
    return;
  }
  const target = obj[section] ?? {};
  target[key] = value;
  obj[section] = target;
}

/**
 * Parse environment variable value based on expected type.
 * Unparseable numbers are passed through for validation to report.
 */
function parseEnvValue(value: string, path: string): unknown {
  if (NUMERIC_PATHS.has(path)) {
    const num = Number(value);
    return Number.isNaN(num) ? value : num;
  }
  return value;
}

/**
 * Load configuration from environment variables
 * @throws ConfigValidationError if a variable holds an invalid value
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialConfig {
  const config: Record<string, Record<string, unknown>> = {};

  for (const [envVar, configPath] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      setNestedProperty(config, configPath, parseEnvValue(value, configPath));
    }
  }

  return validatePartialConfig(config);
}

/**
 * Load configuration from config file using cosmiconfig
 */
export async function loadConfigFile(configPath?: string): Promise<PartialConfig | null> {
  const explorer = cosmiconfig('termchess', {
    searchPlaces: [
      'package.json',
      '.termchessrc',
      '.termchessrc.json',
      '.termchessrc.yaml',
      '.termchessrc.yml',
      'termchess.config.js',
    ],
  });

  let result: CosmiconfigResult;
  try {
    result = configPath ? await explorer.load(configPath) : await explorer.search();
  } catch (error) {
    const location = configPath ? ` ${resolveAbsolutePath(configPath)}` : '';
    throw new ConfigError(
      `Failed to load config file${location}: ${toError(error).message}`,
      'Check that the config file exists and is valid JSON, YAML or JavaScript',
    );
  }

  if (!result || result.isEmpty) {
    return null;
  }
  return validatePartialConfig(result.config);
}

/**
 * Map CLI options to config object
 */
export function mapCliToConfig(options: CliOptions): PartialConfig {
  const engine: NonNullable<PartialConfig['engine']> = {};
  const game: NonNullable<PartialConfig['game']> = {};
  const ui: NonNullable<PartialConfig['ui']> = {};

  if (options.engine !== undefined) engine.path = options.engine;
  if (options.skill !== undefined) engine.skillLevel = options.skill;
  if (options.threads !== undefined) engine.threads = options.threads;
  if (options.hash !== undefined) engine.hashMb = options.hash;
  if (options.moveTime !== undefined) engine.moveTimeMs = options.moveTime;

  if (options.side !== undefined) game.humanSide = options.side;
  if (options.promotion !== undefined) game.promotionPiece = options.promotion;
  if (options.fen !== undefined) game.startFen = options.fen;

  if (options.noColor) ui.color = false;

  return { engine, game, ui };
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<TermchessConfig> {
  let config = deepMerge(DEFAULT_CONFIG, {});

  const fileConfig = await loadConfigFile(cliOptions.config);
  if (fileConfig) {
    config = deepMerge(config, fileConfig);
  }

  config = deepMerge(config, loadEnvConfig(env));
  config = deepMerge(config, mapCliToConfig(cliOptions));

  return validateConfig(config);
}

/**
 * Format configuration for display
 */
export function formatConfig(config: TermchessConfig): string {
  return JSON.stringify(config, null, 2);
}
