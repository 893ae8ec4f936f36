/**
 * CLI definition using Commander.js
 */

import { Command } from 'commander';
import { z } from 'zod';

import type { CliOptions } from './config/schema.js';
import { promotionPieceSchema, sideSchema, toValidationError } from './config/validation.js';

export const VERSION = '0.1.0';

/**
 * Side descriptions for help text
 */
const SIDE_HELP = `Side you play:
    white - You move first [default]
    black - The engine moves first`;

/**
 * Promotion descriptions for help text
 */
const PROMOTION_HELP = `Piece your pawns promote to:
    q - Queen [default]
    r - Rook
    b - Bishop
    n - Knight`;

/**
 * Integer option parser (NaN is reported by validation)
 */
function parseInteger(value: string): number {
  return Number.parseInt(value, 10);
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('termchess')
    .description('Play chess in the terminal against a UCI engine')
    .version(VERSION);

  // Play command
  program
    .command('play')
    .description('Start a game against the engine')
    .option('-e, --engine <path>', 'Path to the UCI engine executable')
    .option('-s, --skill <level>', 'Engine skill level (0-20)', parseInteger)
    .option('--threads <count>', 'Engine search threads', parseInteger)
    .option('--hash <mb>', 'Engine hash table size in MB', parseInteger)
    .option('-t, --move-time <ms>', 'Engine think time per move in milliseconds', parseInteger)
    .option('--side <side>', SIDE_HELP)
    .option('--fen <fen>', 'Start from this position instead of the standard one')
    .option('--promotion <piece>', PROMOTION_HELP)
    .option('-c, --config <file>', 'Path to config file')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--debug', 'Print engine protocol traffic to stderr')
    .option('--no-color', 'Disable colored output')
    .action(async (options: Record<string, unknown>) => {
      // Import dynamically so the UI only loads when playing
      const { playCommand } = await import('./commands/play.js');
      await playCommand(options);
    });

  return program;
}

const rawOptionsSchema = z.object({
  engine: z.string().optional(),
  skill: z.number().optional(),
  threads: z.number().optional(),
  hash: z.number().optional(),
  moveTime: z.number().optional(),
  side: sideSchema.optional(),
  fen: z.string().optional(),
  promotion: promotionPieceSchema.optional(),
  config: z.string().optional(),
  showConfig: z.boolean().optional(),
  debug: z.boolean().optional(),
  color: z.boolean().optional(),
});

/**
 * Parse CLI options from command options object
 * @throws ConfigValidationError if an option has the wrong type or value
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const parsed = rawOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw toValidationError(parsed.error, 'options');
  }

  const { color, ...rest } = parsed.data;
  const result: CliOptions = {};

  if (rest.engine !== undefined) result.engine = rest.engine;
  if (rest.skill !== undefined) result.skill = rest.skill;
  if (rest.threads !== undefined) result.threads = rest.threads;
  if (rest.hash !== undefined) result.hash = rest.hash;
  if (rest.moveTime !== undefined) result.moveTime = rest.moveTime;
  if (rest.side !== undefined) result.side = rest.side;
  if (rest.fen !== undefined) result.fen = rest.fen;
  if (rest.promotion !== undefined) result.promotion = rest.promotion;
  if (rest.config !== undefined) result.config = rest.config;
  if (rest.showConfig !== undefined) result.showConfig = rest.showConfig;
  if (rest.debug !== undefined) result.debug = rest.debug;
  // Note: Commander.js uses 'color' (negated) when --no-color is used
  if (color === false) result.noColor = true;

  return result;
}
