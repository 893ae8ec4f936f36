/**
 * Zod validation schemas for configuration
 */

import { ChessRules, InvalidFenError } from '@termchess/rules';
import { z } from 'zod';

/**
 * Side schema
 */
export const sideSchema = z.enum(['white', 'black']);

/**
 * Promotion piece schema
 */
export const promotionPieceSchema = z.enum(['q', 'r', 'b', 'n']);

/**
 * FEN schema, checked by the rules engine
 */
const fenSchema = z
  .string()
  .min(1)
  .refine(
    (fen) => {
      try {
        new ChessRules(fen);
        return true;
      } catch (error) {
        if (error instanceof InvalidFenError) {
          return false;
        }
        throw error;
      }
    },
    { message: 'Invalid FEN' },
  );

/**
 * Engine configuration schema
 */
export const engineConfigSchema = z.object({
  path: z.string().min(1),
  skillLevel: z.number().int().min(0).max(20),
  threads: z.number().int().min(1).max(512),
  hashMb: z.number().int().min(1).max(65536),
  moveTimeMs: z.number().int().min(100).max(600000),
});

/**
 * Game configuration schema
 */
export const gameConfigSchema = z.object({
  humanSide: sideSchema,
  promotionPiece: promotionPieceSchema,
  startFen: fenSchema.optional(),
});

/**
 * UI configuration schema
 */
export const uiConfigSchema = z.object({
  tickMs: z.number().int().min(10).max(5000),
  color: z.boolean(),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  engine: engineConfigSchema,
  game: gameConfigSchema,
  ui: uiConfigSchema,
});

/**
 * Partial configuration schema (for config files and environment)
 */
export const partialConfigSchema = z.object({
  engine: engineConfigSchema.partial().optional(),
  game: gameConfigSchema.partial().optional(),
  ui: uiConfigSchema.partial().optional(),
});

export type PartialConfig = z.infer<typeof partialConfigSchema>;

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

/**
 * Convert zod issues into a ConfigValidationError
 */
export function toValidationError(error: z.ZodError, prefix?: string): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: [...(prefix ? [prefix] : []), ...issue.path].join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): z.infer<typeof configSchema> {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (from config file or environment)
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): PartialConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
