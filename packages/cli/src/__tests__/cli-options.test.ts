/**
 * CLI options parsing tests
 */

import { describe, it, expect } from 'vitest';

import { createProgram, parseCliOptions } from '../cli.js';
import { ConfigValidationError } from '../config/validation.js';

describe('parseCliOptions', () => {
  describe('engine options', () => {
    it('should parse engine path', () => {
      expect(parseCliOptions({ engine: '/opt/engines/fake' }).engine).toBe('/opt/engines/fake');
    });

    it('should parse numeric engine settings', () => {
      const result = parseCliOptions({ skill: 5, threads: 2, hash: 64, moveTime: 1500 });
      expect(result).toEqual({ skill: 5, threads: 2, hash: 64, moveTime: 1500 });
    });

    it('should reject a non-numeric value', () => {
      expect(() => parseCliOptions({ skill: Number.NaN })).toThrow(ConfigValidationError);
    });
  });

  describe('game options', () => {
    it('should parse side', () => {
      expect(parseCliOptions({ side: 'white' }).side).toBe('white');
      expect(parseCliOptions({ side: 'black' }).side).toBe('black');
    });

    it('should reject an unknown side', () => {
      expect(() => parseCliOptions({ side: 'purple' })).toThrow(ConfigValidationError);
    });

    it('should report the option path in the error', () => {
      try {
        parseCliOptions({ promotion: 'k' });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.errors[0]?.path).toBe('options.promotion');
        }
      }
    });

    it('should parse promotion and fen', () => {
      const result = parseCliOptions({ promotion: 'n', fen: '8/8/8/8/8/8/8/4K2k w - - 0 1' });
      expect(result.promotion).toBe('n');
      expect(result.fen).toBe('8/8/8/8/8/8/8/4K2k w - - 0 1');
    });
  });

  describe('flags', () => {
    it('should parse showConfig and debug flags', () => {
      expect(parseCliOptions({ showConfig: true }).showConfig).toBe(true);
      expect(parseCliOptions({ debug: true }).debug).toBe(true);
    });

    it('should parse noColor when color is false (Commander.js negated flag)', () => {
      expect(parseCliOptions({ color: false }).noColor).toBe(true);
    });

    it('should not set noColor when color is true', () => {
      expect(parseCliOptions({ color: true }).noColor).toBeUndefined();
    });

    it('should parse config path', () => {
      expect(parseCliOptions({ config: './termchess.json' }).config).toBe('./termchess.json');
    });

    it('should return empty options for empty input', () => {
      expect(parseCliOptions({})).toEqual({});
    });
  });
});

describe('createProgram', () => {
  function playOptions(args: string[]): Record<string, unknown> {
    const program = createProgram();
    const play = program.commands.find((command) => command.name() === 'play');
    if (!play) {
      throw new Error('play command missing');
    }
    play.action(() => undefined);
    program.parse(['node', 'termchess', 'play', ...args]);
    return play.opts();
  }

  it('should register the play command', () => {
    const names = createProgram().commands.map((command) => command.name());
    expect(names).toEqual(['play']);
  });

  it('should parse integer options', () => {
    const opts = playOptions(['-s', '7', '--threads', '2', '--hash', '32', '-t', '800']);
    expect(parseCliOptions(opts)).toMatchObject({ skill: 7, threads: 2, hash: 32, moveTime: 800 });
  });

  it('should map --no-color and short flags', () => {
    const opts = playOptions(['--no-color', '-e', '/usr/local/bin/engine', '--side', 'black']);
    expect(parseCliOptions(opts)).toEqual({
      engine: '/usr/local/bin/engine',
      side: 'black',
      noColor: true,
    });
  });
});
