import { describe, it, expect } from 'vitest';

import {
  goMoveTimeCommand,
  handshakeCommands,
  parseBestMove,
  positionCommand,
  setOptionCommand,
} from '../uci/commands.js';

describe('UCI commands', () => {
  it('builds setoption commands', () => {
    expect(setOptionCommand('Hash', 128)).toBe('setoption name Hash value 128');
    expect(setOptionCommand('UCI_LimitStrength', false)).toBe('setoption name UCI_LimitStrength value false');
  });

  it('builds the handshake in protocol order', () => {
    expect(handshakeCommands({ skillLevel: 10, threads: 4, hashMb: 128 })).toEqual([
      'uci',
      'isready',
      'setoption name Skill Level value 10',
      'setoption name Threads value 4',
      'setoption name Hash value 128',
      'setoption name UCI_AnalyseMode value false',
      'setoption name UCI_LimitStrength value false',
    ]);
  });

  it('builds position and go commands', () => {
    expect(positionCommand('8/8/8/8/8/8/8/4K2k w - - 0 1')).toBe('position fen 8/8/8/8/8/8/8/4K2k w - - 0 1');
    expect(goMoveTimeCommand(2000)).toBe('go movetime 2000');
  });

  describe('parseBestMove', () => {
    it('returns the second token of a bestmove line', () => {
      expect(parseBestMove('bestmove e7e5')).toBe('e7e5');
      expect(parseBestMove('bestmove e7e8q ponder a2a3')).toBe('e7e8q');
    });

    it('tolerates repeated whitespace', () => {
      expect(parseBestMove('bestmove   g8f6  ')).toBe('g8f6');
    });

    it('passes the token through verbatim', () => {
      expect(parseBestMove('bestmove (none)')).toBe('(none)');
    });

    it('returns null for a bestmove line without a move', () => {
      expect(parseBestMove('bestmove')).toBeNull();
      expect(parseBestMove('bestmove   ')).toBeNull();
    });

    it('returns null for other lines', () => {
      expect(parseBestMove('info depth 12 score cp 31 pv e2e4')).toBeNull();
      expect(parseBestMove('readyok')).toBeNull();
      expect(parseBestMove(' bestmove e2e4')).toBeNull();
      expect(parseBestMove('')).toBeNull();
    });
  });
});
