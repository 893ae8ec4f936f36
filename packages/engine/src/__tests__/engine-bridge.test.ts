import { describe, it, expect, vi } from 'vitest';

import {
  createFakeSpawner,
  POSITIONS,
  replyWithBestMove,
  type FakeEngineProcess,
  type FakeSpawner,
} from '@termchess/test-utils';

import { EngineBridge, type EngineBridgeOptions } from '../bridge/engine-bridge.js';
import { EngineStateError, LaunchError, ProtocolError } from '../errors.js';

const HANDSHAKE = [
  'uci',
  'isready',
  'setoption name Skill Level value 10',
  'setoption name Threads value 4',
  'setoption name Hash value 128',
  'setoption name UCI_AnalyseMode value false',
  'setoption name UCI_LimitStrength value false',
];

function lastProcess(spawner: FakeSpawner): FakeEngineProcess {
  const child = spawner.last;
  if (!child) {
    throw new Error('no engine process was spawned');
  }
  return child;
}

function createBridge(spawner: FakeSpawner, options: EngineBridgeOptions = {}): EngineBridge {
  return new EngineBridge({ path: 'fake-engine', spawnProcess: spawner.spawn, ...options });
}

function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('EngineBridge', () => {
  describe('start', () => {
    it('spawns the configured path', async () => {
      const spawner = createFakeSpawner();
      const bridge = createBridge(spawner);

      await bridge.start();

      expect(spawner.paths).toEqual(['fake-engine']);
      expect(bridge.currentState).toBe('running');
      bridge.stop();
    });

    it('sends the handshake in order', async () => {
      const spawner = createFakeSpawner();
      const bridge = createBridge(spawner);

      await bridge.start();
      const child = lastProcess(spawner);

      await vi.waitFor(() => expect(child.received).toHaveLength(HANDSHAKE.length));
      expect(child.received).toEqual(HANDSHAKE);
      bridge.stop();
    });

    it('uses configured handshake settings', async () => {
      const spawner = createFakeSpawner();
      const bridge = createBridge(spawner, { skillLevel: 3, threads: 1, hashMb: 16 });

      await bridge.start();
      const child = lastProcess(spawner);

      await vi.waitFor(() => expect(child.received).toHaveLength(HANDSHAKE.length));
      expect(child.received.slice(2, 5)).toEqual([
        'setoption name Skill Level value 3',
        'setoption name Threads value 1',
        'setoption name Hash value 16',
      ]);
      bridge.stop();
    });

    it('rejects with LaunchError when the process fails to spawn', async () => {
      const spawner = createFakeSpawner({ failWith: new Error('spawn fake-engine ENOENT') });
      const bridge = createBridge(spawner);

      const error = await bridge.start().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(LaunchError);
      expect(error).toMatchObject({ path: 'fake-engine' });
      expect(bridge.currentState).toBe('stopped');
    });

    it('rejects with LaunchError when the spawn function throws', async () => {
      const bridge = new EngineBridge({
        path: 'missing-engine',
        spawnProcess: () => {
          throw new Error('EACCES');
        },
      });

      await expect(bridge.start()).rejects.toBeInstanceOf(LaunchError);
      await expect(bridge.start()).rejects.toBeInstanceOf(EngineStateError);
    });

    it('rejects with ProtocolError when the handshake cannot be written', async () => {
      const spawner = createFakeSpawner({ brokenInput: true });
      const bridge = createBridge(spawner);

      await expect(bridge.start()).rejects.toBeInstanceOf(ProtocolError);
      expect(bridge.currentState).toBe('running');
      bridge.stop();
    });

    it('stays stopped when stopped while the process is spawning', async () => {
      const spawner = createFakeSpawner();
      const bridge = createBridge(spawner);

      const starting = bridge.start();
      const child = lastProcess(spawner);
      bridge.stop();

      await expect(starting).rejects.toBeInstanceOf(EngineStateError);
      expect(bridge.currentState).toBe('stopped');
      expect(child.killed).toBe(true);
      await nextTurn();
      expect(child.received.filter((line) => line !== 'quit')).toEqual([]);
      expect(bridge.health().listening).toBe(false);
    });

    it('rejects with LaunchError for a missing executable', async () => {
      const bridge = new EngineBridge({ path: '/nonexistent/termchess-engine' });

      await expect(bridge.start()).rejects.toBeInstanceOf(LaunchError);
      expect(bridge.currentState).toBe('stopped');
    });

    it('cannot be started twice', async () => {
      const spawner = createFakeSpawner();
      const bridge = createBridge(spawner);
      await bridge.start();

      await expect(bridge.start()).rejects.toBeInstanceOf(EngineStateError);
      expect(spawner.processes).toHaveLength(1);
      bridge.stop();
    });
  });

  describe('requestMove', () => {
    it('sends the position and a timed search', async () => {
      const spawner = createFakeSpawner();
      const bridge = createBridge(spawner, { moveTimeMs: 500 });
      await bridge.start();
      const child = lastProcess(spawner);

      await bridge.requestMove('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 0 1');

      await vi.waitFor(() => expect(child.received).toHaveLength(HANDSHAKE.length + 2));
      expect(child.received.slice(HANDSHAKE.length)).toEqual([
        'position fen rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 0 1',
        'go movetime 500',
      ]);
      bridge.stop();
    });

    it('rejects before the bridge is started', async () => {
      const bridge = createBridge(createFakeSpawner());

      await expect(bridge.requestMove('8/8/8/8/8/8/8/4K2k w - - 0 1')).rejects.toBeInstanceOf(
        EngineStateError,
      );
    });

    it('rejects with ProtocolError after stop', async () => {
      const spawner = createFakeSpawner();
      const bridge = createBridge(spawner);
      await bridge.start();
      bridge.stop();

      await expect(bridge.requestMove('8/8/8/8/8/8/8/4K2k w - - 0 1')).rejects.toBeInstanceOf(ProtocolError);
    });
  });

  describe('pollMove', () => {
    it('returns undefined while no reply has arrived', async () => {
      const spawner = createFakeSpawner();
      const bridge = createBridge(spawner);
      await bridge.start();

      expect(bridge.pollMove()).toBeUndefined();
      bridge.stop();
    });

    it('delivers the engine best move', async () => {
      const spawner = createFakeSpawner({ respond: replyWithBestMove('e7e5') });
      const bridge = createBridge(spawner);
      await bridge.start();

      await bridge.requestMove('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 0 1');

      await vi.waitFor(() => expect(bridge.pollMove()).toBe('e7e5'));
      expect(bridge.pollMove()).toBeUndefined();
      bridge.stop();
    });

    it('ignores lines other than bestmove', async () => {
      const spawner = createFakeSpawner();
      const bridge = createBridge(spawner);
      await bridge.start();
      const child = lastProcess(spawner);

      child.emitLine('id name FakeEngine');
      child.emitLine('uciok');
      child.emitLine('readyok');
      child.emitLine('info depth 8 score cp 12 pv g1f3');
      child.emitLine('bestmove');
      child.emitLine('bestmove g1f3 ponder g8f6');

      await vi.waitFor(() => expect(bridge.pollMove()).toBe('g1f3'));
      expect(bridge.pollMove()).toBeUndefined();
      bridge.stop();
    });

    it('queues replies in arrival order', async () => {
      const spawner = createFakeSpawner();
      const bridge = createBridge(spawner);
      await bridge.start();
      const child = lastProcess(spawner);

      child.emitLine('bestmove d2d4');
      child.emitLine('bestmove c2c4');

      await vi.waitFor(() => expect(bridge.pollMove()).toBe('d2d4'));
      expect(bridge.pollMove()).toBe('c2c4');
      bridge.stop();
    });
  });

  describe('stop', () => {
    it('sends quit and kills the process', async () => {
      const spawner = createFakeSpawner();
      const bridge = createBridge(spawner);
      await bridge.start();
      const child = lastProcess(spawner);

      bridge.stop();

      await vi.waitFor(() => expect(child.received).toContain('quit'));
      expect(child.received[child.received.length - 1]).toBe('quit');
      expect(child.killed).toBe(true);
      expect(bridge.currentState).toBe('stopped');
    });

    it('is idempotent', async () => {
      const spawner = createFakeSpawner();
      const bridge = createBridge(spawner);
      await bridge.start();

      bridge.stop();
      expect(() => bridge.stop()).not.toThrow();
      expect(bridge.currentState).toBe('stopped');
    });

    it('works before start', () => {
      const bridge = createBridge(createFakeSpawner());

      expect(() => bridge.stop()).not.toThrow();
      expect(bridge.health().state).toBe('stopped');
    });

    it('discards replies still in flight', async () => {
      const spawner = createFakeSpawner();
      const bridge = createBridge(spawner);
      await bridge.start();
      const child = lastProcess(spawner);

      child.emitLine('bestmove e7e5');
      bridge.stop();
      await nextTurn();
      await nextTurn();

      expect(bridge.pollMove()).toBeUndefined();
    });

    it('delivers no reply that arrives after stop during a search', async () => {
      const spawner = createFakeSpawner({ keepOutputOpenOnKill: true });
      const bridge = createBridge(spawner);
      await bridge.start();
      const child = lastProcess(spawner);

      await bridge.requestMove(POSITIONS.afterE4);
      bridge.stop();
      child.stdout.write('bestmove e7e5\n');
      await nextTurn();
      await nextTurn();

      expect(child.killed).toBe(true);
      expect(bridge.pollMove()).toBeUndefined();
    });

    it('works after the process has died', async () => {
      const spawner = createFakeSpawner();
      const bridge = createBridge(spawner);
      await bridge.start();
      const child = lastProcess(spawner);

      child.crash(1);

      expect(() => bridge.stop()).not.toThrow();
      expect(bridge.currentState).toBe('stopped');
    });
  });

  describe('health', () => {
    it('reports a running engine', async () => {
      const spawner = createFakeSpawner();
      const bridge = createBridge(spawner);
      await bridge.start();

      expect(bridge.health()).toEqual({
        state: 'running',
        listening: true,
        exited: false,
        exitCode: null,
        signal: null,
      });
      bridge.stop();
    });

    it('notices when the engine dies', async () => {
      const spawner = createFakeSpawner();
      const bridge = createBridge(spawner);
      await bridge.start();
      const child = lastProcess(spawner);

      child.crash(3);

      await vi.waitFor(() => expect(bridge.health().listening).toBe(false));
      expect(bridge.health()).toMatchObject({ state: 'running', exited: true, exitCode: 3 });
      bridge.stop();
    });
  });

  describe('logging', () => {
    it('logs protocol traffic in both directions', async () => {
      const logger = { debug: vi.fn(), warn: vi.fn() };
      const spawner = createFakeSpawner({ respond: replyWithBestMove('e7e5') });
      const bridge = createBridge(spawner, { logger });
      await bridge.start();

      await bridge.requestMove('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 0 1');
      await vi.waitFor(() => expect(logger.debug).toHaveBeenCalledWith('← bestmove e7e5'));

      expect(logger.debug).toHaveBeenCalledWith('→ uci');
      expect(logger.debug).toHaveBeenCalledWith('→ go movetime 2000');
      expect(logger.warn).not.toHaveBeenCalled();
      bridge.stop();
    });
  });
});
