/**
 * Mock engine client for interaction loop tests
 *
 * Matches the EngineClient interface of @termchess/engine without depending
 * on it.
 */

import { vi } from 'vitest';

export interface MockEngineHealth {
  state: 'not-started' | 'running' | 'stopped';
  listening: boolean;
  exited: boolean;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Create a mock engine client. Replies are queued with `reply` and handed
 * out one per `pollMove` call.
 */
export function createMockEngineClient() {
  const queue: string[] = [];
  const status: MockEngineHealth = {
    state: 'running',
    listening: true,
    exited: false,
    exitCode: null,
    signal: null,
  };
  let nextFailure: Error | null = null;

  const requestMove = vi.fn(async (_fen: string): Promise<void> => {
    if (nextFailure) {
      const failure = nextFailure;
      nextFailure = null;
      throw failure;
    }
  });

  const pollMove = vi.fn((): string | undefined => queue.shift());

  const health = vi.fn((): MockEngineHealth => ({ ...status }));

  const stop = vi.fn((): void => {
    status.state = 'stopped';
    queue.length = 0;
  });

  return {
    requestMove,
    pollMove,
    health,
    stop,
    /** Queue a best move for the next poll */
    reply(move: string): void {
      queue.push(move);
    },
    /** Make the next requestMove reject */
    failNextRequest(error: Error): void {
      nextFailure = error;
    },
    /** Simulate the engine process dying */
    die(code = 1): void {
      status.exited = true;
      status.listening = false;
      status.exitCode = code;
    },
  };
}

export type MockEngineClient = ReturnType<typeof createMockEngineClient>;
