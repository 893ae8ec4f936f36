/**
 * @termchess/test-utils
 *
 * Shared test fakes and fixtures for termchess
 */

// Fixtures
export { POSITIONS, type PositionName } from './fixtures/positions.js';

// Engine process and client fakes
export {
  FakeEngineProcess,
  createFakeSpawner,
  replyWithBestMove,
  type FakeEngineOptions,
  type FakeSpawnerOptions,
  type FakeSpawner,
} from './mocks/fake-engine-process.js';

export {
  createMockEngineClient,
  type MockEngineClient,
  type MockEngineHealth,
} from './mocks/mock-engine-client.js';
