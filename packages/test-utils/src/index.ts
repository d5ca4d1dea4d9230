/**
 * @ucibridge/test-utils
 *
 * Shared test utilities: an in-process mock UCI engine and spawn stubs
 */

export {
  MockUciEngine,
  createMockEngine,
  createMockSpawn,
  DEFAULT_BEST_MOVE,
  type MockEngineConfig,
  type MockSpawn,
} from './mocks/mock-engine.js';
