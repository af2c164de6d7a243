/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { FakeEmbeddingProvider, resetAll } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 * });
 * ```
 */

export { resetAll } from './reset.js';
export {
  FakeEmbeddingProvider,
  hashedEmbedding,
  type FakeProviderOptions,
} from './fake-provider.js';
export { makeChunk } from './chunks.js';
