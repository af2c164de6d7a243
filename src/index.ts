/**
 * hybrid-index - Library Entry Point
 *
 * The CLI (`hix`) covers day-to-day use:
 * ```bash
 * hix index ./my-solution              # Build the index
 * hix search "user authentication"     # Query it
 * hix verify                           # Check index and metadata agree
 * ```
 *
 * This module exports the same building blocks for programmatic use:
 * chunking, checkpointed embedding, the persisted index and hybrid
 * retrieval.
 *
 * @example Build and query an index
 * ```typescript
 * import {
 *   createEmbeddingProvider,
 *   runIndexPipeline,
 *   loadIndex,
 *   HybridRetriever,
 * } from 'hybrid-index';
 *
 * const provider = createEmbeddingProvider({ provider: 'ollama', model: 'nomic-embed-text', timeout_ms: 120000 });
 *
 * await runIndexPipeline({
 *   rootPath: './my-solution',
 *   indexDir: './.hix/index',
 *   checkpointDir: './.hix/checkpoints',
 *   embeddingProvider: provider,
 *   chunkOptions: { targetTokens: 500, overlapTokens: 50 },
 *   batching: { batchTokenBudget: 4000, maxSingleChunkTokens: 4500 },
 *   retry: { maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 60000 },
 * });
 *
 * const retriever = new HybridRetriever(loadIndex('./.hix/index'), provider);
 * const { results } = await retriever.query('user authentication', 5);
 * ```
 *
 * @packageDocumentation
 */

// Indexing: documents, chunking, embedding, checkpoints, pipeline
export * from './indexer/index.js';

// Index storage and retrieval
export * from './search/index.js';

// Configuration
export {
  loadConfig,
  DEFAULT_CONFIG,
  ConfigSchema,
  type Config,
} from './config/index.js';

// Errors
export {
  CLIError,
  ConfigError,
  APIKeyError,
  ValidationError,
  FileNotFoundError,
  ChunkingFailureError,
  EmbeddingRateLimitedError,
  EmbeddingTransientError,
  EmbeddingFatalError,
  IndexMismatchError,
  PersistenceError,
  IndexingCancelledError,
} from './errors/index.js';

// Logging
export { consoleLogger, silentLogger, type Logger } from './utils/index.js';

