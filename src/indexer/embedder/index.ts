/**
 * Embedder Module
 *
 * Batched, checkpointed embedding generation.
 *
 * @example
 * ```typescript
 * import { createEmbeddingProvider, embedChunks } from './embedder/index.js';
 *
 * const provider = createEmbeddingProvider(config.embedding);
 * const vectors = await embedChunks(chunks, provider, { batching, retry });
 * ```
 */

// Provider factory and implementations
export { createEmbeddingProvider } from './provider.js';
export { OllamaEmbeddingProvider, type OllamaProviderOptions } from './ollama.js';
export { OpenAIEmbeddingProvider, type OpenAIProviderOptions } from './openai.js';

// Batching, retry and orchestration
export { planBatches } from './batcher.js';
export { classifyEmbeddingError, computeRetryDelay, withRetry } from './retry.js';
export { embedChunks, embeddingFingerprint } from './embedder.js';
export { parseRetryAfter } from './http.js';

// Types
export type {
  EmbeddingProvider,
  EmbeddingConfig,
  ProviderOptions,
  BatchingOptions,
  PlannedBatch,
  EmbeddingErrorKind,
  ErrorClassification,
  RetryOptions,
  RetryInfo,
  EmbedderOptions,
} from './types.js';
