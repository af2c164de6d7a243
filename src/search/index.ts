/**
 * Search Module
 *
 * The persisted vector index with its metadata, and hybrid retrieval
 * over it.
 *
 * @example
 * ```typescript
 * import { loadIndex, HybridRetriever } from './search/index.js';
 *
 * const handle = loadIndex(indexDir);
 * const retriever = new HybridRetriever(handle, provider);
 * const { results, mode } = await retriever.query('user authentication', 5);
 * ```
 */

// Vector index
export { FlatL2Index, type Neighbor } from './vector-index.js';

// Index store
export {
  appendToIndex,
  assertIndexConsistent,
  buildIndex,
  getIndexPaths,
  indexExists,
  loadIndex,
  persistIndex,
  verifyIndex,
} from './index-store.js';
export {
  ChunkMetadataSchema,
  INDEX_FORMAT_VERSION,
  MetadataFileSchema,
  type MetadataFile,
} from './metadata.js';

// Lexical scoring
export { BM25Index, DEFAULT_BM25_CONFIG, tokenize } from './bm25.js';
export { BM25StoreManager, getBM25StoreManager, resetBM25StoreManager } from './bm25-store.js';

// Fusion and retrieval
export { DEFAULT_FUSION_CONFIG, fuseScores, type FusedCandidate } from './fusion.js';
export {
  DEFAULT_QUERY_TOKEN_CEILING,
  HybridRetriever,
  distanceToSimilarity,
} from './retriever.js';

// Formatting
export {
  formatResult,
  formatResults,
  formatResultJSON,
  formatResultsJSON,
  formatScore,
  truncateSnippet,
  type FormatOptions,
  type FormattedResultJSON,
} from './formatter.js';

export type {
  BM25Config,
  ChunkMetadata,
  FusionConfig,
  IndexHandle,
  IndexPaths,
  IndexVerification,
  RetrievalMode,
  RetrievalResponse,
  RetrievalResult,
  RetrieverOptions,
} from './types.js';
