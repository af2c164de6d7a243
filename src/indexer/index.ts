/**
 * Indexer Module
 *
 * Everything between a directory on disk and a persisted index: file
 * discovery, document loading, chunking, checkpointed embedding and the
 * pipeline that runs them in order.
 *
 * @example
 * ```ts
 * import { scanDirectory, loadDocuments, chunkDocuments } from './indexer';
 *
 * const { files } = await scanDirectory('/path/to/solution');
 * const { documents } = loadDocuments(files);
 * const { chunks } = chunkDocuments(documents, { targetTokens: 500, overlapTokens: 50 });
 * ```
 */

// File discovery
export { scanDirectory } from './scanner.js';
export {
  createIgnoreFilter,
  loadGitignoreFile,
  parseGitignoreContent,
  type IgnoreFilter,
  type IgnoreFilterOptions,
} from './ignore.js';

// Document loading
export {
  loadDocuments,
  manualNoteDocuments,
  parseCsv,
  readDocument,
  sheetDocument,
  sourceIdFor,
  type LoadDocumentsOptions,
  type LoadDocumentsResult,
} from './documents.js';

// Types and constants
export {
  type ChunkAttributes,
  type Document,
  type DocumentType,
  type FileInfo,
  type ScanOptions,
  type ScanStats,
  type ScanResult,
  DOCUMENT_TYPES,
  EXTENSION_TO_DOCUMENT_TYPE,
  DEFAULT_SUPPORTED_EXTENSIONS,
  DEFAULT_IGNORE_PATTERNS,
  getDocumentTypeForExtension,
} from './types.js';

// Chunker module
export {
  chunkDocument,
  chunkDocuments,
  classifyContent,
  estimateTokens,
  truncateToTokenBudget,
  TRUNCATION_MARKER,
  type Chunk,
  type ChunkOptions,
  type ContentKind,
  type BatchChunkResult,
} from './chunker/index.js';

// Embedder module
export {
  createEmbeddingProvider,
  OllamaEmbeddingProvider,
  OpenAIEmbeddingProvider,
  planBatches,
  classifyEmbeddingError,
  computeRetryDelay,
  withRetry,
  embedChunks,
  embeddingFingerprint,
  type BatchingOptions,
  type EmbeddingConfig,
  type EmbedderOptions,
  type EmbeddingProvider,
  type PlannedBatch,
  type ProviderOptions,
  type RetryOptions,
  type RetryInfo,
} from './embedder/index.js';

// Checkpoints
export { CheckpointStore, type CheckpointBatch, type CheckpointInfo } from './checkpoint/index.js';

// Cancellation
export { checkCancelled, yieldToEventLoop } from './cancellation.js';

// Pipeline orchestration
export {
  INDEXING_STAGES,
  isIndexingStage,
  type IndexingStage,
  type StageStats,
  type ScanningStats,
  type ChunkingStats,
  type EmbeddingStats,
  type StoringStats,
  type IndexPipelineResult,
} from './stages.js';
export {
  checkpointIdFor,
  runIndexPipeline,
  type IndexPipelineOptions,
} from './pipeline.js';
