/**
 * Chunker Module
 *
 * Structure-aware, token-budgeted chunking.
 *
 * @example
 * ```typescript
 * import { chunkDocument } from './chunker/index.js';
 *
 * const chunks = chunkDocument(doc, { targetTokens: 500, overlapTokens: 50 });
 * ```
 */

export { chunkDocument, chunkDocuments, resolveBudget, type ChunkDocumentsCallbacks } from './chunker.js';
export { classifyContent } from './classifier.js';
export {
  estimateTokens,
  truncateToTokenBudget,
  longestFittingPrefix,
  maxCharsWithin,
  TRUNCATION_MARKER,
} from './tokens.js';
export { STRATEGIES } from './strategies/index.js';
export type {
  Chunk,
  ChunkOptions,
  ChunkSpan,
  ChunkStrategy,
  ContentKind,
  PackBudget,
  Unit,
  BatchChunkResult,
} from './types.js';
