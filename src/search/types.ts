/**
 * Search Module Types
 *
 * The index handle (vectors plus their position-aligned metadata) and the
 * shapes going in and out of the hybrid retriever.
 */

import type { Chunk } from '../indexer/chunker/types.js';
import type { Logger } from '../utils/index.js';
import type { FlatL2Index } from './vector-index.js';

// ============================================================================
// Index
// ============================================================================

/**
 * Per-position metadata: the chunk the vector was embedded from.
 */
export type ChunkMetadata = Chunk;

/**
 * A vector index and its metadata, always mutated together.
 *
 * `vectors.size === metadata.length` after every successful build or append.
 */
export interface IndexHandle {
  vectors: FlatL2Index;
  metadata: ChunkMetadata[];

  /** Embedding model the vectors came from */
  model: string;

  /**
   * Bumped by every append. Caches derived from the corpus (the BM25
   * index) are keyed on it.
   */
  revision: number;
}

/**
 * Result of verifyIndex().
 */
export interface IndexVerification {
  consistent: boolean;
  vectorCount: number;
  metadataCount: number;
  dimensions: number;
  /** Human-readable problems, empty when consistent */
  issues: string[];
}

/**
 * Paths of the two files an index is persisted as.
 */
export interface IndexPaths {
  vectorsPath: string;
  metadataPath: string;
}

// ============================================================================
// Retrieval
// ============================================================================

/**
 * Which signals produced a ranking.
 * - hybrid: vector similarity fused with BM25
 * - lexical: BM25 only (the query could not be embedded)
 */
export type RetrievalMode = 'hybrid' | 'lexical';

/**
 * A ranked chunk. Transient, never persisted.
 */
export interface RetrievalResult {
  /** 1-based */
  rank: number;

  /** Fused score used for ordering */
  score: number;

  /** Similarity component before weighting (0 outside the vector candidates) */
  vectorScore: number;

  /** BM25 component before weighting */
  lexicalScore: number;

  /** Position in the index */
  position: number;

  metadata: ChunkMetadata;
}

/**
 * Results of one query.
 */
export interface RetrievalResponse {
  mode: RetrievalMode;
  results: RetrievalResult[];
  /** Set when the query text was cut to the token ceiling */
  queryTruncated: boolean;
  searchTimeMs: number;
}

/**
 * BM25 parameters.
 */
export interface BM25Config {
  /** Term-frequency saturation (default 1.2) */
  k1?: number;
  /** Length normalization (default 0.75) */
  b?: number;
}

/**
 * How the two score components are combined.
 */
export interface FusionConfig {
  vectorWeight: number;
  lexicalWeight: number;
  /** Divide each component by its maximum over the candidates first */
  normalize: boolean;
}

/**
 * Options for HybridRetriever.
 */
export interface RetrieverOptions {
  /** Queries estimated above this many tokens are truncated (default 7000) */
  queryTokenCeiling?: number;
  fusion?: Partial<FusionConfig>;
  bm25?: BM25Config;
  /** Told when a query degrades to lexical-only */
  logger?: Logger;
}
