/**
 * Pipeline stage and result types, shared by the pipeline and whatever
 * renders its progress.
 */

import type { ContentKind } from './chunker/index.js';
import type { DocumentType } from './types.js';

/** Stages in the order the pipeline runs them */
export const INDEXING_STAGES = ['scanning', 'chunking', 'embedding', 'storing'] as const;

export type IndexingStage = (typeof INDEXING_STAGES)[number];

export function isIndexingStage(value: string): value is IndexingStage {
  return INDEXING_STAGES.some((stage) => stage === value);
}

interface StageTiming {
  /** Items handled by the stage: files, chunks or vectors */
  processed: number;
  total: number;
  durationMs: number;
}

export interface ScanningStats extends StageTiming {
  stage: 'scanning';
  /** Bytes across all discovered files */
  totalSize: number;
  byType: Record<DocumentType, number>;
}

export interface ChunkingStats extends StageTiming {
  stage: 'chunking';
  documentsProcessed: number;
  /** Unreadable files plus documents the chunker gave up on */
  documentsFailed: number;
  byKind: Record<ContentKind, number>;
}

export interface EmbeddingStats extends StageTiming {
  stage: 'embedding';
  /** `provider/model` */
  model: string;
  batches: number;
  resumedBatches: number;
  retries: number;
}

export interface StoringStats extends StageTiming {
  stage: 'storing';
  /** Vectors in the index after this run */
  totalVectors: number;
}

/** What a stage reports when it finishes, keyed by `stage` */
export type StageStats = ScanningStats | ChunkingStats | EmbeddingStats | StoringStats;

/**
 * Final result of the indexing pipeline.
 */
export interface IndexPipelineResult {
  /** Whether a fresh index was built or an existing one grown */
  mode: 'build' | 'append';

  /** Directory holding index.vec and index.meta.json */
  indexDir: string;

  filesIndexed: number;

  /** Files plus manual notes */
  documentsIndexed: number;

  chunksCreated: number;

  /** Vectors added to the index by this run */
  chunksStored: number;

  /** Vectors in the index afterwards */
  totalVectors: number;

  /** Embedding batches restored from a checkpoint instead of re-sent */
  resumedBatches: number;

  totalDurationMs: number;

  stageDurations: Partial<Record<IndexingStage, number>>;

  /** Size of the two index files in bytes */
  indexSizeBytes: number;

  warnings: string[];

  /** Documents that could not be read or chunked, as `source: message` */
  errors: string[];
}
