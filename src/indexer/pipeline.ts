/**
 * Index Pipeline
 *
 * Orchestrates the complete indexing workflow:
 * Scan → Chunk → Embed → Store
 *
 * This is the "conductor" that coordinates all the indexing components.
 * It doesn't know HOW to display progress - that's the ProgressReporter's job.
 * It just fires callbacks at the right moments.
 *
 * Design principles:
 * - Each stage has clear start/progress/complete callbacks
 * - Non-fatal errors (unreadable files, unchunkable documents) are collected, not thrown
 * - Embedding resumes from the job's checkpoint; the checkpoint is cleared
 *   only after the index files are safely written
 * - Can be used programmatically (without CLI)
 */

import { createHash } from 'node:crypto';
import { statSync } from 'node:fs';
import { resolve } from 'node:path';

import { IndexMismatchError, ValidationError } from '../errors/index.js';
import {
  appendToIndex,
  buildIndex,
  getIndexPaths,
  indexExists,
  loadIndex,
  persistIndex,
} from '../search/index-store.js';
import type { IndexHandle } from '../search/types.js';
import type { Logger } from '../utils/index.js';
import { checkCancelled } from './cancellation.js';
import { CheckpointStore } from './checkpoint/index.js';
import { chunkDocuments, type ChunkOptions } from './chunker/index.js';
import { loadDocuments, manualNoteDocuments } from './documents.js';
import { embedChunks, type BatchingOptions, type EmbeddingProvider, type RetryOptions } from './embedder/index.js';
import { scanDirectory } from './scanner.js';
import type { IndexingStage, IndexPipelineResult, StageStats } from './stages.js';
import { emptyTypeCounts, type Document, type FileInfo, type ScanStats } from './types.js';

/**
 * Options for running the index pipeline.
 */
export interface IndexPipelineOptions {
  /** Directory to scan; omit to index manual notes only */
  rootPath?: string;

  /** Manual notes to index alongside the files */
  notes?: string[];

  /** Where index.vec and index.meta.json live */
  indexDir: string;

  /** Where embedding checkpoints live */
  checkpointDir: string;

  /**
   * Grow the existing index instead of replacing it. The existing index
   * must have been built with the same model and dimension.
   */
  append?: boolean;

  /** Embedding provider instance */
  embeddingProvider: EmbeddingProvider;

  chunkOptions: ChunkOptions;

  batching: Omit<BatchingOptions, 'logger'>;

  retry: RetryOptions;

  /** Extra gitignore-style patterns for the scanner */
  ignorePatterns?: string[];

  /**
   * AbortSignal for cancellation support.
   *
   * Honoured between stages and between embedding batches. A cancelled
   * run leaves its checkpoint in place; the next run with the same input
   * picks up where it stopped.
   *
   * @example
   * ```typescript
   * const controller = new AbortController();
   * process.once('SIGINT', () => controller.abort());
   * await runIndexPipeline({ ...options, signal: controller.signal });
   * ```
   */
  signal?: AbortSignal;

  // Progress callbacks
  onStageStart?: (stage: IndexingStage, total: number) => void;
  onProgress?: (stage: IndexingStage, processed: number, total: number, currentFile?: string) => void;
  onStageComplete?: (stage: IndexingStage, stats: StageStats) => void;
  onWarning?: (message: string, context?: string) => void;
  onError?: (error: Error, context?: string) => void;
}

/**
 * Checkpoint id for a job: its mode plus a hash of the index directory,
 * so a build and an append of the same index never share a checkpoint.
 */
export function checkpointIdFor(indexDir: string, append: boolean): string {
  const digest = createHash('sha256').update(resolve(indexDir)).digest('hex').slice(0, 12);
  return `${append ? 'append' : 'build'}-${digest}`;
}

function fileSize(path: string): number {
  return statSync(path).size;
}

/**
 * Run the complete indexing pipeline.
 *
 * This is the main entry point for indexing. It:
 * 1. Scans the directory for files
 * 2. Reads them (plus any manual notes) and chunks them
 * 3. Embeds chunks in checkpointed batches
 * 4. Builds or grows the index and writes it to disk
 *
 * @example
 * ```typescript
 * const reporter = createProgressReporter({ json: false, verbose: true });
 * const provider = createEmbeddingProvider(config.embedding);
 *
 * const result = await runIndexPipeline({
 *   rootPath: '/path/to/solution',
 *   indexDir: config.indexing.index_dir,
 *   checkpointDir: config.indexing.checkpoint_dir,
 *   embeddingProvider: provider,
 *   chunkOptions: { targetTokens: 500, overlapTokens: 50 },
 *   batching: { batchTokenBudget: 4000, maxSingleChunkTokens: 4500 },
 *   retry: { maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 60000 },
 *   onStageStart: (stage, total) => reporter.startStage(stage, total),
 *   onProgress: (stage, processed, total, file) => reporter.updateProgress(processed, file),
 *   onStageComplete: (stage, stats) => reporter.completeStage(stats),
 *   onWarning: (msg, ctx) => reporter.warn(msg, ctx),
 *   onError: (err, ctx) => reporter.error(err.message, ctx),
 * });
 *
 * reporter.showSummary(result);
 * ```
 *
 * @throws ValidationError when there is nothing to index, or --append has no index to grow
 * @throws EmbeddingFatalError carrying the checkpoint path
 * @throws IndexingCancelledError when `signal` aborts
 * @throws IndexMismatchError / PersistenceError from the index store
 */
export async function runIndexPipeline(
  options: IndexPipelineOptions
): Promise<IndexPipelineResult> {
  const {
    rootPath,
    notes = [],
    indexDir,
    embeddingProvider,
    signal,
    onStageStart,
    onProgress,
    onStageComplete,
    onWarning,
    onError,
  } = options;
  const append = options.append ?? false;

  const pipelineStartTime = performance.now();
  const stageDurations: Partial<Record<IndexingStage, number>> = {};
  const warnings: string[] = [];
  const errors: string[] = [];

  // Library components report lossy steps (truncation, stale checkpoints) here
  const logger: Logger = {
    warn: (message: string) => {
      warnings.push(message);
      onWarning?.(message);
    },
  };

  // Fail before any embedding work when there is nothing to append to
  if (append && !indexExists(indexDir)) {
    throw new ValidationError(`No index to append to in ${indexDir}`, [
      'Run without --append to build a new index',
    ]);
  }

  // =========================================================================
  // STAGE 1: SCANNING
  // =========================================================================
  checkCancelled(signal);
  const scanStartTime = performance.now();
  onStageStart?.('scanning', 0); // Unknown total at start

  let files: FileInfo[] = [];
  let scanStats: Pick<ScanStats, 'totalSize' | 'byType'> = { totalSize: 0, byType: emptyTypeCounts() };
  let filesScanned = 0;

  if (rootPath !== undefined) {
    const scanResult = await scanDirectory(rootPath, {
      additionalIgnorePatterns: options.ignorePatterns,
      logger,
      onFile: (file: FileInfo) => {
        filesScanned++;
        onProgress?.('scanning', filesScanned, 0, file.relativePath);
      },
      onError: (path: string, error: Error) => {
        const msg = `Failed to process: ${error.message}`;
        warnings.push(`${path}: ${msg}`);
        onWarning?.(msg, path);
      },
    });
    files = scanResult.files;
    scanStats = scanResult.stats;
  }

  const scanDuration = performance.now() - scanStartTime;
  stageDurations.scanning = Math.round(scanDuration);

  onStageComplete?.('scanning', {
    stage: 'scanning',
    processed: files.length,
    total: files.length,
    durationMs: Math.round(scanDuration),
    totalSize: scanStats.totalSize,
    byType: scanStats.byType,
  });

  // =========================================================================
  // STAGE 2: CHUNKING
  // =========================================================================
  checkCancelled(signal);
  const chunkStartTime = performance.now();

  const loaded = loadDocuments(files, {
    onError: (file: FileInfo, error: Error) => {
      onError?.(error, file.relativePath);
    },
  });
  for (const error of loaded.errors) errors.push(error);

  const documents: Document[] = [...loaded.documents, ...manualNoteDocuments(notes)];
  onStageStart?.('chunking', documents.length);

  const chunkResult = chunkDocuments(documents, options.chunkOptions, {
    onDocument: (processed: number, total: number, sourceId: string) => {
      onProgress?.('chunking', processed, total, sourceId);
    },
    onError: (error: Error, sourceId: string) => {
      onError?.(error, sourceId);
    },
  });
  for (const error of chunkResult.errors) errors.push(error);

  const chunksCreated = chunkResult.chunks;

  const chunkDuration = performance.now() - chunkStartTime;
  stageDurations.chunking = Math.round(chunkDuration);

  onStageComplete?.('chunking', {
    stage: 'chunking',
    processed: chunksCreated.length,
    total: chunksCreated.length,
    durationMs: Math.round(chunkDuration),
    documentsProcessed: chunkResult.stats.documents - chunkResult.stats.failed,
    documentsFailed: chunkResult.stats.failed + loaded.errors.length,
    byKind: chunkResult.stats.byKind,
  });

  if (chunksCreated.length === 0) {
    throw new ValidationError('Nothing to index: no readable documents produced any chunks', [
      rootPath !== undefined ? `Scanned ${files.length} files under ${rootPath}` : 'No directory given',
      `${notes.length} manual notes`,
    ]);
  }

  // =========================================================================
  // STAGE 3: EMBEDDING
  // =========================================================================
  checkCancelled(signal);
  const embedStartTime = performance.now();
  onStageStart?.('embedding', chunksCreated.length);

  const checkpointStore = new CheckpointStore(options.checkpointDir, { logger });
  const checkpointId = checkpointIdFor(indexDir, append);
  const checkpointPath = checkpointStore.pathFor(checkpointId);
  let batchesDone = 0;
  let resumedBatches = 0;
  let retries = 0;
  let vectors: Float32Array[];

  try {
    vectors = await embedChunks(chunksCreated, embeddingProvider, {
      batching: { ...options.batching, logger },
      retry: {
        ...options.retry,
        onRetry: (info) => {
          retries++;
          options.retry.onRetry?.(info);
          onWarning?.(
            `Embedding attempt ${info.attempt} failed (${info.kind}), retrying in ${info.delayMs}ms: ${info.error.message}`
          );
        },
      },
      checkpoint: { store: checkpointStore, id: checkpointId },
      signal,
      // One call per finished batch, resumed or sent
      onProgress: (processed: number, total: number) => {
        batchesDone++;
        onProgress?.('embedding', processed, total);
      },
      onBatchResumed: () => {
        resumedBatches++;
      },
    });
  } catch (error) {
    checkpointStore.close();
    throw error;
  }

  const embedDuration = performance.now() - embedStartTime;
  stageDurations.embedding = Math.round(embedDuration);

  onStageComplete?.('embedding', {
    stage: 'embedding',
    processed: vectors.length,
    total: chunksCreated.length,
    durationMs: Math.round(embedDuration),
    model: `${embeddingProvider.name}/${embeddingProvider.model}`,
    batches: batchesDone,
    resumedBatches,
    retries,
  });

  // =========================================================================
  // STAGE 4: STORING
  // =========================================================================
  const storeStartTime = performance.now();
  let handle: IndexHandle;

  try {
    checkCancelled(signal, checkpointPath);
    onStageStart?.('storing', vectors.length);

    if (append) {
      handle = loadIndex(indexDir);
      if (handle.model !== embeddingProvider.model) {
        throw new IndexMismatchError(
          `Index in ${indexDir} was built with model '${handle.model}', not '${embeddingProvider.model}'`
        );
      }
      appendToIndex(handle, vectors, chunksCreated);
    } else {
      handle = buildIndex(vectors, chunksCreated, embeddingProvider.model);
    }

    persistIndex(handle, indexDir);
    onProgress?.('storing', vectors.length, vectors.length);

    // The vectors are on disk now; the checkpoint has served its purpose
    checkpointStore.clear(checkpointId);
  } finally {
    checkpointStore.close();
  }

  const storeDuration = performance.now() - storeStartTime;
  stageDurations.storing = Math.round(storeDuration);

  onStageComplete?.('storing', {
    stage: 'storing',
    processed: vectors.length,
    total: vectors.length,
    durationMs: Math.round(storeDuration),
    totalVectors: handle.vectors.size,
  });

  const { vectorsPath, metadataPath } = getIndexPaths(indexDir);
  const totalDuration = performance.now() - pipelineStartTime;

  return {
    mode: append ? 'append' : 'build',
    indexDir,
    filesIndexed: loaded.documents.length,
    documentsIndexed: documents.length,
    chunksCreated: chunksCreated.length,
    chunksStored: vectors.length,
    totalVectors: handle.vectors.size,
    resumedBatches,
    totalDurationMs: Math.round(totalDuration),
    stageDurations,
    indexSizeBytes: fileSize(vectorsPath) + fileSize(metadataPath),
    warnings,
    errors,
  };
}
