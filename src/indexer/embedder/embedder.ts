/**
 * Embedder Orchestration
 *
 * Turns chunks into vectors, one planned batch at a time:
 * - batches come from planBatches() (token-budgeted, oversize texts truncated)
 * - each request runs under withRetry()
 * - each finished batch is saved to the checkpoint before the next starts
 * - batches already in the checkpoint are restored instead of re-sent
 *
 * Output order always equals input order.
 */

import { createHash } from 'node:crypto';

import { EmbeddingFatalError } from '../../errors/index.js';
import { checkCancelled, yieldToEventLoop } from '../cancellation.js';
import type { CheckpointBatch } from '../checkpoint/types.js';
import { planBatches } from './batcher.js';
import { withRetry } from './retry.js';
import type {
  BatchingOptions,
  EmbedderOptions,
  EmbeddingProvider,
  PlannedBatch,
} from './types.js';

/**
 * Fingerprint of an embedding job's input.
 *
 * Covers everything that decides which vector lands at which position:
 * provider, model, batch plan settings and the texts themselves.
 */
export function embeddingFingerprint(
  provider: Pick<EmbeddingProvider, 'name' | 'model'>,
  batching: Pick<BatchingOptions, 'batchTokenBudget' | 'maxSingleChunkTokens'>,
  texts: readonly string[]
): string {
  const hash = createHash('sha256');
  hash.update(
    JSON.stringify([
      provider.name,
      provider.model,
      batching.batchTokenBudget,
      batching.maxSingleChunkTokens,
      texts.length,
    ])
  );
  for (const text of texts) {
    hash.update('\0');
    hash.update(text);
  }
  return hash.digest('hex');
}

/**
 * Validate a provider response for one batch and convert it.
 *
 * @param expectedDimensions - Dimension fixed by earlier batches, if any
 */
function toVectors(
  raw: number[][],
  batch: PlannedBatch,
  expectedDimensions: number | null
): { vectors: Float32Array[]; dimensions: number } {
  if (raw.length !== batch.texts.length) {
    throw new EmbeddingFatalError(
      `Provider returned ${raw.length} vectors for a batch of ${batch.texts.length}`
    );
  }

  const dimensions = expectedDimensions ?? raw[0]?.length ?? 0;
  if (dimensions === 0) {
    throw new EmbeddingFatalError('Provider returned empty vectors');
  }

  const vectors = raw.map((vector, i) => {
    if (vector.length !== dimensions) {
      throw new EmbeddingFatalError(
        `Embedding dimension mismatch: vector ${batch.start + i} has ${vector.length} dimensions, expected ${dimensions}`
      );
    }
    return Float32Array.from(vector);
  });
  return { vectors, dimensions };
}

/**
 * Whether a checkpointed batch lines up with the planned one.
 */
function matchesPlan(saved: CheckpointBatch, batch: PlannedBatch): boolean {
  return saved.start === batch.start && saved.count === batch.texts.length;
}

/**
 * Embed chunks in batches, resuming from a checkpoint when one is given.
 *
 * @example
 * ```typescript
 * const store = new CheckpointStore(checkpointDir);
 * const vectors = await embedChunks(chunks, provider, {
 *   batching: { batchTokenBudget: 4000, maxSingleChunkTokens: 4500 },
 *   retry: { maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 60000 },
 *   checkpoint: { store, id: 'build-1a2b3c' },
 * });
 * store.clear('build-1a2b3c'); // once the vectors are persisted
 * ```
 *
 * @returns One vector per chunk, in input order
 * @throws EmbeddingFatalError on a non-retryable error or exhausted retries,
 *   carrying the checkpoint path when a checkpoint is in use
 * @throws IndexingCancelledError when `signal` aborts between batches
 */
export async function embedChunks(
  chunks: ReadonlyArray<{ text: string }>,
  provider: EmbeddingProvider,
  options: EmbedderOptions
): Promise<Float32Array[]> {
  if (chunks.length === 0) {
    return [];
  }

  const { checkpoint, signal, onProgress, onBatchResumed } = options;
  const texts = chunks.map((chunk) => chunk.text);
  const batches = planBatches(texts, options.batching);
  const checkpointPath = checkpoint ? checkpoint.store.pathFor(checkpoint.id) : undefined;

  const saved = checkpoint
    ? checkpoint.store.load(
        checkpoint.id,
        embeddingFingerprint(provider, options.batching, texts)
      )
    : new Map<number, CheckpointBatch>();

  const output: Float32Array[] = [];
  let dimensions: number | null = null;

  try {
    for (const batch of batches) {
      const restored = saved.get(batch.index);

      if (restored && matchesPlan(restored, batch)) {
        if (dimensions !== null && restored.dimensions !== dimensions) {
          throw new EmbeddingFatalError(
            `Checkpoint batch ${batch.index} has ${restored.dimensions} dimensions, expected ${dimensions}`
          );
        }
        dimensions = restored.dimensions;
        for (const vector of restored.vectors) output.push(vector);
        onBatchResumed?.(batch);
        onProgress?.(output.length, texts.length);
        continue;
      }

      checkCancelled(signal, checkpointPath);

      const expected: number | null = dimensions;
      const embedded: { vectors: Float32Array[]; dimensions: number } = await withRetry(
        async () => toVectors(await provider.embedBatch(batch.texts), batch, expected),
        options.retry
      );
      const { vectors } = embedded;
      dimensions = embedded.dimensions;

      checkpoint?.store.save(checkpoint.id, {
        index: batch.index,
        start: batch.start,
        count: vectors.length,
        dimensions: embedded.dimensions,
        vectors,
      });

      for (const vector of vectors) output.push(vector);
      onProgress?.(output.length, texts.length);
      await yieldToEventLoop();
    }
  } catch (error) {
    if (error instanceof EmbeddingFatalError && checkpointPath) {
      throw error.withCheckpoint(checkpointPath);
    }
    throw error;
  }

  return output;
}
