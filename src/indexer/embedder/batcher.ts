/**
 * Batch planning
 *
 * Groups texts into requests by estimated token count. A text above the
 * single-chunk ceiling is truncated first, and the truncation is reported
 * because the vector then covers less than the stored chunk.
 */

import { estimateTokens, truncateToTokenBudget } from '../chunker/tokens.js';
import { ValidationError } from '../../errors/index.js';
import type { BatchingOptions, PlannedBatch } from './types.js';

/**
 * Split `texts` into consecutive batches.
 *
 * A batch is closed when adding the next text would push it past
 * `batchTokenBudget`; a lone text larger than the budget still gets a
 * batch of its own. Batches cover the input in order without gaps.
 */
export function planBatches(texts: readonly string[], options: BatchingOptions): PlannedBatch[] {
  const { batchTokenBudget, maxSingleChunkTokens, logger } = options;

  if (!Number.isInteger(batchTokenBudget) || batchTokenBudget < 1) {
    throw new ValidationError('Invalid batching options', [
      `batch_token_budget must be a positive integer (got ${batchTokenBudget})`,
    ]);
  }
  if (!Number.isInteger(maxSingleChunkTokens) || maxSingleChunkTokens < 1) {
    throw new ValidationError('Invalid batching options', [
      `max_single_chunk_tokens must be a positive integer (got ${maxSingleChunkTokens})`,
    ]);
  }

  const batches: PlannedBatch[] = [];
  let current: PlannedBatch = { index: 0, start: 0, texts: [], tokens: 0 };

  texts.forEach((original, position) => {
    let text = original;
    let tokens = estimateTokens(text);

    if (tokens > maxSingleChunkTokens) {
      text = truncateToTokenBudget(text, maxSingleChunkTokens);
      logger?.warn(
        `Text ${position} truncated for embedding: ~${tokens} tokens exceeds ${maxSingleChunkTokens}`
      );
      tokens = estimateTokens(text);
    }

    if (current.texts.length > 0 && current.tokens + tokens > batchTokenBudget) {
      batches.push(current);
      current = { index: batches.length, start: position, texts: [], tokens: 0 };
    }

    current.texts.push(text);
    current.tokens += tokens;
  });

  if (current.texts.length > 0) {
    batches.push(current);
  }

  return batches;
}
