/**
 * Config → component options
 *
 * Maps the snake_case sections of config.toml onto the option objects the
 * indexer and retriever take, and resolves `~` and `~/.hix` in paths.
 */

import { resolve } from 'node:path';

import type { Config } from '../../config/index.js';
import { resolveConfigPath } from '../../config/index.js';
import type { BatchingOptions, ChunkOptions, RetryOptions } from '../../indexer/index.js';
import type { RetrieverOptions } from '../../search/index.js';

export interface IndexLocation {
  indexDir: string;
  checkpointDir: string;
}

/**
 * Resolve where the index and its checkpoints live.
 * An explicit `--index-dir` wins over `indexing.index_dir`.
 */
export function resolveIndexLocation(config: Config, indexDirOverride?: string): IndexLocation {
  return {
    indexDir: resolve(indexDirOverride ?? resolveConfigPath(config.indexing.index_dir)),
    checkpointDir: resolve(resolveConfigPath(config.indexing.checkpoint_dir)),
  };
}

export function chunkOptionsFrom(config: Config): ChunkOptions {
  return {
    targetTokens: config.chunking.target_tokens,
    overlapTokens: config.chunking.overlap_tokens,
  };
}

export function batchingOptionsFrom(config: Config): Omit<BatchingOptions, 'logger'> {
  return {
    batchTokenBudget: config.batching.batch_token_budget,
    maxSingleChunkTokens: config.batching.max_single_chunk_tokens,
  };
}

export function retryOptionsFrom(config: Config): RetryOptions {
  return {
    maxAttempts: config.retry.max_attempts,
    baseDelayMs: config.retry.base_delay_ms,
    maxDelayMs: config.retry.max_delay_ms,
  };
}

export function retrieverOptionsFrom(config: Config): RetrieverOptions {
  return {
    queryTokenCeiling: config.search.query_token_ceiling,
    fusion: {
      vectorWeight: config.search.vector_weight,
      lexicalWeight: config.search.lexical_weight,
      normalize: config.search.normalize_scores,
    },
  };
}
