/**
 * Embedder Types
 *
 * Providers speak plain `number[][]`; everything past the provider boundary
 * uses Float32Array, the layout the vector index and checkpoint store
 * persist (4 bytes per dimension).
 */

import type { Config } from '../../config/schema.js';
import type { Logger } from '../../utils/index.js';
import type { CheckpointStore } from '../checkpoint/store.js';

/**
 * Anything that turns a list of texts into one vector per text.
 *
 * Implementations signal failures with the embedding error classes from
 * errors/types.ts so the retry loop can classify them; any other error is
 * classified by its message.
 */
export interface EmbeddingProvider {
  /** Provider family, e.g. "ollama" */
  readonly name: string;
  /** Model identifier sent to the provider */
  readonly model: string;
  /** One vector per input text, in input order */
  embedBatch(texts: string[]): Promise<number[][]>;
}

/**
 * Matches the [embedding] section in config.toml.
 */
export type EmbeddingConfig = Config['embedding'];

/**
 * Options for creating an embedding provider.
 */
export interface ProviderOptions {
  /** Logger for fallback notices (e.g. Ollama's legacy endpoint) */
  logger?: Logger;
  /** fetch implementation, for tests; defaults to the global fetch */
  fetch?: typeof fetch;
}

// ============================================================================
// Batching
// ============================================================================

export interface BatchingOptions {
  /** Estimated tokens per request */
  batchTokenBudget: number;
  /** Texts above this are truncated before embedding */
  maxSingleChunkTokens: number;
  /** Receives a warning for every lossy truncation */
  logger?: Logger;
}

/**
 * One request's worth of texts.
 */
export interface PlannedBatch {
  /** 0-based batch number */
  index: number;
  /** Position of the first text in the input list */
  start: number;
  /** Texts to send (already truncated) */
  texts: string[];
  /** Sum of the estimated tokens of `texts` */
  tokens: number;
}

// ============================================================================
// Retry
// ============================================================================

export type EmbeddingErrorKind = 'rate_limited' | 'transient' | 'fatal';

export interface ErrorClassification {
  kind: EmbeddingErrorKind;
  /** Server-requested wait, for rate-limited errors */
  retryAfterMs?: number;
}

export interface RetryOptions {
  /** Attempts per operation, including the first */
  maxAttempts: number;
  /** First back-off delay; doubles per attempt */
  baseDelayMs: number;
  /** Ceiling for any single delay, including retry-after */
  maxDelayMs: number;
  /** Replaceable for tests */
  sleep?: (ms: number) => Promise<void>;
  /** Called before each back-off sleep */
  onRetry?: (info: RetryInfo) => void;
}

export interface RetryInfo {
  /** The attempt that just failed (1-based) */
  attempt: number;
  delayMs: number;
  kind: Exclude<EmbeddingErrorKind, 'fatal'>;
  error: Error;
}

// ============================================================================
// Orchestration
// ============================================================================

/**
 * Options for embedChunks().
 */
export interface EmbedderOptions {
  batching: BatchingOptions;
  retry: RetryOptions;

  /**
   * Checkpoint to resume from and append to. Without one a failed job
   * starts over.
   */
  checkpoint?: {
    store: CheckpointStore;
    id: string;
  };

  /** Checked before each batch is sent */
  signal?: AbortSignal;

  /**
   * Fired after each batch is available (sent or restored).
   * @param embedded - Texts embedded so far
   * @param total - Texts in the job
   */
  onProgress?: (embedded: number, total: number) => void;

  /** Fired once per batch restored from the checkpoint */
  onBatchResumed?: (batch: PlannedBatch) => void;
}
