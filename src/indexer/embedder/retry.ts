/**
 * Retry policy for embedding requests
 *
 * Errors fall into three kinds:
 * - rate_limited: wait for retry-after when the server sent one, else back off
 * - transient: exponential back-off
 * - fatal: stop now
 *
 * Both retryable kinds share one attempt budget. Whatever finally escapes is
 * an EmbeddingFatalError wrapping the last provider error.
 */

import {
  EmbeddingFatalError,
  EmbeddingRateLimitedError,
  EmbeddingTransientError,
} from '../../errors/index.js';
import type { ErrorClassification, RetryOptions } from './types.js';

// ============================================================================
// Classification
// ============================================================================

/** Message fragments of errors that are worth retrying */
const TRANSIENT_ERROR_PATTERNS = [
  // Network errors
  'ECONNREFUSED',
  'ENOTFOUND',
  'ETIMEDOUT',
  'ECONNRESET',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
  'socket hang up',
  'fetch failed',

  'timeout',
  'timed out',
  'temporarily',
  'try again',
];

const RATE_LIMIT_PATTERNS = ['rate limit', 'too many requests'];

// Status codes only count as whole numbers: "1500 tokens" is not a 500
const TRANSIENT_STATUS = /\b(?:408|5\d\d)\b/;
const RATE_LIMIT_STATUS = /\b429\b/;

/** A numeric `status` or `statusCode`, as HTTP client errors carry */
function statusOf(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

/**
 * Decide whether an error from a provider is worth another attempt.
 */
export function classifyEmbeddingError(error: unknown): ErrorClassification {
  if (error instanceof EmbeddingRateLimitedError) {
    return { kind: 'rate_limited', retryAfterMs: error.retryAfterMs };
  }
  if (error instanceof EmbeddingTransientError) {
    return { kind: 'transient' };
  }
  if (error instanceof EmbeddingFatalError) {
    return { kind: 'fatal' };
  }
  if (!(error instanceof Error)) {
    return { kind: 'fatal' };
  }

  // AbortSignal.timeout() rejects with these
  if (error.name === 'TimeoutError' || error.name === 'AbortError') {
    return { kind: 'transient' };
  }

  const status = statusOf(error);
  if (status !== undefined) {
    if (status === 429) return { kind: 'rate_limited' };
    if (status === 408 || status >= 500) return { kind: 'transient' };
    return { kind: 'fatal' };
  }

  const code = 'code' in error && typeof error.code === 'string' ? error.code : '';
  const text = `${code} ${error.message}`.toLowerCase();

  if (RATE_LIMIT_STATUS.test(text) || RATE_LIMIT_PATTERNS.some((pattern) => text.includes(pattern))) {
    return { kind: 'rate_limited' };
  }
  if (
    TRANSIENT_STATUS.test(text) ||
    TRANSIENT_ERROR_PATTERNS.some((pattern) => text.includes(pattern.toLowerCase()))
  ) {
    return { kind: 'transient' };
  }
  return { kind: 'fatal' };
}

// ============================================================================
// Back-off
// ============================================================================

/**
 * Delay before the attempt after `attempt` (1-based).
 *
 * A server-provided wait wins over the exponential schedule; both are capped
 * by `maxDelayMs`.
 */
export function computeRetryDelay(
  attempt: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs'>,
  retryAfterMs?: number
): number {
  if (retryAfterMs !== undefined && retryAfterMs >= 0) {
    return Math.min(options.maxDelayMs, retryAfterMs);
  }
  return Math.min(options.maxDelayMs, options.baseDelayMs * 2 ** (attempt - 1));
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run `operation` until it succeeds, fails fatally, or the attempt budget
 * is spent.
 *
 * @throws EmbeddingFatalError with the last error as `cause`
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts);
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (caught) {
      if (caught instanceof EmbeddingFatalError) {
        throw caught;
      }

      const error = toError(caught);
      const classification = classifyEmbeddingError(error);

      if (classification.kind === 'fatal') {
        throw new EmbeddingFatalError(`Embedding failed: ${error.message}`, { cause: error });
      }
      if (attempt >= maxAttempts) {
        throw new EmbeddingFatalError(
          `Embedding failed after ${attempt} attempts: ${error.message}`,
          { cause: error }
        );
      }

      const delayMs = computeRetryDelay(attempt, options, classification.retryAfterMs);
      options.onRetry?.({ attempt, delayMs, kind: classification.kind, error });
      await sleep(delayMs);
    }
  }
}
