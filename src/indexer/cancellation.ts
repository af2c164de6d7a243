/**
 * Cooperative cancellation helpers shared by the pipeline and the embedder.
 */

import { IndexingCancelledError } from '../errors/index.js';

/**
 * Check if the abort signal has been triggered.
 *
 * @param signal - AbortSignal to check
 * @param checkpointPath - Checkpoint the caller can resume from, if any
 * @throws IndexingCancelledError if signal is aborted
 */
export function checkCancelled(signal?: AbortSignal, checkpointPath?: string): void {
  if (signal?.aborted) {
    throw new IndexingCancelledError(checkpointPath);
  }
}

/**
 * Yield to the event loop so signal handlers and spinners get a turn
 * between long synchronous steps.
 */
export function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
