/**
 * BM25 Store Manager
 *
 * Caches one BM25Index per IndexHandle so the corpus is tokenized once,
 * not on every query. An entry is rebuilt when the handle's revision
 * changes (an append happened) or its metadata length no longer matches.
 *
 * Handles are held weakly: dropping a handle drops its BM25 index.
 */

import { BM25Index } from './bm25.js';
import type { BM25Config, IndexHandle } from './types.js';

interface CacheEntry {
  revision: number;
  documents: number;
  config: string;
  index: BM25Index;
}

export class BM25StoreManager {
  private entries = new WeakMap<IndexHandle, CacheEntry>();
  private built = 0;

  /**
   * The BM25 index for `handle`, building it on first use or after the
   * corpus changed.
   */
  getIndex(handle: IndexHandle, config: BM25Config = {}): BM25Index {
    const key = JSON.stringify([config.k1 ?? null, config.b ?? null]);
    const cached = this.entries.get(handle);
    if (
      cached &&
      cached.revision === handle.revision &&
      cached.documents === handle.metadata.length &&
      cached.config === key
    ) {
      return cached.index;
    }

    const index = new BM25Index(
      handle.metadata.map((entry) => entry.text),
      config
    );
    this.entries.set(handle, {
      revision: handle.revision,
      documents: handle.metadata.length,
      config: key,
      index,
    });
    this.built++;
    return index;
  }

  /**
   * Drop the cached index for a handle.
   */
  invalidate(handle: IndexHandle): void {
    this.entries.delete(handle);
  }

  /**
   * Drop every cached index.
   */
  clearAll(): void {
    this.entries = new WeakMap();
  }

  /** How many indexes have been built since creation */
  get buildCount(): number {
    return this.built;
  }
}

// ============================================================================
// Singleton
// ============================================================================

let instance: BM25StoreManager | null = null;

/**
 * Get the shared BM25StoreManager.
 */
export function getBM25StoreManager(): BM25StoreManager {
  if (!instance) {
    instance = new BM25StoreManager();
  }
  return instance;
}

/**
 * Reset the shared manager (for tests).
 */
export function resetBM25StoreManager(): void {
  instance?.clearAll();
  instance = null;
}
