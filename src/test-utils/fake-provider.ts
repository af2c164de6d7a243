/**
 * In-process embedding provider for tests
 *
 * Hashes each lowercase word into one of `dimensions` buckets and
 * L2-normalizes the counts, so texts sharing words land close together
 * and nothing leaves the process.
 */

import type { EmbeddingProvider } from '../indexer/embedder/types.js';

const WORD = /[\p{L}\p{N}_]+/gu;

/** FNV-1a, 32 bit */
function hashWord(word: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < word.length; i++) {
    hash ^= word.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * Bag-of-words vector for `text`.
 */
export function hashedEmbedding(text: string, dimensions: number): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const match of text.toLowerCase().matchAll(WORD)) {
    const bucket = hashWord(match[0]) % dimensions;
    vector[bucket] = (vector[bucket] ?? 0) + 1;
  }

  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  return norm === 0 ? vector : vector.map((v) => v / norm);
}

export interface FakeProviderOptions {
  dimensions?: number;
  model?: string;
  /**
   * Errors thrown by successive embedBatch() calls, in order. `null`
   * entries let that call succeed.
   */
  failures?: Array<Error | null>;
}

/**
 * Deterministic provider that records every batch it receives.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'fake';
  readonly model: string;
  readonly dimensions: number;
  /** Texts of every embedBatch() call, including failed ones */
  readonly calls: string[][] = [];

  private readonly failures: Array<Error | null>;

  constructor(options: FakeProviderOptions = {}) {
    this.dimensions = options.dimensions ?? 64;
    this.model = options.model ?? 'fake-hash';
    this.failures = [...(options.failures ?? [])];
  }

  /** Queue more failures for upcoming calls */
  failNext(...errors: Array<Error | null>): void {
    this.failures.push(...errors);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
    return texts.map((text) => hashedEmbedding(text, this.dimensions));
  }
}
