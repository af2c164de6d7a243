/**
 * BM25 Scorer
 *
 * Okapi BM25 over an in-memory inverted index:
 *
 *   score(d, q) = Σ idf(t) · tf(t, d) · (k1 + 1) / (tf(t, d) + k1 · (1 − b + b · |d| / avgdl))
 *   idf(t)      = ln(1 + (N − n(t) + 0.5) / (n(t) + 0.5))
 *
 * idf is never negative, so a term that appears in most documents still
 * adds a little instead of penalising them.
 */

import type { BM25Config } from './types.js';

const TOKEN = /[\p{L}\p{N}_]+/gu;

export const DEFAULT_BM25_CONFIG: Required<BM25Config> = {
  k1: 1.2,
  b: 0.75,
};

/**
 * Lowercase word tokens: runs of Unicode letters, digits and underscores.
 */
export function tokenize(text: string): string[] {
  return Array.from(text.toLowerCase().matchAll(TOKEN), (match) => match[0]);
}

interface Posting {
  doc: number;
  tf: number;
}

export class BM25Index {
  private readonly postings = new Map<string, Posting[]>();
  private readonly lengths: number[];
  private readonly averageLength: number;
  private readonly config: Required<BM25Config>;

  constructor(texts: readonly string[], config: BM25Config = {}) {
    this.config = { ...DEFAULT_BM25_CONFIG, ...config };
    this.lengths = [];

    texts.forEach((text, doc) => {
      const tokens = tokenize(text);
      this.lengths.push(tokens.length);

      const counts = new Map<string, number>();
      for (const token of tokens) {
        counts.set(token, (counts.get(token) ?? 0) + 1);
      }
      for (const [term, tf] of counts) {
        const list = this.postings.get(term);
        if (list) {
          list.push({ doc, tf });
        } else {
          this.postings.set(term, [{ doc, tf }]);
        }
      }
    });

    const total = this.lengths.reduce((sum, length) => sum + length, 0);
    this.averageLength = this.lengths.length === 0 ? 0 : total / this.lengths.length;
  }

  /** Number of documents indexed */
  get documentCount(): number {
    return this.lengths.length;
  }

  /**
   * Inverse document frequency of a (lowercase) term.
   */
  idf(term: string): number {
    const n = this.postings.get(term)?.length ?? 0;
    const N = this.lengths.length;
    return Math.log(1 + (N - n + 0.5) / (n + 0.5));
  }

  /**
   * Score every document against `query`; index `i` holds document `i`'s
   * score. A repeated query term counts once per repetition.
   */
  scores(query: string): number[] {
    const { k1, b } = this.config;
    const result = new Array<number>(this.lengths.length).fill(0);

    for (const term of tokenize(query)) {
      const postings = this.postings.get(term);
      if (!postings) {
        continue;
      }
      const idf = this.idf(term);
      for (const { doc, tf } of postings) {
        const length = this.lengths[doc] ?? 0;
        const relativeLength = this.averageLength === 0 ? 0 : length / this.averageLength;
        const score = (idf * tf * (k1 + 1)) / (tf + k1 * (1 - b + b * relativeLength));
        result[doc] = (result[doc] ?? 0) + score;
      }
    }

    return result;
  }
}
