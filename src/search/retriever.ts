/**
 * Hybrid Retriever
 *
 * Ranks the chunks of an index against a query by fusing two signals:
 * 1. Vector similarity, 1 / (squared distance + 1e-6), over the 2·topK
 *    nearest neighbours of the embedded query
 * 2. BM25 relevance of every chunk's text
 *
 * When the query can't be embedded (provider down, bad response, or no
 * provider at all) the ranking falls back to BM25 alone and reports
 * `mode: 'lexical'`.
 */

import { ValidationError } from '../errors/index.js';
import { truncateToTokenBudget } from '../indexer/chunker/tokens.js';
import type { EmbeddingProvider } from '../indexer/embedder/types.js';
import { consoleLogger, type Logger } from '../utils/index.js';
import { getBM25StoreManager } from './bm25-store.js';
import { DEFAULT_FUSION_CONFIG, fuseScores } from './fusion.js';
import type {
  BM25Config,
  FusionConfig,
  IndexHandle,
  RetrievalMode,
  RetrievalResponse,
  RetrieverOptions,
} from './types.js';

export const DEFAULT_QUERY_TOKEN_CEILING = 7000;

/** Keeps the similarity finite for an exact match */
const DISTANCE_EPSILON = 1e-6;

/**
 * Distance-to-similarity transform for squared Euclidean distances.
 */
export function distanceToSimilarity(squaredDistance: number): number {
  return 1 / (squaredDistance + DISTANCE_EPSILON);
}

/**
 * Hybrid search over one IndexHandle.
 *
 * Read-only: queries never change the handle, and independent queries
 * may run concurrently.
 *
 * @example
 * ```typescript
 * const handle = loadIndex('.hix/index');
 * const retriever = new HybridRetriever(handle, provider, { logger });
 * const { results } = await retriever.query('user authentication', 5);
 * for (const result of results) {
 *   console.log(`${result.rank}. ${result.metadata.sourceId} (${result.score.toFixed(3)})`);
 * }
 * ```
 */
export class HybridRetriever {
  private readonly handle: IndexHandle;
  private readonly provider: EmbeddingProvider | null;
  private readonly queryTokenCeiling: number;
  private readonly fusion: FusionConfig;
  private readonly bm25: BM25Config;
  private readonly logger: Logger;

  /**
   * @param provider - Embeds the query; null ranks by BM25 only
   */
  constructor(handle: IndexHandle, provider: EmbeddingProvider | null, options: RetrieverOptions = {}) {
    this.handle = handle;
    this.provider = provider;
    this.queryTokenCeiling = options.queryTokenCeiling ?? DEFAULT_QUERY_TOKEN_CEILING;
    this.fusion = { ...DEFAULT_FUSION_CONFIG, ...options.fusion };
    this.bm25 = options.bm25 ?? {};
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Rank chunks against `queryText`, best first, at most `topK` of them.
   *
   * @throws ValidationError if topK is not a positive integer
   */
  async query(queryText: string, topK: number): Promise<RetrievalResponse> {
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new ValidationError(`topK must be a positive integer, got ${topK}`);
    }

    const startTime = performance.now();
    const embeddingText = truncateToTokenBudget(queryText, this.queryTokenCeiling);
    const queryTruncated = embeddingText !== queryText;

    const vectorScores = await this.vectorCandidates(embeddingText, topK * 2);
    const mode: RetrievalMode = vectorScores === null ? 'lexical' : 'hybrid';

    const lexicalScores = getBM25StoreManager().getIndex(this.handle, this.bm25).scores(queryText);
    const fused = fuseScores(vectorScores ?? new Map(), lexicalScores, topK, this.fusion);

    const results = fused.flatMap((candidate, i) => {
      const metadata = this.handle.metadata[candidate.position];
      return metadata === undefined ? [] : [{ ...candidate, rank: i + 1, metadata }];
    });

    return {
      mode,
      results,
      queryTruncated,
      searchTimeMs: Math.round(performance.now() - startTime),
    };
  }

  /**
   * Similarity per position for the `limit` nearest neighbours, or null
   * when the query could not be embedded.
   */
  private async vectorCandidates(text: string, limit: number): Promise<Map<number, number> | null> {
    if (this.provider === null) {
      return null;
    }

    const index = this.handle.vectors;
    if (index.size === 0) {
      return new Map();
    }

    let embedding: number[] | undefined;
    try {
      [embedding] = await this.provider.embedBatch([text]);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Query embedding failed, using lexical ranking only: ${message}`);
      return null;
    }

    if (embedding === undefined || embedding.length !== index.dimensions) {
      this.logger.warn(
        `Query embedding has ${embedding?.length ?? 0} dimensions, index has ${index.dimensions}; using lexical ranking only`
      );
      return null;
    }

    const scores = new Map<number, number>();
    for (const neighbor of index.search(Float32Array.from(embedding), limit)) {
      scores.set(neighbor.position, distanceToSimilarity(neighbor.distance));
    }
    return scores;
  }
}
