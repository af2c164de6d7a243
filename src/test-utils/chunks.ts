/**
 * Chunk fixtures
 */

import { estimateTokens } from '../indexer/chunker/tokens.js';
import type { Chunk } from '../indexer/chunker/types.js';

/**
 * A single-chunk document holding `text`.
 */
export function makeChunk(sourceId: string, text: string, overrides: Partial<Chunk> = {}): Chunk {
  return {
    sourceId,
    documentType: 'code',
    chunkId: `${sourceId}#0`,
    text,
    tokenCount: estimateTokens(text),
    startOffset: 0,
    endOffset: text.length,
    startLine: 1,
    endLine: text.split('\n').length,
    overlapLength: 0,
    attributes: {},
    ...overrides,
  };
}
