/**
 * Chunker Types
 *
 * A chunk is a character range of its document. Consecutive chunks of the
 * same document overlap by `overlapLength` characters, so dropping each
 * chunk's overlap and concatenating gives the document back:
 *
 *   chunks.map((c) => c.text.slice(c.overlapLength)).join('') === doc.text
 */

import type { ChunkAttributes, DocumentType } from '../types.js';

/**
 * Structural family of a document's text; selects the chunking strategy.
 * - brace: C#, TypeScript, JavaScript and other curly-brace code
 * - sql: procedures, functions, triggers, views and plain statements
 * - paragraph: prose and anything unrecognised
 */
export type ContentKind = 'brace' | 'sql' | 'paragraph';

/**
 * A token-budgeted fragment of a document.
 */
export interface Chunk {
  /** Source identifier of the document (relative path, sheet id, note id) */
  sourceId: string;

  documentType: DocumentType;

  /** `${sourceId}#${ordinal}`, stable for the same input and options */
  chunkId: string;

  /** Equal to `document.text.slice(startOffset, endOffset)` */
  text: string;

  /** Estimated tokens of `text` */
  tokenCount: number;

  startOffset: number;
  endOffset: number;

  /** 1-based lines of the first and last character */
  startLine: number;
  endLine: number;

  /** Leading characters repeated from the previous chunk */
  overlapLength: number;

  /** Document attributes, copied onto every chunk */
  attributes: ChunkAttributes;
}

/**
 * Chunk size options, in estimated tokens.
 */
export interface ChunkOptions {
  /** Target chunk size. No chunk estimates above twice this. */
  targetTokens: number;

  /**
   * Trailing lines of a chunk repeated at the start of the next.
   * Clamped to half of `targetTokens`.
   */
  overlapTokens: number;
}

/**
 * A contiguous piece of text a strategy hands to the packer.
 * A strategy's units cover its range exactly, in order.
 */
export interface Unit {
  start: number;
  end: number;
  /** Whether a chunk may end right before this unit */
  mayCloseBefore: boolean;
}

/**
 * A chunk before it gets its document fields.
 */
export interface ChunkSpan {
  start: number;
  end: number;
  overlapLength: number;
}

/**
 * Budgets shared by the packer and the forced split.
 */
export interface PackBudget {
  targetTokens: number;
  /** Already clamped to floor(targetTokens / 2) */
  overlapTokens: number;
}

/**
 * One chunking strategy per ContentKind.
 *
 * Receives the whole document text and returns spans covering it.
 */
export type ChunkStrategy = (text: string, budget: PackBudget, sourceId: string) => ChunkSpan[];

/**
 * Result of chunking many documents.
 */
export interface BatchChunkResult {
  chunks: Chunk[];

  /** One entry per failed document: `${sourceId}: ${message}` */
  errors: string[];

  stats: {
    documents: number;
    failed: number;
    chunks: number;
    byKind: Record<ContentKind, number>;
  };
}
