/**
 * Structural Chunker
 *
 * Splits documents into token-budgeted chunks along their structure:
 * 1. Empty text → no chunks; text within the target → one chunk
 * 2. classifyContent() picks a ContentKind
 * 3. The kind's strategy cuts the text into units and packs them
 *    (see strategies/packer.ts), force-splitting whatever outgrows the budget
 * 4. Spans become Chunk records with offsets, lines and overlap
 *
 * Chunking is deterministic: the same document and options always give
 * the same chunks.
 */

import { ChunkingFailureError, ValidationError } from '../../errors/index.js';
import type { Document } from '../types.js';
import { classifyContent } from './classifier.js';
import { STRATEGIES } from './strategies/index.js';
import { estimateTokens } from './tokens.js';
import type {
  BatchChunkResult,
  Chunk,
  ChunkOptions,
  ChunkSpan,
  ContentKind,
  PackBudget,
} from './types.js';

/**
 * Validate the options and clamp the overlap to half the target.
 */
export function resolveBudget(options: ChunkOptions): PackBudget {
  const { targetTokens, overlapTokens } = options;

  if (!Number.isInteger(targetTokens) || targetTokens < 1) {
    throw new ValidationError('Invalid chunk options', [
      `targetTokens: expected a positive integer, got ${targetTokens}`,
    ]);
  }
  if (!Number.isInteger(overlapTokens) || overlapTokens < 0) {
    throw new ValidationError('Invalid chunk options', [
      `overlapTokens: expected a non-negative integer, got ${overlapTokens}`,
    ]);
  }

  return {
    targetTokens,
    overlapTokens: Math.min(overlapTokens, Math.floor(targetTokens / 2)),
  };
}

/**
 * Throw unless each span continues exactly where the previous one ended.
 */
function assertReconstructs(spans: ChunkSpan[], length: number, sourceId: string): void {
  let covered = 0;
  for (const span of spans) {
    if (span.start + span.overlapLength !== covered || span.end <= covered) {
      throw new ChunkingFailureError(
        sourceId,
        `chunk [${span.start}, ${span.end}) does not continue at offset ${covered}`
      );
    }
    covered = span.end;
  }
  if (covered !== length) {
    throw new ChunkingFailureError(sourceId, `chunks cover ${covered} of ${length} characters`);
  }
}

/**
 * Offsets of every line start, for offset → line lookups.
 */
function lineStarts(text: string): number[] {
  const starts = [0];
  for (let i = text.indexOf('\n'); i >= 0; i = text.indexOf('\n', i + 1)) {
    starts.push(i + 1);
  }
  return starts;
}

/** 1-based line holding `offset` */
function lineAt(starts: number[], offset: number): number {
  let lo = 0;
  let hi = starts.length - 1;
  while (lo < hi) {
    const mid = Math.ceil((lo + hi) / 2);
    if ((starts[mid] ?? 0) <= offset) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }
  return lo + 1;
}

function chunkWithKind(
  document: Document,
  options: ChunkOptions
): { kind: ContentKind; chunks: Chunk[] } {
  const { text, sourceId } = document;
  const budget = resolveBudget(options);
  const kind = classifyContent(text, document.type);

  if (text.length === 0) {
    return { kind, chunks: [] };
  }

  const spans =
    estimateTokens(text) <= budget.targetTokens
      ? [{ start: 0, end: text.length, overlapLength: 0 }]
      : STRATEGIES[kind](text, budget, sourceId);

  assertReconstructs(spans, text.length, sourceId);

  const starts = lineStarts(text);
  const chunks = spans.map((span, ordinal): Chunk => {
    const chunkText = text.slice(span.start, span.end);
    return {
      sourceId,
      documentType: document.type,
      chunkId: `${sourceId}#${ordinal}`,
      text: chunkText,
      tokenCount: estimateTokens(chunkText),
      startOffset: span.start,
      endOffset: span.end,
      startLine: lineAt(starts, span.start),
      endLine: lineAt(starts, span.end - 1),
      overlapLength: span.overlapLength,
      attributes: { ...document.attributes },
    };
  });

  // Notes split in several parts are titled per part
  if (document.type === 'manual_note' && chunks.length > 1) {
    chunks.forEach((chunk, i) => {
      chunk.attributes.title = `Manual Note (Part ${i + 1}/${chunks.length})`;
    });
  }

  return { kind, chunks };
}

/**
 * Chunk one document.
 *
 * @throws ValidationError for a non-positive target or negative overlap
 * @throws ChunkingFailureError if a strategy's output doesn't tile the text
 *
 * @example
 * ```typescript
 * const chunks = chunkDocument(
 *   { text, sourceId: 'src/UserService.cs', type: 'code' },
 *   { targetTokens: 500, overlapTokens: 50 }
 * );
 * ```
 */
export function chunkDocument(document: Document, options: ChunkOptions): Chunk[] {
  return chunkWithKind(document, options).chunks;
}

/**
 * Callbacks for chunkDocuments().
 */
export interface ChunkDocumentsCallbacks {
  /** Fired after each document, successful or not */
  onDocument?: (processed: number, total: number, sourceId: string) => void;

  /** Fired for each document that failed to chunk */
  onError?: (error: Error, sourceId: string) => void;
}

/**
 * Chunk many documents. A document that fails is reported and skipped;
 * the others are still chunked.
 */
export function chunkDocuments(
  documents: Document[],
  options: ChunkOptions,
  callbacks: ChunkDocumentsCallbacks = {}
): BatchChunkResult {
  // Invalid options fail the whole run, not each document
  resolveBudget(options);

  const chunks: Chunk[] = [];
  const errors: string[] = [];
  const byKind: Record<ContentKind, number> = { brace: 0, sql: 0, paragraph: 0 };
  let failed = 0;

  documents.forEach((document, i) => {
    try {
      const result = chunkWithKind(document, options);
      for (const chunk of result.chunks) chunks.push(chunk);
      byKind[result.kind] += result.chunks.length;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      failed++;
      errors.push(`${document.sourceId}: ${err.message}`);
      callbacks.onError?.(err, document.sourceId);
    }
    callbacks.onDocument?.(i + 1, documents.length, document.sourceId);
  });

  return {
    chunks,
    errors,
    stats: {
      documents: documents.length,
      failed,
      chunks: chunks.length,
      byKind,
    },
  };
}
