/**
 * Search Result Formatter
 *
 * Formats retrieval results for CLI display and JSON output.
 *
 * @example
 * ```typescript
 * const text = formatResult(result);
 * // 1. [0.92] src/Auth/JwtMiddleware.cs:12-40
 * //   public class JwtAuthenticationMiddleware { ...
 *
 * const json = formatResultJSON(result);
 * // { rank: 1, score: 0.92, sourceId: "...", lineStart: 12, ... }
 * ```
 *
 * @packageDocumentation
 */

import type { DocumentType } from '../indexer/types.js';
import type { RetrievalResult } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Default maximum snippet length in characters */
const DEFAULT_SNIPPET_LENGTH = 200;

/** Indent for snippet content in text output */
const SNIPPET_INDENT = '  ';

export interface FormatOptions {
  /** Maximum snippet characters (default 200) */
  snippetLength?: number;
  /** Show the fused score (default true) */
  showScore?: boolean;
  /** Append the line range to the location (default true) */
  showLineNumbers?: boolean;
}

/**
 * Flat JSON shape of a result, for `--json` output.
 */
export interface FormattedResultJSON {
  rank: number;
  score: number;
  vectorScore: number;
  lexicalScore: number;
  sourceId: string;
  chunkId: string;
  documentType: DocumentType;
  lineStart: number;
  lineEnd: number;
  content: string;
  sheetName?: string;
  title?: string;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Format a score as a 2-decimal string.
 *
 * @example
 * ```typescript
 * formatScore(0.9234)  // "0.92"
 * formatScore(1)       // "1.00"
 * ```
 */
export function formatScore(score: number): string {
  return score.toFixed(2);
}

/**
 * Collapse whitespace and cut to `maxLength`, adding "..." when cut.
 *
 * @example
 * ```typescript
 * truncateSnippet("Hello world", 5)
 * // "Hello..."
 *
 * truncateSnippet("Line 1\nLine 2", 20)
 * // "Line 1 Line 2"
 * ```
 */
export function truncateSnippet(content: string, maxLength: number = DEFAULT_SNIPPET_LENGTH): string {
  const normalized = content.replace(/\s+/g, ' ').trim();

  if (normalized.length <= maxLength) {
    return normalized;
  }

  return normalized.slice(0, maxLength) + '...';
}

/**
 * Format line range as "start-end" or just "start" if same.
 */
function formatLineRange(start: number, end: number): string {
  if (start === end) {
    return String(start);
  }
  return `${start}-${end}`;
}

function stringAttribute(result: RetrievalResult, key: string): string | undefined {
  const value = result.metadata.attributes[key];
  return typeof value === 'string' ? value : undefined;
}

// ============================================================================
// Text Formatting Functions
// ============================================================================

/**
 * Format a single result for text display.
 *
 * Manual notes show their title (or id), sheets their sheet name;
 * everything else shows the source path with its line range.
 */
export function formatResult(result: RetrievalResult, options: FormatOptions = {}): string {
  const {
    snippetLength = DEFAULT_SNIPPET_LENGTH,
    showScore = true,
    showLineNumbers = true,
  } = options;

  const { metadata } = result;
  const parts: string[] = [`${result.rank}.`];

  if (showScore) {
    parts.push(`[${formatScore(result.score)}]`);
  }

  if (metadata.documentType === 'manual_note') {
    parts.push(stringAttribute(result, 'title') ?? metadata.sourceId);
  } else if (metadata.documentType === 'spreadsheet_sheet') {
    const sheetName = stringAttribute(result, 'sheetName');
    parts.push(sheetName ? `${metadata.sourceId} (sheet ${sheetName})` : metadata.sourceId);
  } else {
    let location = metadata.sourceId;
    if (showLineNumbers) {
      location += `:${formatLineRange(metadata.startLine, metadata.endLine)}`;
    }
    parts.push(location);
  }

  const snippet = truncateSnippet(metadata.text, snippetLength);
  return `${parts.join(' ')}\n${SNIPPET_INDENT}${snippet}`;
}

/**
 * Format multiple results, separated by blank lines.
 */
export function formatResults(results: RetrievalResult[], options: FormatOptions = {}): string {
  if (results.length === 0) {
    return '';
  }

  return results.map((result) => formatResult(result, options)).join('\n\n');
}

// ============================================================================
// JSON Formatting Functions
// ============================================================================

/**
 * Flatten a result into a JSON-serializable object.
 */
export function formatResultJSON(result: RetrievalResult): FormattedResultJSON {
  const { metadata } = result;
  const formatted: FormattedResultJSON = {
    rank: result.rank,
    score: result.score,
    vectorScore: result.vectorScore,
    lexicalScore: result.lexicalScore,
    sourceId: metadata.sourceId,
    chunkId: metadata.chunkId,
    documentType: metadata.documentType,
    lineStart: metadata.startLine,
    lineEnd: metadata.endLine,
    content: metadata.text,
  };

  const sheetName = stringAttribute(result, 'sheetName');
  if (sheetName !== undefined) {
    formatted.sheetName = sheetName;
  }
  const title = stringAttribute(result, 'title');
  if (title !== undefined) {
    formatted.title = title;
  }

  return formatted;
}

export function formatResultsJSON(results: RetrievalResult[]): FormattedResultJSON[] {
  return results.map(formatResultJSON);
}
