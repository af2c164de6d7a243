/**
 * Content Classifier
 *
 * Picks the ContentKind whose strategy chunks a document. Checked in order:
 * the sql document type, curly-brace code markers, SQL object keywords,
 * then prose.
 */

import type { DocumentType } from '../types.js';
import type { ContentKind } from './types.js';

/** Lowercase markers of C#, TypeScript and JavaScript sources */
const BRACE_MARKERS = [
  'public class',
  'namespace',
  'using system',
  'export class',
  'import {',
  '@component',
  'function(',
  'const ',
  'var ',
];

const SQL_OBJECT = /\bcreate\s+(?:or\s+alter\s+)?(?:procedure|proc|function|trigger|view)\b/i;

export function classifyContent(text: string, type: DocumentType): ContentKind {
  if (type === 'sql') {
    return 'sql';
  }

  const lower = text.toLowerCase();
  if (BRACE_MARKERS.some((marker) => lower.includes(marker))) {
    return 'brace';
  }

  if (SQL_OBJECT.test(text) || (/\bbegin\b/i.test(text) && /\bend\b/i.test(text))) {
    return 'sql';
  }

  return 'paragraph';
}
