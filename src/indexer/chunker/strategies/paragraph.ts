/**
 * Paragraph Strategy
 *
 * Prose, notes and anything the classifier doesn't recognise. Chunks close
 * between paragraphs; a paragraph larger than the budget goes through the
 * forced split.
 */

import { packUnits } from './packer.js';
import { unitsAfterSeparators } from './units.js';
import type { ChunkStrategy } from '../types.js';

/** Blank line(s) between paragraphs; always ends on a newline */
const PARAGRAPH_BREAK = /\n\s*\n/g;

export const chunkParagraphs: ChunkStrategy = (text, budget, sourceId) =>
  packUnits(
    text,
    unitsAfterSeparators(text, 0, text.length, PARAGRAPH_BREAK),
    0,
    text.length,
    budget,
    sourceId
  );
