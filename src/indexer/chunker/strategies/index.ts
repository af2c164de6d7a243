/**
 * Chunking strategies, one per ContentKind.
 */

import { chunkBraceCode } from './brace.js';
import { chunkParagraphs } from './paragraph.js';
import { chunkSql } from './sql.js';
import type { ChunkStrategy, ContentKind } from '../types.js';

export const STRATEGIES: Record<ContentKind, ChunkStrategy> = {
  brace: chunkBraceCode,
  sql: chunkSql,
  paragraph: chunkParagraphs,
};

export { braceUnits } from './brace.js';
export { sqlBlockStarts, beginEndUnits } from './sql.js';
export { packUnits, forceSplit, overlapStart, assertUnitsTile } from './packer.js';
