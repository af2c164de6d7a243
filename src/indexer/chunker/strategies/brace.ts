/**
 * Brace Strategy
 *
 * Curly-brace code (C#, TypeScript, JavaScript). Packs whole lines and
 * prefers to close a chunk where a method or class body has ended.
 */

import { packUnits } from './packer.js';
import { countChar, lineRanges } from './units.js';
import type { ChunkStrategy, Unit } from '../types.js';

/** A line that opens a class, interface or method */
const MEMBER_START = /(public|private|protected|export|async)\s+(class|interface|function|async|[\w<>]+)\s+\w+\s*[({]/;

/**
 * One unit per line, with `{` minus `}` tracked as the depth. A line
 * opening a member records the depth it was declared at. A chunk may close
 * before a line when the depth there is 0 or back at (or above) the
 * recorded member depth, unless the line opens a brace.
 */
export function braceUnits(text: string): Unit[] {
  let depth = 0;
  let memberDepth: number | null = null;

  return lineRanges(text, 0, text.length).map(({ start, end }) => {
    const line = text.slice(start, end);
    const mayCloseBefore =
      !line.trimStart().startsWith('{') &&
      (depth === 0 || (memberDepth !== null && depth <= memberDepth));

    if (MEMBER_START.test(line)) {
      memberDepth = depth;
    }
    depth += countChar(line, '{') - countChar(line, '}');

    return { start, end, mayCloseBefore };
  });
}

export const chunkBraceCode: ChunkStrategy = (text, budget, sourceId) =>
  packUnits(text, braceUnits(text), 0, text.length, budget, sourceId);
