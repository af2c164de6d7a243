/**
 * SQL Strategy
 *
 * Splits at every CREATE PROCEDURE / FUNCTION / TRIGGER / VIEW. A block
 * within the budget becomes one chunk; a larger one is packed by lines
 * closable only outside BEGIN ... END, or by statements when it has no
 * BEGIN. Chunks never overlap across blocks.
 */

import { estimateTokens } from '../tokens.js';
import { packUnits } from './packer.js';
import { lineRanges, unitsAfterSeparators } from './units.js';
import type { ChunkSpan, ChunkStrategy, PackBudget, Unit } from '../types.js';

const OBJECT_START = /CREATE\s+(?:OR\s+ALTER\s+)?(?:PROCEDURE|PROC|FUNCTION|TRIGGER|VIEW)\b/gi;

/** Statement terminator plus the rest of its line when that is blank */
const STATEMENT_END = /;[^\S\n]*\n?/g;

const BEGIN = /\bBEGIN\b/i;
const END = /\bEND\b/i;

/**
 * Start offsets of the SQL object blocks. A preamble before the first
 * CREATE is its own block unless it is only whitespace.
 */
export function sqlBlockStarts(text: string): number[] {
  const starts = [...text.matchAll(OBJECT_START)].map((match) => match.index ?? 0);
  const first = starts[0];

  if (first === undefined) {
    return [];
  }
  if (text.slice(0, first).trim() === '') {
    starts[0] = 0;
  } else {
    starts.unshift(0);
  }

  return starts;
}

/**
 * Line units closable where the BEGIN/END depth after the line is 0.
 */
export function beginEndUnits(text: string, start: number, end: number): Unit[] {
  let depth = 0;

  return lineRanges(text, start, end).map((range) => {
    const line = text.slice(range.start, range.end);
    if (BEGIN.test(line)) depth++;
    if (END.test(line)) depth--;
    return { ...range, mayCloseBefore: depth === 0 };
  });
}

function chunkBlock(
  text: string,
  start: number,
  end: number,
  budget: PackBudget,
  sourceId: string
): ChunkSpan[] {
  if (estimateTokens(text.slice(start, end)) <= budget.targetTokens) {
    return [{ start, end, overlapLength: 0 }];
  }

  const units = BEGIN.test(text.slice(start, end))
    ? beginEndUnits(text, start, end)
    : unitsAfterSeparators(text, start, end, STATEMENT_END);

  return packUnits(text, units, start, end, budget, sourceId);
}

export const chunkSql: ChunkStrategy = (text, budget, sourceId) => {
  const starts = sqlBlockStarts(text);

  if (starts.length === 0) {
    return packUnits(
      text,
      unitsAfterSeparators(text, 0, text.length, STATEMENT_END),
      0,
      text.length,
      budget,
      sourceId
    );
  }

  return starts.flatMap((start, i) =>
    chunkBlock(text, start, starts[i + 1] ?? text.length, budget, sourceId)
  );
};
