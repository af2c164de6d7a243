/**
 * Unit Packer
 *
 * Shared by every strategy: packs units into chunks up to the target size,
 * closes only where the strategy allows, seeds each chunk with the trailing
 * lines of the previous one and falls back to the forced split when a span
 * grows past its bounds.
 */

import { ChunkingFailureError } from '../../../errors/index.js';
import { estimateTokens, longestFittingPrefix, maxCharsWithin } from '../tokens.js';
import type { ChunkSpan, PackBudget, Unit } from '../types.js';

/** A closed chunk above this multiple of the target is force-split */
const CLOSE_SPLIT_FACTOR = 1.5;

/** A growing chunk above this multiple of the target is force-split */
const GROW_SPLIT_FACTOR = 2;

function isLineStart(text: string, position: number): boolean {
  return position === 0 || text.charAt(position - 1) === '\n';
}

/**
 * Throw unless `units` cover `[start, end)` exactly, in order, with no
 * empty unit.
 */
export function assertUnitsTile(
  units: Unit[],
  start: number,
  end: number,
  sourceId: string
): void {
  let expected = start;
  for (const unit of units) {
    if (unit.start !== expected || unit.end <= unit.start) {
      throw new ChunkingFailureError(
        sourceId,
        `unit [${unit.start}, ${unit.end}) does not continue at offset ${expected}`
      );
    }
    expected = unit.end;
  }
  if (expected !== end) {
    throw new ChunkingFailureError(sourceId, `units end at ${expected}, expected ${end}`);
  }
}

/**
 * Start of the overlap seed for the chunk after `[spanStart, spanEnd)`.
 *
 * The seed is the longest run of whole trailing lines whose estimate stays
 * within the overlap budget. Returns `spanEnd` (no seed) when the span
 * didn't end on a line boundary, not even its last line fits, or the run
 * is only whitespace.
 */
export function overlapStart(
  text: string,
  spanStart: number,
  spanEnd: number,
  overlapTokens: number
): number {
  if (overlapTokens <= 0 || spanEnd <= spanStart || !isLineStart(text, spanEnd)) {
    return spanEnd;
  }

  let best = spanEnd;
  let candidate = spanEnd;
  while (candidate > spanStart) {
    // Start of the line ending at candidate - 1
    candidate = candidate < 2 ? 0 : text.lastIndexOf('\n', candidate - 2) + 1;
    if (candidate < spanStart || estimateTokens(text.slice(candidate, spanEnd)) > overlapTokens) {
      break;
    }
    best = candidate;
  }

  // Blank lines carry no context
  return text.slice(best, spanEnd).trim() === '' ? spanEnd : best;
}

/**
 * Split `[start, end)` into pieces of at most `targetTokens`.
 *
 * Packs whole lines; a line that can't fit on its own is cut inside the
 * line at the longest prefix that fits, moved back to whitespace in the
 * final 20% when possible. Pieces closed at a line boundary seed the next
 * piece with overlap; mid-line cuts don't. `seedEnd` marks where the text
 * repeated from an earlier chunk ends (`start` when there is none).
 *
 * Every iteration either advances or drops the seed, so this terminates.
 * Spans longer than maxCharsWithin() are never estimated, so a single
 * multi-megabyte line splits in linear time.
 */
export function forceSplit(
  text: string,
  start: number,
  seedEnd: number,
  end: number,
  budget: PackBudget
): ChunkSpan[] {
  const { targetTokens, overlapTokens } = budget;
  const spans: ChunkSpan[] = [];
  const maxChars = maxCharsWithin(targetTokens);

  let chunkStart = start;
  let fresh = seedEnd;
  let position = seedEnd;

  while (position < end) {
    const newline = text.indexOf('\n', position);
    const lineEnd = newline < 0 || newline + 1 > end ? end : newline + 1;

    if (
      lineEnd - chunkStart <= maxChars &&
      estimateTokens(text.slice(chunkStart, lineEnd)) <= targetTokens
    ) {
      position = lineEnd;
      continue;
    }

    if (position > fresh) {
      spans.push({ start: chunkStart, end: position, overlapLength: fresh - chunkStart });
      chunkStart = overlapStart(text, chunkStart, position, overlapTokens);
      fresh = position;
      continue;
    }

    if (chunkStart < fresh) {
      // The seed leaves no room for this line
      chunkStart = fresh;
      continue;
    }

    const cut = cutLine(text, position, lineEnd, targetTokens);
    spans.push({ start: position, end: cut, overlapLength: 0 });
    chunkStart = cut;
    fresh = cut;
    position = cut;
  }

  if (position > fresh) {
    spans.push({ start: chunkStart, end: position, overlapLength: fresh - chunkStart });
  }

  return spans;
}

/**
 * End of the first piece of an oversized line. Always past `start`.
 */
function cutLine(text: string, start: number, end: number, targetTokens: number): number {
  const length = Math.max(1, longestFittingPrefix(text, start, end, targetTokens));
  const windowStart = start + Math.floor(length * 0.8);

  for (let i = start + length - 1; i >= windowStart && i > start; i--) {
    if (/\s/.test(text.charAt(i))) {
      return i + 1;
    }
  }

  return start + length;
}

/**
 * Pack `units` (covering `[start, end)`) into chunk spans.
 */
export function packUnits(
  text: string,
  units: Unit[],
  start: number,
  end: number,
  budget: PackBudget,
  sourceId: string
): ChunkSpan[] {
  assertUnitsTile(units, start, end, sourceId);

  const { targetTokens, overlapTokens } = budget;
  const spans: ChunkSpan[] = [];

  let chunkStart = start;
  // Text before `fresh` repeats the previous chunk
  let fresh = start;
  let position = start;

  const close = (): void => {
    const estimate = estimateTokens(text.slice(chunkStart, position));
    const closed =
      estimate > targetTokens * CLOSE_SPLIT_FACTOR
        ? forceSplit(text, chunkStart, fresh, position, budget)
        : [{ start: chunkStart, end: position, overlapLength: fresh - chunkStart }];
    for (const span of closed) spans.push(span);

    const last = closed[closed.length - 1];
    chunkStart = last ? overlapStart(text, last.start, last.end, overlapTokens) : position;
    fresh = position;
  };

  for (const unit of units) {
    if (
      position > fresh &&
      unit.mayCloseBefore &&
      estimateTokens(text.slice(chunkStart, unit.end)) > targetTokens
    ) {
      close();
    }

    position = unit.end;

    if (estimateTokens(text.slice(chunkStart, position)) > targetTokens * GROW_SPLIT_FACTOR) {
      for (const span of forceSplit(text, chunkStart, fresh, position, budget)) spans.push(span);
      chunkStart = position;
      fresh = position;
    }
  }

  if (position > fresh) {
    close();
  }

  return spans;
}
