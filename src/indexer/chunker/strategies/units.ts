/**
 * Unit helpers shared by the strategies.
 */

import type { Unit } from '../types.js';

/**
 * Lines of `text.slice(start, end)`, each including its trailing newline.
 */
export function lineRanges(text: string, start: number, end: number): Array<{ start: number; end: number }> {
  const ranges: Array<{ start: number; end: number }> = [];
  let position = start;

  while (position < end) {
    const newline = text.indexOf('\n', position);
    const lineEnd = newline < 0 || newline >= end ? end : newline + 1;
    ranges.push({ start: position, end: lineEnd });
    position = lineEnd;
  }

  return ranges;
}

/**
 * Units ending right after each match of `separator` (a global regex)
 * inside `[start, end)`. Every unit may start a new chunk.
 */
export function unitsAfterSeparators(
  text: string,
  start: number,
  end: number,
  separator: RegExp
): Unit[] {
  const units: Unit[] = [];
  const region = text.slice(start, end);
  let position = start;

  for (const match of region.matchAll(separator)) {
    const unitEnd = start + (match.index ?? 0) + match[0].length;
    if (unitEnd > position) {
      units.push({ start: position, end: unitEnd, mayCloseBefore: true });
      position = unitEnd;
    }
  }

  if (position < end) {
    units.push({ start: position, end, mayCloseBefore: true });
  }

  return units;
}

/**
 * Count occurrences of a single character.
 */
export function countChar(line: string, char: string): number {
  let count = 0;
  for (const c of line) {
    if (c === char) count++;
  }
  return count;
}
