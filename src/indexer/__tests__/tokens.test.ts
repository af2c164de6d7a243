/**
 * Token Estimation Tests
 */

import { describe, it, expect } from 'vitest';
import {
  estimateTokens,
  truncateToTokenBudget,
  longestFittingPrefix,
  maxCharsWithin,
  TRUNCATION_MARKER,
} from '../chunker/index.js';

describe('estimateTokens', () => {
  it('returns 0 for empty text', () => {
    expect(estimateTokens('')).toBe(0);
  });

  it('uses the word term for short words', () => {
    // 7 words → floor(9.1) = 9; 33 chars → 8
    expect(estimateTokens('one two three four five six seven')).toBe(9);
  });

  it('uses the character term for long runs', () => {
    expect(estimateTokens('x'.repeat(400))).toBe(100);
  });

  it('never decreases as text grows', () => {
    const text = 'public int Up(int n)\n{\n  return n + 1;\n}\n';
    let previous = 0;
    for (let i = 0; i <= text.length; i++) {
      const estimate = estimateTokens(text.slice(0, i));
      expect(estimate).toBeGreaterThanOrEqual(previous);
      previous = estimate;
    }
  });
});

describe('longestFittingPrefix', () => {
  it('finds the longest prefix within the budget', () => {
    expect(longestFittingPrefix('x'.repeat(100), 0, 100, 10)).toBe(43);
  });

  it('returns 0 when nothing fits', () => {
    expect(longestFittingPrefix('abc', 0, 3, 0)).toBe(0);
  });
});

describe('maxCharsWithin', () => {
  it('is the longest run the character term allows', () => {
    expect(maxCharsWithin(10)).toBe(43);
    expect(estimateTokens('x'.repeat(maxCharsWithin(10)))).toBe(10);
    expect(estimateTokens('x'.repeat(maxCharsWithin(10) + 1))).toBe(11);
  });
});

describe('truncateToTokenBudget', () => {
  it('returns text within the budget unchanged', () => {
    expect(truncateToTokenBudget('short query', 10)).toBe('short query');
  });

  it('appends the marker and fits the budget', () => {
    const result = truncateToTokenBudget('x'.repeat(100), 10);

    expect(result).toBe('x'.repeat(27) + TRUNCATION_MARKER);
    expect(estimateTokens(result)).toBeLessThanOrEqual(10);
  });

  it('moves the cut back to whitespace near the end', () => {
    const text = 'alpha beta gamma delta\n'.repeat(10);
    const result = truncateToTokenBudget(text, 20);

    expect(result).toBe(
      'alpha beta gamma delta\nalpha beta gamma delta\nalpha beta gamma' + TRUNCATION_MARKER
    );
    expect(estimateTokens(result)).toBe(19);
  });

  it('drops the marker when the budget cannot hold it', () => {
    expect(truncateToTokenBudget('x'.repeat(100), 3)).toBe('x'.repeat(15));
  });
});
