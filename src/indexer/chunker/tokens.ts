/**
 * Token Estimation
 *
 * A model-free token estimate used for every budget in the indexer:
 * chunk sizes, embedding batches and the query ceiling.
 *
 *   estimate = max(floor(words × 1.3), floor(chars / 4))
 *
 * Words are whitespace-separated runs. Both terms grow with the prefix
 * length, so the estimate of a prefix never exceeds that of the whole
 * text. The binary searches below depend on that.
 */

/** Appended to text cut down by truncateToTokenBudget() */
export const TRUNCATION_MARKER = '\n... [truncated]';

/**
 * Estimate the token count of a piece of text.
 */
export function estimateTokens(text: string): number {
  if (text.length === 0) {
    return 0;
  }
  const words = text.split(/\s+/).filter(Boolean).length;
  // Integer math keeps 1.3 × words exact
  return Math.max(Math.floor((words * 13) / 10), Math.floor(text.length / 4));
}

/**
 * Longest text that can estimate within `budget`: the chars/4 term alone
 * puts anything longer over it. Lets callers skip estimating huge spans.
 */
export function maxCharsWithin(budget: number): number {
  return Math.max(0, 4 * budget + 3);
}

/**
 * Length of the longest prefix of `text.slice(start, end)` whose estimate,
 * with `suffix` appended, is within `budget`. Returns 0 when nothing fits.
 */
export function longestFittingPrefix(
  text: string,
  start: number,
  end: number,
  budget: number,
  suffix = ''
): number {
  let lo = 0;
  let hi = Math.min(end - start, maxCharsWithin(budget));

  while (lo < hi) {
    const mid = Math.ceil((lo + hi) / 2);
    if (estimateTokens(text.slice(start, start + mid) + suffix) <= budget) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }

  return lo;
}

/**
 * Position of the last `pattern` match in `text.slice(from, to)`,
 * or -1. Used to move a cut back onto a natural boundary.
 */
function lastMatchIn(text: string, from: number, to: number, pattern: RegExp): number {
  for (let i = to - 1; i >= from; i--) {
    if (pattern.test(text.charAt(i))) {
      return i;
    }
  }
  return -1;
}

/**
 * Cut `text` down to `budget` estimated tokens.
 *
 * Text that fits is returned unchanged. Otherwise the result is the longest
 * prefix that still fits with TRUNCATION_MARKER appended, moved back to the
 * last newline (or whitespace) when one lies in the final 20% of it. When
 * the budget can't hold the marker, the prefix is returned without it.
 *
 * @example
 * ```typescript
 * const query = truncateToTokenBudget(longQuery, 7000);
 * ```
 */
export function truncateToTokenBudget(text: string, budget: number): string {
  if (estimateTokens(text) <= budget) {
    return text;
  }

  const suffix = estimateTokens(TRUNCATION_MARKER) <= budget ? TRUNCATION_MARKER : '';
  const length = longestFittingPrefix(text, 0, text.length, budget, suffix);
  const windowStart = Math.floor(length * 0.8);

  let cut = lastMatchIn(text, windowStart, length, /\n/);
  if (cut < 0) {
    cut = lastMatchIn(text, windowStart, length, /\s/);
  }

  return text.slice(0, cut > 0 ? cut : length) + suffix;
}
