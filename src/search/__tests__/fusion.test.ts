/**
 * Score Fusion Tests
 */

import { describe, it, expect } from 'vitest';

import { DEFAULT_FUSION_CONFIG, fuseScores } from '../fusion.js';

// Vector candidates 0 and 2; lexical hits 1 and 2
const vectorScores = new Map([
  [0, 10],
  [2, 5],
]);
const lexicalScores = [0, 4, 3, 0];

describe('fuseScores', () => {
  it('sums normalized components, best first', () => {
    const fused = fuseScores(vectorScores, lexicalScores, 10);

    // 2: 5/10 + 3/4 = 1.25, 0: 10/10 = 1, 1: 4/4 = 1
    expect(fused).toEqual([
      { position: 2, score: 1.25, vectorScore: 5, lexicalScore: 3 },
      { position: 0, score: 1, vectorScore: 10, lexicalScore: 0 },
      { position: 1, score: 1, vectorScore: 0, lexicalScore: 4 },
    ]);
  });

  it('takes topK', () => {
    expect(fuseScores(vectorScores, lexicalScores, 2).map((c) => c.position)).toEqual([2, 0]);
  });

  it('sums raw scores without normalization', () => {
    const fused = fuseScores(vectorScores, lexicalScores, 10, {
      ...DEFAULT_FUSION_CONFIG,
      normalize: false,
    });

    expect(fused.map((c) => [c.position, c.score])).toEqual([
      [0, 10],
      [2, 8],
      [1, 4],
    ]);
  });

  it('drops candidates whose fused score is zero', () => {
    const fused = fuseScores(vectorScores, lexicalScores, 10, {
      ...DEFAULT_FUSION_CONFIG,
      vectorWeight: 0,
    });

    expect(fused.map((c) => [c.position, c.score])).toEqual([
      [1, 1],
      [2, 0.75],
    ]);
  });

  it('keeps position order for equal scores', () => {
    const fused = fuseScores(new Map([[3, 2]]), [0, 0, 7, 0], 10);

    expect(fused.map((c) => c.position)).toEqual([2, 3]);
  });

  it('ranks lexically alone when there are no vector candidates', () => {
    expect(fuseScores(new Map(), [0, 2, 4], 10).map((c) => [c.position, c.score])).toEqual([
      [2, 1],
      [1, 0.5],
    ]);
  });

  it('returns nothing when nothing scored', () => {
    expect(fuseScores(new Map(), [0, 0], 5)).toEqual([]);
  });
});
