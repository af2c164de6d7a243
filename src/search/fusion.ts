/**
 * Score Fusion
 *
 * Combines vector similarity and BM25 relevance into one score per chunk
 * with a weighted sum:
 *
 *   fused = vectorWeight · v / max(v) + lexicalWeight · l / max(l)
 *
 * Similarities (inverse squared distance) and BM25 scores live on
 * unrelated scales; dividing each by its maximum over the candidates puts
 * both in [0, 1] before weighting. With `normalize: false` the raw scores
 * are summed.
 */

import type { FusionConfig } from './types.js';

export const DEFAULT_FUSION_CONFIG: FusionConfig = {
  vectorWeight: 1,
  lexicalWeight: 1,
  normalize: true,
};

/**
 * A scored position before ranks are assigned.
 */
export interface FusedCandidate {
  position: number;
  score: number;
  vectorScore: number;
  lexicalScore: number;
}

/**
 * Largest value, or 0 for none.
 */
function maxOf(values: Iterable<number>): number {
  let max = 0;
  for (const value of values) {
    if (value > max) {
      max = value;
    }
  }
  return max;
}

/**
 * Fuse the two score sets and return the best `topK`, best first.
 *
 * A position found by only one signal keeps that one score. Positions
 * whose fused score is zero are dropped. Equal scores keep position order.
 *
 * @param vectorScores - Similarity per vector candidate position
 * @param lexicalScores - BM25 score per position, for the whole corpus
 */
export function fuseScores(
  vectorScores: ReadonlyMap<number, number>,
  lexicalScores: readonly number[],
  topK: number,
  config: FusionConfig = DEFAULT_FUSION_CONFIG
): FusedCandidate[] {
  const positions = new Set<number>(vectorScores.keys());
  lexicalScores.forEach((score, position) => {
    if (score > 0) {
      positions.add(position);
    }
  });

  const vectorMax = config.normalize ? maxOf(vectorScores.values()) : 1;
  const lexicalMax = config.normalize ? maxOf(lexicalScores) : 1;

  const candidates: FusedCandidate[] = [];
  for (const position of positions) {
    const vectorScore = vectorScores.get(position) ?? 0;
    const lexicalScore = lexicalScores[position] ?? 0;

    const vectorPart = vectorMax === 0 ? 0 : vectorScore / vectorMax;
    const lexicalPart = lexicalMax === 0 ? 0 : lexicalScore / lexicalMax;
    const score = config.vectorWeight * vectorPart + config.lexicalWeight * lexicalPart;

    if (score > 0) {
      candidates.push({ position, score, vectorScore, lexicalScore });
    }
  }

  candidates.sort((a, b) => b.score - a.score || a.position - b.position);
  return candidates.slice(0, Math.max(0, topK));
}
