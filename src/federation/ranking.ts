/**
 * @fileoverview Ranking policies for picking the best federated answer
 */

import type { RankingPolicy } from './types.js';

/**
 * Prefers the longest answer. Length is a weak proxy for relevance, so
 * callers with a better signal should pass their own policy.
 */
export const longestAnswerPolicy: RankingPolicy = {
  name: 'longest-answer',
  score: (result) => result.answer.length,
};

/** Prefers the answer backed by the highest-scoring retrieved chunk. */
export const topChunkScorePolicy: RankingPolicy = {
  name: 'top-chunk-score',
  score: (result) =>
    result.chunks.reduce((best, chunk) => Math.max(best, chunk.score ?? Number.NEGATIVE_INFINITY), Number.NEGATIVE_INFINITY),
};
