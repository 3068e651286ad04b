/**
 * Weighted score averaging shared by accumulation and collapsing.
 * @module scoring/weightedScore
 */

import { NO_SCORE, isScored } from '../core/types';
import type { Score } from '../core/types';

export interface ScoreTerm {
  score: Score;
  weight: number;
}

/**
 * Weighted average of the scored terms.
 *
 * Terms without a score or with a non-positive weight do not contribute.
 * Returns NO_SCORE when nothing contributes.
 */
export function weightedScore(terms: Iterable<ScoreTerm>): Score {
  let total = 0;
  let weights = 0;
  for (const term of terms) {
    if (term.weight <= 0 || !isScored(term.score)) continue;
    total += term.score * term.weight;
    weights += term.weight;
  }
  return weights > 0 ? total / weights : NO_SCORE;
}
