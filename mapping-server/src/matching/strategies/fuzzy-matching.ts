/**
 * Fuzzy matching - Ratcliff/Obershelp ratio over normalized names.
 * Last in the cascade; its result is returned even when nothing is accepted.
 */

import type { MatchResult } from '@team-identity/shared/types';
import type { Normalizer } from '../normalizer.js';
import { sequenceRatio } from '../sequence-similarity.js';
import { MATCHING_LIMITS, STRATEGY_THRESHOLDS } from '../thresholds.js';
import { matchOf, noMatch, rankCandidates, type MatchingStrategy, type ScoredCandidate } from './types.js';

const WEIGHT = 0.6;

export class FuzzyMatchingStrategy implements MatchingStrategy {
  readonly name = 'fuzzy_matching';
  readonly threshold = STRATEGY_THRESHOLDS.fuzzy_matching;

  constructor(private readonly normalize: Normalizer) {}

  match(sourceName: string, candidates: readonly string[]): MatchResult {
    const source = this.normalize(sourceName);
    if (!source) {
      return noMatch(sourceName, this.name);
    }

    const scored: ScoredCandidate[] = [];
    for (const candidate of candidates) {
      const ratio = sequenceRatio(source, this.normalize(candidate));
      if (ratio > MATCHING_LIMITS.FUZZY_MIN_RATIO) {
        scored.push({ name: candidate, score: ratio });
      }
    }

    const { best, alternatives } = rankCandidates(scored, MATCHING_LIMITS.MAX_ALTERNATIVES);
    if (!best) {
      return noMatch(sourceName, this.name);
    }

    const confidence = best.score * WEIGHT;
    return matchOf(
      sourceName,
      this.name,
      best.name,
      confidence,
      alternatives,
      confidence >= MATCHING_LIMITS.FUZZY_REPORTING_FLOOR
    );
  }
}
