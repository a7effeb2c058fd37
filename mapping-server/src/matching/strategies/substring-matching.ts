/**
 * Substring matching - one normalized name contains the other.
 * Confidence scales with the length ratio of the two names.
 */

import type { MatchResult } from '@team-identity/shared/types';
import type { Normalizer } from '../normalizer.js';
import { MATCHING_LIMITS, STRATEGY_THRESHOLDS } from '../thresholds.js';
import { matchOf, noMatch, rankCandidates, type MatchingStrategy, type ScoredCandidate } from './types.js';

const WEIGHT = 0.75;

export class SubstringMatchingStrategy implements MatchingStrategy {
  readonly name = 'substring_matching';
  readonly threshold = STRATEGY_THRESHOLDS.substring_matching;

  constructor(private readonly normalize: Normalizer) {}

  match(sourceName: string, candidates: readonly string[]): MatchResult {
    const source = this.normalize(sourceName);
    if (!source) {
      return noMatch(sourceName, this.name);
    }
    const sourceLength = Array.from(source).length;

    const scored: ScoredCandidate[] = [];
    for (const candidate of candidates) {
      const target = this.normalize(candidate);
      if (!target || !(source.includes(target) || target.includes(source))) {
        continue;
      }
      const targetLength = Array.from(target).length;
      scored.push({
        name: candidate,
        score: Math.min(sourceLength, targetLength) / Math.max(sourceLength, targetLength),
      });
    }

    const { best, alternatives } = rankCandidates(
      scored,
      MATCHING_LIMITS.MAX_ALTERNATIVES,
      candidate => candidate.score > MATCHING_LIMITS.SUBSTRING_ALTERNATIVE_RATIO
    );
    if (!best) {
      return noMatch(sourceName, this.name);
    }

    return matchOf(sourceName, this.name, best.name, best.score * WEIGHT, alternatives);
  }
}
