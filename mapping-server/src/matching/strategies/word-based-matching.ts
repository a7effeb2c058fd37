/**
 * Word-based matching - Jaccard similarity of normalized word sets.
 */

import type { MatchResult } from '@team-identity/shared/types';
import type { Normalizer } from '../normalizer.js';
import { MATCHING_LIMITS, STRATEGY_THRESHOLDS } from '../thresholds.js';
import { matchOf, noMatch, rankCandidates, type MatchingStrategy, type ScoredCandidate } from './types.js';

const WEIGHT = 0.7;

function wordSet(text: string): Set<string> {
  return new Set(text.split(' ').filter(word => word.length > 0));
}

export function jaccardSimilarity(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  let shared = 0;
  for (const word of a) {
    if (b.has(word)) shared++;
  }
  const union = a.size + b.size - shared;
  return union === 0 ? 0 : shared / union;
}

export class WordBasedMatchingStrategy implements MatchingStrategy {
  readonly name = 'word_based_matching';
  readonly threshold = STRATEGY_THRESHOLDS.word_based_matching;

  constructor(private readonly normalize: Normalizer) {}

  match(sourceName: string, candidates: readonly string[]): MatchResult {
    const sourceWords = wordSet(this.normalize(sourceName));
    if (sourceWords.size === 0) {
      return noMatch(sourceName, this.name);
    }

    const scored: ScoredCandidate[] = [];
    for (const candidate of candidates) {
      const similarity = jaccardSimilarity(sourceWords, wordSet(this.normalize(candidate)));
      if (similarity > MATCHING_LIMITS.WORD_MIN_JACCARD) {
        scored.push({ name: candidate, score: similarity });
      }
    }

    const { best, alternatives } = rankCandidates(scored, MATCHING_LIMITS.MAX_ALTERNATIVES);
    if (!best) {
      return noMatch(sourceName, this.name);
    }

    return matchOf(sourceName, this.name, best.name, best.score * WEIGHT, alternatives);
  }
}
