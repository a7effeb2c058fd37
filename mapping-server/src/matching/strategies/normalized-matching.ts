/**
 * Normalized matching - equality after the normalization rules are applied.
 */

import type { MatchResult } from '@team-identity/shared/types';
import type { Normalizer } from '../normalizer.js';
import { STRATEGY_THRESHOLDS } from '../thresholds.js';
import { matchOf, noMatch, type MatchingStrategy } from './types.js';

export class NormalizedMatchingStrategy implements MatchingStrategy {
  readonly name = 'normalized_matching';
  readonly threshold = STRATEGY_THRESHOLDS.normalized_matching;

  constructor(private readonly normalize: Normalizer) {}

  match(sourceName: string, candidates: readonly string[]): MatchResult {
    const key = this.normalize(sourceName);
    // Names that normalize away entirely ("FC") must not match each other
    if (!key) {
      return noMatch(sourceName, this.name);
    }

    const found = candidates.find(candidate => this.normalize(candidate) === key);
    return found === undefined
      ? noMatch(sourceName, this.name)
      : matchOf(sourceName, this.name, found, 0.85);
  }
}
