/**
 * Exact match strategy - case-sensitive string equality.
 */

import type { MatchResult } from '@team-identity/shared/types';
import { STRATEGY_THRESHOLDS } from '../thresholds.js';
import { matchOf, noMatch, type MatchingStrategy } from './types.js';

export class ExactMatchStrategy implements MatchingStrategy {
  readonly name = 'exact_match';
  readonly threshold = STRATEGY_THRESHOLDS.exact_match;

  match(sourceName: string, candidates: readonly string[]): MatchResult {
    const exact = candidates.find(candidate => candidate === sourceName);
    return exact === undefined
      ? noMatch(sourceName, this.name)
      : matchOf(sourceName, this.name, exact, 1.0);
  }
}
