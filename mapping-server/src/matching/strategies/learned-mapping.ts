import type { MatchResult } from '@team-identity/shared/types';
import { STRATEGY_THRESHOLDS } from '../thresholds.js';
import { matchOf, noMatch, type MappingLookup, type MatchingStrategy } from './types.js';

export class LearnedMappingStrategy implements MatchingStrategy {
  readonly name = 'learned_mapping';
  readonly threshold = STRATEGY_THRESHOLDS.learned_mapping;

  constructor(private readonly lookup: MappingLookup) {}

  match(sourceName: string, candidates: readonly string[]): MatchResult {
    const learned = this.lookup.lookupLearned(sourceName);
    if (learned && candidates.includes(learned)) {
      return matchOf(sourceName, this.name, learned, 0.9);
    }
    return noMatch(sourceName, this.name);
  }
}
