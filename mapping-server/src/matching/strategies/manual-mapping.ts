/**
 * Manual mapping strategy - curated table keyed by the exact provider string.
 */

import type { MatchResult } from '@team-identity/shared/types';
import { STRATEGY_THRESHOLDS } from '../thresholds.js';
import { matchOf, noMatch, type MappingLookup, type MatchingStrategy } from './types.js';

export class ManualMappingStrategy implements MatchingStrategy {
  readonly name = 'manual_mapping';
  readonly threshold = STRATEGY_THRESHOLDS.manual_mapping;

  constructor(private readonly lookup: MappingLookup) {}

  match(sourceName: string, candidates: readonly string[]): MatchResult {
    const mapped = this.lookup.lookupManual(sourceName);
    // The mapped name only counts when the provider actually offers it
    if (mapped && candidates.includes(mapped)) {
      return matchOf(sourceName, this.name, mapped, 0.95);
    }
    return noMatch(sourceName, this.name);
  }
}
