/**
 * Strategy cascade construction.
 * Order matters: the resolver stops at the first strategy that clears its threshold.
 */

import type { Normalizer } from '../normalizer.js';
import type { MappingLookup, MatchingStrategy } from './types.js';
import { ExactMatchStrategy } from './exact-match.js';
import { ManualMappingStrategy } from './manual-mapping.js';
import { LearnedMappingStrategy } from './learned-mapping.js';
import { NormalizedMatchingStrategy } from './normalized-matching.js';
import { SubstringMatchingStrategy } from './substring-matching.js';
import { WordBasedMatchingStrategy } from './word-based-matching.js';
import { FuzzyMatchingStrategy } from './fuzzy-matching.js';

export type { MatchingStrategy, MappingLookup, ScoredCandidate } from './types.js';
export { noMatch, matchOf, rankCandidates } from './types.js';
export {
  ExactMatchStrategy,
  ManualMappingStrategy,
  LearnedMappingStrategy,
  NormalizedMatchingStrategy,
  SubstringMatchingStrategy,
  WordBasedMatchingStrategy,
  FuzzyMatchingStrategy,
};

export function buildStrategyCascade(lookup: MappingLookup, normalize: Normalizer): MatchingStrategy[] {
  return [
    new ExactMatchStrategy(),
    new ManualMappingStrategy(lookup),
    new LearnedMappingStrategy(lookup),
    new NormalizedMatchingStrategy(normalize),
    new SubstringMatchingStrategy(normalize),
    new WordBasedMatchingStrategy(normalize),
    new FuzzyMatchingStrategy(normalize),
  ];
}
