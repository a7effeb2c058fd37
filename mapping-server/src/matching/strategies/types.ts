/**
 * Types for the matching strategy cascade.
 */

import type { MatchResult, StrategyName } from '@team-identity/shared/types';

/**
 * One step of the cascade. Strategies are synchronous and side-effect free:
 * anything they need (mapping tables, the normalizer) is injected up front.
 */
export interface MatchingStrategy {
  readonly name: StrategyName;
  /** Minimum confidence for the cascade to stop at this strategy */
  readonly threshold: number;
  match(sourceName: string, candidates: readonly string[]): MatchResult;
}

/**
 * Read side of the knowledge base used by the lookup strategies.
 */
export interface MappingLookup {
  lookupManual(sourceName: string): string | null;
  lookupLearned(sourceName: string): string | null;
}

export interface ScoredCandidate {
  name: string;
  score: number;
}

export function noMatch(sourceName: string, strategy: StrategyName): MatchResult {
  return {
    sourceName,
    matchedName: '',
    confidence: 0,
    strategyUsed: strategy,
    matchFound: false,
    alternatives: [],
    elapsedMs: 0,
  };
}

export function matchOf(
  sourceName: string,
  strategy: StrategyName,
  matchedName: string,
  confidence: number,
  alternatives: string[] = [],
  matchFound = confidence > 0
): MatchResult {
  return {
    sourceName,
    matchedName,
    confidence,
    strategyUsed: strategy,
    matchFound,
    alternatives,
    elapsedMs: 0,
  };
}

/**
 * Pick the highest score (earliest wins a tie) and rank the rest as alternatives.
 */
export function rankCandidates(
  scored: readonly ScoredCandidate[],
  limit: number,
  isAlternative: (candidate: ScoredCandidate) => boolean = () => true
): { best: ScoredCandidate | null; alternatives: string[] } {
  let best: ScoredCandidate | null = null;
  for (const candidate of scored) {
    if (!best || candidate.score > best.score) {
      best = candidate;
    }
  }

  const alternatives = scored
    .filter(candidate => candidate !== best && isAlternative(candidate))
    .sort((a, b) => b.score - a.score)
    .slice(0, limit)
    .map(candidate => candidate.name);

  return { best, alternatives };
}
