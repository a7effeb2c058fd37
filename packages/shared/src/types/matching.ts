// Strategy tags, in cascade order
export type StrategyName =
  | 'exact_match'
  | 'manual_mapping'
  | 'learned_mapping'
  | 'normalized_matching'
  | 'substring_matching'
  | 'word_based_matching'
  | 'fuzzy_matching';

/**
 * Tags stored on a learned mapping. Operator confirmations are recorded
 * as `manual_verification` rather than the strategy that first found them.
 */
export type LearnedStrategyName = StrategyName | 'manual_verification';

/**
 * Outcome of resolving one provider team name against a candidate list.
 */
export interface MatchResult {
  sourceName: string;
  matchedName: string;             // '' when nothing matched
  confidence: number;              // 0-1
  strategyUsed: StrategyName;
  matchFound: boolean;
  alternatives: string[];          // Up to 3 next-best candidates
  elapsedMs: number;
}

export interface ResolveRequest {
  sourceName: string;
  candidates: string[];
  context?: string | null;         // Competition or other grouping key
}
