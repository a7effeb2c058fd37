import type { LearnedStrategyName, StrategyName } from '@team-identity/shared/types';

// Cascade order; also the values of the strategy enums in the database
export const STRATEGY_NAMES = [
  'exact_match',
  'manual_mapping',
  'learned_mapping',
  'normalized_matching',
  'substring_matching',
  'word_based_matching',
  'fuzzy_matching',
] as const satisfies readonly StrategyName[];

export const LEARNED_STRATEGY_NAMES = [
  ...STRATEGY_NAMES,
  'manual_verification',
] as const satisfies readonly LearnedStrategyName[];

/**
 * Minimum confidence at which each strategy's result is accepted by the cascade.
 */
export const STRATEGY_THRESHOLDS = {
  exact_match: 1.0,
  manual_mapping: 0.95,
  learned_mapping: 0.9,
  normalized_matching: 0.85,
  substring_matching: 0.75,
  word_based_matching: 0.7,
  fuzzy_matching: 0.6,
} as const satisfies Record<StrategyName, number>;

export const MATCHING_LIMITS = {
  // Accepted results at or above this are written back as learned mappings
  LEARNING_FLOOR: 0.8,
  // Unverified learned mappings must exceed this to be used for lookups
  TRUSTED_LEARNED_CONFIDENCE: 0.9,
  SUBSTRING_ALTERNATIVE_RATIO: 0.5,
  WORD_MIN_JACCARD: 0.3,
  FUZZY_MIN_RATIO: 0.4,
  // Fuzzy results at or above this confidence report matchFound even when rejected by the cascade
  FUZZY_REPORTING_FLOOR: 0.3,
  MAX_ALTERNATIVES: 3,
} as const;
