import type { LearnedStrategyName, StrategyName } from './matching.js';

/**
 * Curated association from an exact provider string to its canonical name.
 */
export interface ManualMapping {
  sourceName: string;
  canonicalName: string;
}

/**
 * A mapping discovered at runtime (or confirmed by an operator) and persisted for reuse.
 * Unique on (sourceName, matchedName, context).
 */
export interface LearnedMapping {
  sourceName: string;
  matchedName: string;
  confidence: number;
  strategyUsed: LearnedStrategyName;
  createdAt: Date;
  verified: boolean;
  context: string | null;
}

export type LearnedMappingInput = Omit<LearnedMapping, 'createdAt'>;

/**
 * Append-only record of a single resolve call.
 */
export interface AttemptRecord {
  sourceName: string;
  matchedName: string | null;
  confidence: number;
  strategyUsed: StrategyName;
  success: boolean;
  elapsedMs: number;
  alternatives: string[];
  context: string | null;
  attemptedAt: Date;
}

export type AttemptRecordInput = Omit<AttemptRecord, 'attemptedAt'> & { attemptedAt?: Date };

export interface NormalizationRule {
  pattern: string;                 // Regular expression source, matched case-insensitively
  replacement: string;
}
