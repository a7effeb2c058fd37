import type { StrategyName } from './matching.js';

export interface OverallStats {
  totalAttempts: number;
  successfulMappings: number;
  successRate: number;
  avgConfidence: number;           // Over successful attempts only
  avgElapsedMs: number;            // Over all attempts
}

export interface StrategyPerformance {
  strategyUsed: StrategyName;
  attempts: number;
  successes: number;
  successRate: number;
  avgConfidence: number;
}

export interface FailedMapping {
  sourceName: string;
  alternatives: string[];
  context: string | null;
  failureCount: number;
}

export interface RecentSuccess {
  sourceName: string;
  matchedName: string;
  confidence: number;
  strategyUsed: StrategyName;
  attemptedAt: string;             // ISO timestamp
  context: string | null;
}

export interface MappingReport {
  reportDate: string;
  periodDays: number;
  overallStats: OverallStats;
  strategyPerformance: StrategyPerformance[];
  failedMappings: FailedMapping[];
  recentSuccesses: RecentSuccess[];
  manualMappingsCount: number;
  learnedMappingsCount: number;
}
