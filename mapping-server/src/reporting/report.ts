/**
 * Aggregation of the attempt log into a MappingReport.
 */

import type {
  AttemptRecord,
  FailedMapping,
  MappingReport,
  RecentSuccess,
  StrategyName,
  StrategyPerformance,
} from '@team-identity/shared/types';

const MAX_FAILED_MAPPINGS = 20;
const MAX_RECENT_SUCCESSES = 10;

export const DAY_MS = 24 * 60 * 60 * 1000;

export interface ReportOptions {
  now: Date;
  periodDays: number;
  manualMappingsCount: number;
  learnedMappingsCount: number;
}

export function reportCutoff(now: Date, periodDays: number): Date {
  return new Date(now.getTime() - periodDays * DAY_MS);
}

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function strategyPerformance(attempts: readonly AttemptRecord[]): StrategyPerformance[] {
  const groups = new Map<StrategyName, AttemptRecord[]>();
  for (const attempt of attempts) {
    const group = groups.get(attempt.strategyUsed);
    if (group) {
      group.push(attempt);
    } else {
      groups.set(attempt.strategyUsed, [attempt]);
    }
  }

  return [...groups.entries()]
    .map(([strategyUsed, group]) => {
      const successes = group.filter(a => a.success);
      return {
        strategyUsed,
        attempts: group.length,
        successes: successes.length,
        successRate: successes.length / group.length,
        avgConfidence: mean(successes.map(a => a.confidence)),
      };
    })
    .sort((a, b) => b.successes - a.successes);
}

function failedMappings(attempts: readonly AttemptRecord[]): FailedMapping[] {
  const groups = new Map<string, FailedMapping>();
  for (const attempt of attempts) {
    if (attempt.success) continue;

    const key = JSON.stringify([attempt.sourceName, attempt.alternatives, attempt.context]);
    const group = groups.get(key);
    if (group) {
      group.failureCount++;
    } else {
      groups.set(key, {
        sourceName: attempt.sourceName,
        alternatives: [...attempt.alternatives],
        context: attempt.context,
        failureCount: 1,
      });
    }
  }

  return [...groups.values()]
    .sort((a, b) => b.failureCount - a.failureCount)
    .slice(0, MAX_FAILED_MAPPINGS);
}

function recentSuccesses(attempts: readonly AttemptRecord[]): RecentSuccess[] {
  return attempts
    .filter(a => a.success)
    .reverse()
    .sort((a, b) => b.attemptedAt.getTime() - a.attemptedAt.getTime())
    .slice(0, MAX_RECENT_SUCCESSES)
    .map(a => ({
      sourceName: a.sourceName,
      matchedName: a.matchedName ?? '',
      confidence: a.confidence,
      strategyUsed: a.strategyUsed,
      attemptedAt: a.attemptedAt.toISOString(),
      context: a.context,
    }));
}

/**
 * Build a report over the attempts inside the window ending at `options.now`.
 * Attempts outside the window are ignored, so callers may pass a wider slice.
 */
export function buildMappingReport(
  attempts: readonly AttemptRecord[],
  options: ReportOptions
): MappingReport {
  const cutoff = reportCutoff(options.now, options.periodDays).getTime();
  const inWindow = attempts.filter(a => a.attemptedAt.getTime() >= cutoff);
  const successes = inWindow.filter(a => a.success);

  return {
    reportDate: options.now.toISOString(),
    periodDays: options.periodDays,
    overallStats: {
      totalAttempts: inWindow.length,
      successfulMappings: successes.length,
      successRate: inWindow.length > 0 ? successes.length / inWindow.length : 0,
      avgConfidence: mean(successes.map(a => a.confidence)),
      avgElapsedMs: mean(inWindow.map(a => a.elapsedMs)),
    },
    strategyPerformance: strategyPerformance(inWindow),
    failedMappings: failedMappings(inWindow),
    recentSuccesses: recentSuccesses(inWindow),
    manualMappingsCount: options.manualMappingsCount,
    learnedMappingsCount: options.learnedMappingsCount,
  };
}
