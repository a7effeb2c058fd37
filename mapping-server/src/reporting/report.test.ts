import { describe, it, expect } from 'vitest';
import type { AttemptRecord } from '@team-identity/shared/types';
import { buildMappingReport, reportCutoff } from './report.js';

const now = new Date('2026-03-10T00:00:00Z');

function attempt(overrides: Partial<AttemptRecord> & Pick<AttemptRecord, 'sourceName' | 'attemptedAt'>): AttemptRecord {
  return {
    matchedName: null,
    confidence: 0,
    strategyUsed: 'fuzzy_matching',
    success: false,
    elapsedMs: 0,
    alternatives: [],
    context: null,
    ...overrides,
  };
}

const attempts: AttemptRecord[] = [
  attempt({
    sourceName: 'Torino',
    matchedName: 'Torino',
    confidence: 1,
    strategyUsed: 'exact_match',
    success: true,
    attemptedAt: new Date('2026-03-01T00:00:00Z'),
  }),
  attempt({
    sourceName: 'Milan',
    matchedName: 'Milan',
    confidence: 1,
    strategyUsed: 'exact_match',
    success: true,
    attemptedAt: new Date('2026-03-03T00:00:00Z'),
  }),
  attempt({
    sourceName: 'Inter',
    matchedName: 'Inter Milan',
    confidence: 0.95,
    strategyUsed: 'manual_mapping',
    success: true,
    elapsedMs: 2,
    attemptedAt: new Date('2026-03-05T00:00:00Z'),
  }),
  attempt({
    sourceName: 'Lazio',
    confidence: 0.2,
    elapsedMs: 4,
    alternatives: ['Lazio Roma'],
    context: 'Serie A',
    attemptedAt: new Date('2026-03-06T00:00:00Z'),
  }),
  attempt({
    sourceName: 'Lazio',
    confidence: 0.2,
    elapsedMs: 4,
    alternatives: ['Lazio Roma'],
    context: 'Serie A',
    attemptedAt: new Date('2026-03-07T00:00:00Z'),
  }),
  attempt({
    sourceName: 'Roma',
    elapsedMs: 6,
    attemptedAt: new Date('2026-03-08T00:00:00Z'),
  }),
  attempt({
    sourceName: 'Napoli',
    matchedName: 'SSC Napoli',
    confidence: 0.85,
    strategyUsed: 'normalized_matching',
    success: true,
    elapsedMs: 8,
    context: 'Serie A',
    attemptedAt: new Date('2026-03-09T00:00:00Z'),
  }),
];

const options = { now, periodDays: 7, manualMappingsCount: 58, learnedMappingsCount: 4 };

describe('reportCutoff', () => {
  it('counts back whole days', () => {
    expect(reportCutoff(now, 7).toISOString()).toBe('2026-03-03T00:00:00.000Z');
  });
});

describe('buildMappingReport', () => {
  const report = buildMappingReport(attempts, options);

  it('summarizes attempts inside the window, cutoff included', () => {
    expect(report.reportDate).toBe('2026-03-10T00:00:00.000Z');
    expect(report.periodDays).toBe(7);
    expect(report.overallStats.totalAttempts).toBe(6);
    expect(report.overallStats.successfulMappings).toBe(3);
    expect(report.overallStats.successRate).toBe(0.5);
    expect(report.overallStats.avgConfidence).toBeCloseTo(2.8 / 3, 10);
    expect(report.overallStats.avgElapsedMs).toBe(4);
  });

  it('ranks strategies by successes', () => {
    expect(report.strategyPerformance).toEqual([
      { strategyUsed: 'exact_match', attempts: 1, successes: 1, successRate: 1, avgConfidence: 1 },
      { strategyUsed: 'manual_mapping', attempts: 1, successes: 1, successRate: 1, avgConfidence: 0.95 },
      { strategyUsed: 'normalized_matching', attempts: 1, successes: 1, successRate: 1, avgConfidence: 0.85 },
      { strategyUsed: 'fuzzy_matching', attempts: 3, successes: 0, successRate: 0, avgConfidence: 0 },
    ]);
  });

  it('groups failures by name, alternatives and context', () => {
    expect(report.failedMappings).toEqual([
      { sourceName: 'Lazio', alternatives: ['Lazio Roma'], context: 'Serie A', failureCount: 2 },
      { sourceName: 'Roma', alternatives: [], context: null, failureCount: 1 },
    ]);
  });

  it('lists recent successes newest first', () => {
    expect(report.recentSuccesses).toEqual([
      {
        sourceName: 'Napoli',
        matchedName: 'SSC Napoli',
        confidence: 0.85,
        strategyUsed: 'normalized_matching',
        attemptedAt: '2026-03-09T00:00:00.000Z',
        context: 'Serie A',
      },
      {
        sourceName: 'Inter',
        matchedName: 'Inter Milan',
        confidence: 0.95,
        strategyUsed: 'manual_mapping',
        attemptedAt: '2026-03-05T00:00:00.000Z',
        context: null,
      },
      {
        sourceName: 'Milan',
        matchedName: 'Milan',
        confidence: 1,
        strategyUsed: 'exact_match',
        attemptedAt: '2026-03-03T00:00:00.000Z',
        context: null,
      },
    ]);
  });

  it('passes the table sizes through', () => {
    expect(report.manualMappingsCount).toBe(58);
    expect(report.learnedMappingsCount).toBe(4);
  });

  it('reports zeros for an empty window', () => {
    const empty = buildMappingReport([], options);
    expect(empty.overallStats).toEqual({
      totalAttempts: 0,
      successfulMappings: 0,
      successRate: 0,
      avgConfidence: 0,
      avgElapsedMs: 0,
    });
    expect(empty.strategyPerformance).toEqual([]);
    expect(empty.failedMappings).toEqual([]);
    expect(empty.recentSuccesses).toEqual([]);
  });
});
