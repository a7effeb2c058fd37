import { describe, it, expect } from 'vitest';
import type { LearnedMappingInput } from '@team-identity/shared/types';
import { MemoryMappingStore } from './memory-store.js';

function fixedClock(...isoTimes: string[]): () => Date {
  let index = 0;
  return () => new Date(isoTimes[Math.min(index++, isoTimes.length - 1)] ?? '2026-01-01T00:00:00Z');
}

const learned = (overrides: Partial<LearnedMappingInput> = {}): LearnedMappingInput => ({
  sourceName: 'Spurs',
  matchedName: 'Tottenham',
  confidence: 0.85,
  strategyUsed: 'normalized_matching',
  verified: false,
  context: null,
  ...overrides,
});

describe('MemoryMappingStore', () => {
  describe('upsertLearnedMapping', () => {
    it('updates the row for the same pair and context', async () => {
      const store = new MemoryMappingStore({
        now: fixedClock('2026-01-01T00:00:00Z', '2026-01-02T00:00:00Z'),
      });

      await store.upsertLearnedMapping(learned());
      await store.upsertLearnedMapping(learned({ confidence: 0.95, strategyUsed: 'manual_mapping' }));

      const rows = await store.listLearnedMappings();
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({
        confidence: 0.95,
        strategyUsed: 'manual_mapping',
        createdAt: new Date('2026-01-02T00:00:00Z'),
      });
    });

    it('keeps separate rows per context', async () => {
      const store = new MemoryMappingStore();
      await store.upsertLearnedMapping(learned());
      await store.upsertLearnedMapping(learned({ context: 'Premier League' }));

      expect(await store.countLearnedMappings()).toBe(2);
    });

    it('never clears the verified flag', async () => {
      const store = new MemoryMappingStore();
      await store.upsertLearnedMapping(learned({ verified: true, confidence: 1 }));
      await store.upsertLearnedMapping(learned({ verified: false, confidence: 0.85 }));

      const [row] = await store.listLearnedMappings();
      expect(row?.verified).toBe(true);
      expect(row?.confidence).toBe(0.85);
    });
  });

  describe('loadTrustedLearnedMappings', () => {
    it('returns verified or high-confidence rows, best first', async () => {
      const store = new MemoryMappingStore();
      await store.upsertLearnedMapping(learned({ sourceName: 'A', confidence: 0.85 }));
      await store.upsertLearnedMapping(learned({ sourceName: 'B', confidence: 0.9 }));
      await store.upsertLearnedMapping(learned({ sourceName: 'C', confidence: 0.92 }));
      await store.upsertLearnedMapping(learned({ sourceName: 'D', confidence: 0.5, verified: true }));
      await store.upsertLearnedMapping(learned({ sourceName: 'E', confidence: 1 }));

      const trusted = await store.loadTrustedLearnedMappings();
      expect(trusted.map(row => row.sourceName)).toEqual(['E', 'C', 'D']);
    });
  });

  describe('deleteLearnedMapping', () => {
    it('removes the pair in every context', async () => {
      const store = new MemoryMappingStore();
      await store.upsertLearnedMapping(learned());
      await store.upsertLearnedMapping(learned({ context: 'Premier League' }));
      await store.upsertLearnedMapping(learned({ matchedName: 'Tottenham Hotspur' }));

      expect(await store.deleteLearnedMapping('Spurs', 'Tottenham')).toBe(2);
      expect(await store.deleteLearnedMapping('Spurs', 'Tottenham')).toBe(0);
      expect(await store.countLearnedMappings()).toBe(1);
    });
  });

  describe('listLearnedMappings', () => {
    it('filters on verified and sorts newest first', async () => {
      const store = new MemoryMappingStore({
        now: fixedClock('2026-01-01T00:00:00Z', '2026-01-03T00:00:00Z', '2026-01-02T00:00:00Z'),
      });
      await store.upsertLearnedMapping(learned({ sourceName: 'A' }));
      await store.upsertLearnedMapping(learned({ sourceName: 'B', verified: true }));
      await store.upsertLearnedMapping(learned({ sourceName: 'C' }));

      const all = await store.listLearnedMappings();
      expect(all.map(row => row.sourceName)).toEqual(['B', 'C', 'A']);

      const unverified = await store.listLearnedMappings({ verified: false, limit: 1 });
      expect(unverified.map(row => row.sourceName)).toEqual(['C']);
    });
  });

  describe('attempts', () => {
    it('lists attempts from the cutoff onwards, oldest first', async () => {
      const store = new MemoryMappingStore({ now: fixedClock('2026-01-05T00:00:00Z') });
      const base = {
        matchedName: null,
        confidence: 0,
        strategyUsed: 'fuzzy_matching' as const,
        success: false,
        elapsedMs: 1,
        alternatives: [],
        context: null,
      };

      await store.appendAttempt({ ...base, sourceName: 'late', attemptedAt: new Date('2026-01-04T00:00:00Z') });
      await store.appendAttempt({ ...base, sourceName: 'early', attemptedAt: new Date('2026-01-01T00:00:00Z') });
      await store.appendAttempt({ ...base, sourceName: 'cutoff', attemptedAt: new Date('2026-01-02T00:00:00Z') });
      await store.appendAttempt({ ...base, sourceName: 'stamped' });

      const attempts = await store.listAttemptsSince(new Date('2026-01-02T00:00:00Z'));
      expect(attempts.map(a => a.sourceName)).toEqual(['cutoff', 'late', 'stamped']);
      expect(attempts[2]?.attemptedAt).toEqual(new Date('2026-01-05T00:00:00Z'));
    });
  });

  it('returns copies of the manual mappings', async () => {
    const store = new MemoryMappingStore({
      manualMappings: [{ sourceName: 'Man City', canonicalName: 'Manchester City' }],
    });
    const rows = await store.loadManualMappings();
    rows[0] = { sourceName: 'x', canonicalName: 'y' };

    expect(await store.loadManualMappings()).toEqual([
      { sourceName: 'Man City', canonicalName: 'Manchester City' },
    ]);
  });
});
