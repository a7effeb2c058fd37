/**
 * In-process MappingStore with the same semantics as the PostgreSQL store.
 * Used by tests and by MAPPING_STORE=memory.
 */

import type {
  AttemptRecord,
  AttemptRecordInput,
  LearnedMapping,
  LearnedMappingInput,
  ManualMapping,
} from '@team-identity/shared/types';
import { MATCHING_LIMITS } from '../matching/thresholds.js';
import { DEFAULT_LIST_LIMIT, type LearnedMappingFilter, type MappingStore } from './types.js';

export interface MemoryMappingStoreOptions {
  manualMappings?: ManualMapping[];
  now?: () => Date;
}

function byNewest(a: LearnedMapping, b: LearnedMapping): number {
  return b.createdAt.getTime() - a.createdAt.getTime();
}

export class MemoryMappingStore implements MappingStore {
  private readonly manual: ManualMapping[];
  private learned: LearnedMapping[] = [];
  private readonly attempts: AttemptRecord[] = [];
  private readonly now: () => Date;

  constructor(options: MemoryMappingStoreOptions = {}) {
    this.manual = [...(options.manualMappings ?? [])];
    this.now = options.now ?? (() => new Date());
  }

  async loadManualMappings(): Promise<ManualMapping[]> {
    return this.manual.map(mapping => ({ ...mapping }));
  }

  async loadTrustedLearnedMappings(): Promise<LearnedMapping[]> {
    return this.learned
      .filter(m => m.verified || m.confidence > MATCHING_LIMITS.TRUSTED_LEARNED_CONFIDENCE)
      .sort((a, b) => b.confidence - a.confidence)
      .map(mapping => ({ ...mapping }));
  }

  async upsertLearnedMapping(mapping: LearnedMappingInput): Promise<void> {
    const existing = this.learned.find(
      m =>
        m.sourceName === mapping.sourceName &&
        m.matchedName === mapping.matchedName &&
        m.context === mapping.context
    );

    if (existing) {
      existing.confidence = mapping.confidence;
      existing.strategyUsed = mapping.strategyUsed;
      existing.createdAt = this.now();
      existing.verified = existing.verified || mapping.verified;
      return;
    }

    this.learned.push({ ...mapping, createdAt: this.now() });
  }

  async deleteLearnedMapping(sourceName: string, matchedName: string): Promise<number> {
    const before = this.learned.length;
    this.learned = this.learned.filter(
      m => !(m.sourceName === sourceName && m.matchedName === matchedName)
    );
    return before - this.learned.length;
  }

  async countLearnedMappings(): Promise<number> {
    return this.learned.length;
  }

  async listLearnedMappings(filter: LearnedMappingFilter = {}): Promise<LearnedMapping[]> {
    return this.learned
      .filter(m => filter.verified === undefined || m.verified === filter.verified)
      .sort(byNewest)
      .slice(0, filter.limit ?? DEFAULT_LIST_LIMIT)
      .map(mapping => ({ ...mapping }));
  }

  async appendAttempt(record: AttemptRecordInput): Promise<void> {
    this.attempts.push({
      ...record,
      alternatives: [...record.alternatives],
      attemptedAt: record.attemptedAt ?? this.now(),
    });
  }

  async listAttemptsSince(cutoff: Date): Promise<AttemptRecord[]> {
    return this.attempts
      .filter(a => a.attemptedAt.getTime() >= cutoff.getTime())
      .sort((a, b) => a.attemptedAt.getTime() - b.attemptedAt.getTime())
      .map(attempt => ({ ...attempt, alternatives: [...attempt.alternatives] }));
  }

  async close(): Promise<void> {}
}
