/**
 * MappingStore backed by PostgreSQL through drizzle-orm.
 */

import { and, asc, desc, eq, gt, gte, or, sql } from 'drizzle-orm';
import type {
  AttemptRecord,
  AttemptRecordInput,
  LearnedMapping,
  LearnedMappingInput,
  ManualMapping,
} from '@team-identity/shared/types';
import type { Database } from '../db/connection.js';
import * as schema from '../db/schema.js';
import { PersistenceUnavailableError } from '../errors.js';
import { MATCHING_LIMITS } from '../matching/thresholds.js';
import { DEFAULT_LIST_LIMIT, type LearnedMappingFilter, type MappingStore } from './types.js';

// The unique index cannot see NULLs as equal, so "no context" is stored as ''
const NO_CONTEXT = '';

function toLearnedMapping(row: schema.TeamMappingRow): LearnedMapping {
  return {
    sourceName: row.sourceName,
    matchedName: row.matchedName,
    confidence: row.confidence,
    strategyUsed: row.strategyUsed,
    createdAt: row.createdAt,
    verified: row.verified,
    context: row.context === NO_CONTEXT ? null : row.context,
  };
}

function toAttemptRecord(row: schema.MappingAttemptRow): AttemptRecord {
  return {
    sourceName: row.sourceName,
    matchedName: row.matchedName,
    confidence: row.confidence,
    strategyUsed: row.strategyUsed,
    success: row.success,
    elapsedMs: row.elapsedMs,
    alternatives: row.alternatives,
    context: row.context,
    attemptedAt: row.attemptedAt,
  };
}

export class PostgresMappingStore implements MappingStore {
  constructor(
    private readonly db: Database,
    private readonly onClose: () => Promise<void> = async () => {}
  ) {}

  private async run<T>(operation: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      throw new PersistenceUnavailableError(operation, error);
    }
  }

  loadManualMappings(): Promise<ManualMapping[]> {
    return this.run('loadManualMappings', async () =>
      this.db
        .select({
          sourceName: schema.manualMappings.sourceName,
          canonicalName: schema.manualMappings.canonicalName,
        })
        .from(schema.manualMappings)
        .orderBy(asc(schema.manualMappings.id))
    );
  }

  loadTrustedLearnedMappings(): Promise<LearnedMapping[]> {
    return this.run('loadTrustedLearnedMappings', async () => {
      const rows = await this.db
        .select()
        .from(schema.teamMappings)
        .where(
          or(
            eq(schema.teamMappings.verified, true),
            gt(schema.teamMappings.confidence, MATCHING_LIMITS.TRUSTED_LEARNED_CONFIDENCE)
          )
        )
        .orderBy(desc(schema.teamMappings.confidence), asc(schema.teamMappings.id));
      return rows.map(toLearnedMapping);
    });
  }

  upsertLearnedMapping(mapping: LearnedMappingInput): Promise<void> {
    return this.run('upsertLearnedMapping', async () => {
      await this.db
        .insert(schema.teamMappings)
        .values({
          sourceName: mapping.sourceName,
          matchedName: mapping.matchedName,
          confidence: mapping.confidence,
          strategyUsed: mapping.strategyUsed,
          verified: mapping.verified,
          context: mapping.context ?? NO_CONTEXT,
        })
        .onConflictDoUpdate({
          target: [
            schema.teamMappings.sourceName,
            schema.teamMappings.matchedName,
            schema.teamMappings.context,
          ],
          set: {
            confidence: sql`excluded.confidence`,
            strategyUsed: sql`excluded.strategy_used`,
            createdAt: sql`now()`,
            verified: sql`${schema.teamMappings.verified} OR excluded.verified`,
          },
        });
    });
  }

  deleteLearnedMapping(sourceName: string, matchedName: string): Promise<number> {
    return this.run('deleteLearnedMapping', async () => {
      const removed = await this.db
        .delete(schema.teamMappings)
        .where(
          and(
            eq(schema.teamMappings.sourceName, sourceName),
            eq(schema.teamMappings.matchedName, matchedName)
          )
        )
        .returning({ id: schema.teamMappings.id });
      return removed.length;
    });
  }

  countLearnedMappings(): Promise<number> {
    return this.run('countLearnedMappings', async () => {
      const result = await this.db
        .select({ count: sql<number>`count(*)::int` })
        .from(schema.teamMappings);
      return result[0]?.count ?? 0;
    });
  }

  listLearnedMappings(filter: LearnedMappingFilter = {}): Promise<LearnedMapping[]> {
    return this.run('listLearnedMappings', async () => {
      const rows = await this.db
        .select()
        .from(schema.teamMappings)
        .where(
          filter.verified === undefined
            ? undefined
            : eq(schema.teamMappings.verified, filter.verified)
        )
        .orderBy(desc(schema.teamMappings.createdAt), asc(schema.teamMappings.id))
        .limit(filter.limit ?? DEFAULT_LIST_LIMIT);
      return rows.map(toLearnedMapping);
    });
  }

  appendAttempt(record: AttemptRecordInput): Promise<void> {
    return this.run('appendAttempt', async () => {
      await this.db.insert(schema.mappingAttempts).values({
        sourceName: record.sourceName,
        matchedName: record.matchedName,
        confidence: record.confidence,
        strategyUsed: record.strategyUsed,
        success: record.success,
        elapsedMs: record.elapsedMs,
        alternatives: record.alternatives,
        context: record.context,
        attemptedAt: record.attemptedAt ?? new Date(),
      });
    });
  }

  listAttemptsSince(cutoff: Date): Promise<AttemptRecord[]> {
    return this.run('listAttemptsSince', async () => {
      const rows = await this.db
        .select()
        .from(schema.mappingAttempts)
        .where(gte(schema.mappingAttempts.attemptedAt, cutoff))
        .orderBy(asc(schema.mappingAttempts.attemptedAt), asc(schema.mappingAttempts.id));
      return rows.map(toAttemptRecord);
    });
  }

  close(): Promise<void> {
    return this.onClose();
  }
}
