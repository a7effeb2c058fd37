import {
  pgTable,
  serial,
  text,
  boolean,
  timestamp,
  doublePrecision,
  jsonb,
  uniqueIndex,
  index,
  pgEnum,
} from 'drizzle-orm/pg-core';
import { LEARNED_STRATEGY_NAMES, STRATEGY_NAMES } from '../matching/thresholds.js';

// ============================================================================
// ENUMS
// ============================================================================

export const strategyNameEnum = pgEnum('strategy_name', STRATEGY_NAMES);
export const learnedStrategyNameEnum = pgEnum('learned_strategy_name', LEARNED_STRATEGY_NAMES);

// ============================================================================
// MANUAL MAPPINGS
// ============================================================================

// Curated rows layered over the built-in table; never written by the resolver
export const manualMappings = pgTable('manual_mappings', {
  id: serial('id').primaryKey(),
  sourceName: text('source_name').notNull().unique(),
  canonicalName: text('canonical_name').notNull(),
  createdAt: timestamp('created_at').defaultNow(),
});

// ============================================================================
// LEARNED MAPPINGS
// ============================================================================

export const teamMappings = pgTable('team_mappings', {
  id: serial('id').primaryKey(),
  sourceName: text('source_name').notNull(),
  matchedName: text('matched_name').notNull(),
  confidence: doublePrecision('confidence').notNull(),
  strategyUsed: learnedStrategyNameEnum('strategy_used').notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  verified: boolean('verified').notNull().default(false),
  context: text('context').notNull().default(''), // '' when there is no context
}, (table) => ({
  pairContextIdx: uniqueIndex('team_mappings_pair_context_idx').on(
    table.sourceName,
    table.matchedName,
    table.context
  ),
  sourceIdx: index('team_mappings_source_idx').on(table.sourceName),
  matchedIdx: index('team_mappings_matched_idx').on(table.matchedName),
}));

// ============================================================================
// ATTEMPT LOG
// ============================================================================

export const mappingAttempts = pgTable('mapping_attempts', {
  id: serial('id').primaryKey(),
  sourceName: text('source_name').notNull(),
  matchedName: text('matched_name'),
  confidence: doublePrecision('confidence').notNull(),
  strategyUsed: strategyNameEnum('strategy_used').notNull(),
  success: boolean('success').notNull(),
  elapsedMs: doublePrecision('elapsed_ms').notNull(),
  alternatives: jsonb('alternatives').$type<string[]>().notNull().default([]),
  context: text('context'),
  attemptedAt: timestamp('attempted_at').defaultNow().notNull(),
}, (table) => ({
  attemptedAtIdx: index('mapping_attempts_attempted_at_idx').on(table.attemptedAt),
  sourceIdx: index('mapping_attempts_source_idx').on(table.sourceName),
}));

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type ManualMappingRow = typeof manualMappings.$inferSelect;
export type TeamMappingRow = typeof teamMappings.$inferSelect;
export type NewTeamMappingRow = typeof teamMappings.$inferInsert;
export type MappingAttemptRow = typeof mappingAttempts.$inferSelect;
export type NewMappingAttemptRow = typeof mappingAttempts.$inferInsert;
