import { sql } from 'drizzle-orm';
import type { Database } from './connection.js';

/**
 * Create the mapping tables. Every statement is idempotent, so this is safe to rerun.
 */
export async function runMigration(db: Database): Promise<void> {
  console.error('[migrate] Creating enums...');
  await db.execute(sql`
    DO $$ BEGIN
      CREATE TYPE strategy_name AS ENUM (
        'exact_match', 'manual_mapping', 'learned_mapping', 'normalized_matching',
        'substring_matching', 'word_based_matching', 'fuzzy_matching'
      );
    EXCEPTION
      WHEN duplicate_object THEN null;
    END $$;
  `);

  await db.execute(sql`
    DO $$ BEGIN
      CREATE TYPE learned_strategy_name AS ENUM (
        'exact_match', 'manual_mapping', 'learned_mapping', 'normalized_matching',
        'substring_matching', 'word_based_matching', 'fuzzy_matching', 'manual_verification'
      );
    EXCEPTION
      WHEN duplicate_object THEN null;
    END $$;
  `);

  console.error('[migrate] Creating tables...');
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS manual_mappings (
      id SERIAL PRIMARY KEY,
      source_name TEXT NOT NULL UNIQUE,
      canonical_name TEXT NOT NULL,
      created_at TIMESTAMP DEFAULT NOW()
    );
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS team_mappings (
      id SERIAL PRIMARY KEY,
      source_name TEXT NOT NULL,
      matched_name TEXT NOT NULL,
      confidence DOUBLE PRECISION NOT NULL,
      strategy_used learned_strategy_name NOT NULL,
      created_at TIMESTAMP NOT NULL DEFAULT NOW(),
      verified BOOLEAN NOT NULL DEFAULT FALSE,
      context TEXT NOT NULL DEFAULT ''
    );
    CREATE UNIQUE INDEX IF NOT EXISTS team_mappings_pair_context_idx
      ON team_mappings(source_name, matched_name, context);
    CREATE INDEX IF NOT EXISTS team_mappings_source_idx ON team_mappings(source_name);
    CREATE INDEX IF NOT EXISTS team_mappings_matched_idx ON team_mappings(matched_name);
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS mapping_attempts (
      id SERIAL PRIMARY KEY,
      source_name TEXT NOT NULL,
      matched_name TEXT,
      confidence DOUBLE PRECISION NOT NULL,
      strategy_used strategy_name NOT NULL,
      success BOOLEAN NOT NULL,
      elapsed_ms DOUBLE PRECISION NOT NULL,
      alternatives JSONB NOT NULL DEFAULT '[]'::jsonb,
      context TEXT,
      attempted_at TIMESTAMP NOT NULL DEFAULT NOW()
    );
    CREATE INDEX IF NOT EXISTS mapping_attempts_attempted_at_idx ON mapping_attempts(attempted_at);
    CREATE INDEX IF NOT EXISTS mapping_attempts_source_idx ON mapping_attempts(source_name);
  `);

  // Databases created before the name columns were unbounded
  console.error('[migrate] Widening name columns...');
  await db.execute(sql`
    ALTER TABLE manual_mappings
      ALTER COLUMN source_name TYPE TEXT,
      ALTER COLUMN canonical_name TYPE TEXT;
    ALTER TABLE team_mappings
      ALTER COLUMN source_name TYPE TEXT,
      ALTER COLUMN matched_name TYPE TEXT,
      ALTER COLUMN context TYPE TEXT;
    ALTER TABLE mapping_attempts
      ALTER COLUMN source_name TYPE TEXT,
      ALTER COLUMN matched_name TYPE TEXT,
      ALTER COLUMN context TYPE TEXT;
  `);

  console.error('[migrate] Migration completed');
}
