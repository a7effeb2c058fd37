import { Command } from 'commander';
import { sql } from 'drizzle-orm';
import { closeConnection, getDb } from '../../db/connection.js';
import { runMigration } from '../../db/migrate.js';
import * as schema from '../../db/schema.js';
import { loadCliConfig } from '../runtime.js';

function connect() {
  const config = loadCliConfig();
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL environment variable is not set');
  }
  return getDb(config.databaseUrl);
}

async function migrate(): Promise<void> {
  const db = connect();
  try {
    await runMigration(db);
  } catch (error) {
    console.error('Migration failed:', error);
    process.exitCode = 1;
  } finally {
    await closeConnection();
  }
}

async function checkStatus(): Promise<void> {
  const db = connect();

  try {
    await db.execute(sql`SELECT 1`);
    console.log('Database connection: OK\n');

    const tables = [
      { name: 'manual_mappings', table: schema.manualMappings },
      { name: 'team_mappings', table: schema.teamMappings },
      { name: 'mapping_attempts', table: schema.mappingAttempts },
    ];

    for (const { name, table } of tables) {
      const result = await db.select({ count: sql<number>`count(*)::int` }).from(table);
      console.log(`  ${name}: ${result[0]?.count ?? 0} rows`);
    }
  } catch (error) {
    console.error('Database connection failed:', error);
    process.exitCode = 1;
  } finally {
    await closeConnection();
  }
}

export const dbCommand = new Command('db')
  .description('Database operations');

dbCommand
  .command('migrate')
  .description('Create the mapping tables')
  .action(async () => {
    await migrate();
  });

dbCommand
  .command('status')
  .description('Show database connection status and row counts')
  .action(async () => {
    await checkStatus();
  });
