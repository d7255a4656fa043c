/**
 * Database migration runner
 * Applies sql/schema.sql to an empty database (no-op once applied)
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import pg from 'pg';
import { DEFAULT_DATABASE_URL } from './db';

const { Pool } = pg;

export const SCHEMA_SQL_PATH = fileURLToPath(new URL('../sql/schema.sql', import.meta.url));

export function readSchemaSql(): string {
  return readFileSync(SCHEMA_SQL_PATH, 'utf-8');
}

async function runMigrations() {
  const connectionString = process.env.DATABASE_URL || DEFAULT_DATABASE_URL;

  console.log('🔄 Running database migrations...');
  console.log(`📍 Database: ${connectionString.split('@').pop()}`);

  const pool = new Pool({
    connectionString,
  });

  try {
    const { rows } = await pool.query<{ exists: boolean }>(
      `SELECT to_regclass('public.obligation_statuses') IS NOT NULL AS exists`
    );
    if (rows[0]?.exists) {
      console.log('✅ Schema already applied');
      return;
    }

    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(readSchemaSql());
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
    console.log('✅ Migrations completed successfully');
  } catch (error) {
    console.error('❌ Migration failed:', error);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

// Only when executed directly (tsx src/migrate.ts), not when imported
if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  await runMigrations();
}
