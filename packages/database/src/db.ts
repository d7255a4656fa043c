import { drizzle } from 'drizzle-orm/node-postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import pg from 'pg';
import * as schema from './schema';
import { readFileSync } from 'fs';
import { join } from 'path';

const { Pool } = pg;

// Load .env file if it exists (needed when running tsx directly)
// Look for .env in current dir and parent dirs (monorepo support)
let currentDir = process.cwd();

while (currentDir !== '/' && currentDir.length > 1) {
  try {
    const envFile = readFileSync(join(currentDir, '.env'), 'utf-8');

    envFile.split('\n').forEach(line => {
      const match = line.match(/^([^=#]+)=(.*)$/);
      if (match) {
        const key = match[1].trim();
        const value = match[2].trim();
        if (!process.env[key]) {
          process.env[key] = value;
        }
      }
    });
    break; // Found and loaded .env file
  } catch {
    // Not here, try parent directory
    currentDir = join(currentDir, '..');
  }
}

export const DEFAULT_DATABASE_URL = 'postgresql://localhost/finledger_dev';

/**
 * Any Drizzle PostgreSQL database carrying the finledger schema
 *
 * Production uses node-postgres; tests pass an in-process PGlite database.
 * Both fit this type, so ledger modules never depend on the driver.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

// Transaction type - used in ledger modules for functions that can work
// with either the main db connection or a transaction
export type DatabaseOrTransaction = Database;

/**
 * Create a node-postgres backed database
 */
export function createDatabase(connectionString: string = process.env.DATABASE_URL || DEFAULT_DATABASE_URL) {
  const pool = new Pool({ connectionString });
  return drizzle(pool, { schema });
}

// Pool connects lazily, on first query
export const db: Database = createDatabase();
