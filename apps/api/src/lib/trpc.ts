/**
 * tRPC initialization and context
 * Provides type-safe API with automatic validation
 */

import { initTRPC } from '@trpc/server';
import { db, type Database } from '@finledger/database';
import { LedgerError } from '@finledger/database/ledger';
import { getDBClock, type DBClock } from '@finledger/shared/db-clock';
import { config, type AppConfig } from './config';
import { toTRPCError } from './errors';

/**
 * Context passed to all tRPC procedures
 * Contains: database, clock, configuration
 */
export interface Context {
  db: Database;
  clock: DBClock;
  config: AppConfig;
}

/**
 * Build a context; tests override the database and clock
 */
export function createContext(overrides: Partial<Context> = {}): Context {
  return {
    db: overrides.db ?? db,
    clock: overrides.clock ?? getDBClock(),
    config: overrides.config ?? config,
  };
}

/**
 * Initialize tRPC with context
 */
const t = initTRPC.context<Context>().create();

/**
 * Ledger failures surface as typed tRPC errors instead of
 * INTERNAL_SERVER_ERROR
 */
const mapLedgerErrors = t.middleware(async ({ next }) => {
  const result = await next();
  if (!result.ok && result.error.cause instanceof LedgerError) {
    throw toTRPCError(result.error.cause);
  }
  return result;
});

/**
 * Export tRPC utilities
 */
export const router = t.router;
export const createCallerFactory = t.createCallerFactory;
export const publicProcedure = t.procedure.use(mapLedgerErrors);
