/**
 * @finledger/database
 *
 * Drizzle schema, connection and the ledger modules built on it
 */

export { db, createDatabase, DEFAULT_DATABASE_URL, type Database, type DatabaseOrTransaction } from './db';
export { withLedgerLock, type LockedTransaction, type LockKey, type LockScope } from './locking';
export * from './schema';
export * from './ledger';
