/**
 * Ledger Locking
 *
 * Uses PostgreSQL transaction-scoped advisory locks so that only one mutation
 * runs per card, per obligation or per ledger entry at a time.
 *
 * ## Design Pattern: Lock-Aware vs Lock-Internal Functions
 *
 * 1. **Branded Type**: `LockedTransaction` is a branded `DatabaseOrTransaction`
 *    indicating a ledger lock is already held. Functions that expect to run
 *    under the lock accept `LockedTransaction`.
 *
 * 2. **Naming Convention**:
 *    - `withLedgerLock()` - THE entry point for mutations (with observability)
 *    - Functions taking `tx: LockedTransaction` - Run inside lock, NEVER lock again
 *    - Functions taking `tx: DatabaseOrTransaction` - Low-level helpers, lock-agnostic
 *
 * ## Re-entrancy Warning
 *
 * PostgreSQL advisory locks are NOT re-entrant across transactions:
 * calling `withLedgerLock()` for the same key from inside a held lock opens a
 * second transaction that waits for the first one forever (until lock_timeout).
 */

import { sql } from 'drizzle-orm';
import { LEDGER_LOCK } from '@finledger/shared/constants';
import type { Database, DatabaseOrTransaction } from './db';
import { adminNotifications } from './schema';
import { hasPgCode, LockTimeoutError } from './ledger/errors';

// ============================================================================
// Types
// ============================================================================

/**
 * Branded type indicating a ledger lock is held.
 *
 * Usage:
 * ```typescript
 * await withLedgerLock(db, { scope: 'card', id: cardId }, 'closeInvoice', async (tx) => {
 *   await insertSuccessor(tx, invoice);  // tx is LockedTransaction
 * });
 * ```
 */
export type LockedTransaction = DatabaseOrTransaction & { readonly __brand: 'LockedTransaction' };

/**
 * What a lock serializes on
 *
 * Each scope is its own advisory-lock namespace, so card 7 and invoice 7
 * never contend.
 */
export type LockScope =
  | 'card'
  | 'fixed_payment'
  | 'variable_payment'
  | 'credit_card_invoice'
  | 'obligation_status';

export interface LockKey {
  scope: LockScope;
  id: number;
}

// First key of the two-key pg_advisory_xact_lock(int, int) form
const LOCK_NAMESPACE: Record<LockScope, number> = {
  card: 1001,
  fixed_payment: 1002,
  variable_payment: 1003,
  credit_card_invoice: 1004,
  obligation_status: 1005,
};

// ============================================================================
// Constants
// ============================================================================

/**
 * PostgreSQL error code for lock timeout / lock not available
 * Class 55 = Object Not In Prerequisite State
 */
const PG_LOCK_NOT_AVAILABLE = '55P03';

function isLockTimeoutError(error: unknown): boolean {
  if (hasPgCode(error, PG_LOCK_NOT_AVAILABLE)) {
    return true;
  }
  return error instanceof Error && error.message.includes('lock timeout');
}

function describeKey(key: LockKey): string {
  return `${key.scope}:${key.id}`;
}

// ============================================================================
// Admin Notification Logging
// ============================================================================

async function logLockContention(
  database: Database,
  severity: 'warning' | 'error',
  key: LockKey,
  operation: string,
  durationMs: number
): Promise<void> {
  try {
    await database.insert(adminNotifications).values({
      severity,
      category: 'lock_contention',
      code: severity === 'error' ? 'LOCK_TIMEOUT' : 'LOCK_SLOW_ACQUISITION',
      message: severity === 'error'
        ? `Lock timeout after ${durationMs}ms for ${operation}`
        : `Slow lock acquisition (${durationMs}ms) for ${operation}`,
      details: JSON.stringify({
        operation,
        durationMs,
        threshold: severity === 'error' ? LEDGER_LOCK.TIMEOUT_MS : LEDGER_LOCK.WARNING_THRESHOLD_MS,
      }),
      entityType: key.scope,
      entityId: String(key.id),
    });
  } catch (logError) {
    // Don't fail the operation if logging fails - just console log
    console.error('[LOCK_CONTENTION] Failed to log to admin_notifications:', logError);
  }
}

/**
 * Acquire the advisory lock on an open transaction
 *
 * Released automatically when the transaction commits or rolls back.
 */
async function acquire(tx: DatabaseOrTransaction, key: LockKey): Promise<void> {
  await tx.execute(sql.raw(`SET LOCAL lock_timeout = '${LEDGER_LOCK.TIMEOUT_MS}ms'`));
  await tx.execute(sql`SELECT pg_advisory_xact_lock(${LOCK_NAMESPACE[key.scope]}::int, ${key.id}::int)`);
}

// ============================================================================
// Main Function
// ============================================================================

/**
 * Execute a function in a transaction holding an exclusive ledger lock
 *
 * - Acquires the advisory lock for `key` (10s lock_timeout)
 * - Logs a warning and an admin notification if acquisition took >5s
 * - Throws LockTimeoutError on lock timeout, after recording it
 * - Any error thrown by `fn` rolls the whole transaction back
 *
 * @param operation Name of the operation (for logging)
 */
export async function withLedgerLock<T>(
  database: Database,
  key: LockKey,
  operation: string,
  fn: (tx: LockedTransaction) => Promise<T>
): Promise<T> {
  const startTime = Date.now();
  let acquiredAfterMs = 0;

  try {
    const result = await database.transaction(async (tx) => {
      await acquire(tx, key);
      acquiredAfterMs = Date.now() - startTime;
      return await fn(tx as unknown as LockedTransaction);
    });

    if (acquiredAfterMs > LEDGER_LOCK.WARNING_THRESHOLD_MS) {
      console.warn(
        `[LOCK_CONTENTION] Slow lock acquisition for ${describeKey(key)} ` +
        `operation=${operation} duration=${acquiredAfterMs}ms`
      );
      await logLockContention(database, 'warning', key, operation, acquiredAfterMs);
    }

    return result;
  } catch (error) {
    if (isLockTimeoutError(error)) {
      const durationMs = Date.now() - startTime;
      console.error(
        `[LOCK_TIMEOUT] Lock timeout for ${describeKey(key)} ` +
        `operation=${operation} duration=${durationMs}ms`
      );

      // Transaction is rolled back; record outside it
      await logLockContention(database, 'error', key, operation, durationMs);

      throw new LockTimeoutError(operation, durationMs);
    }

    throw error;
  }
}
