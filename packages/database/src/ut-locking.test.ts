/**
 * Ledger Locking Tests
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import type { Database } from './db';
import { eq } from 'drizzle-orm';
import { withLedgerLock } from './locking';
import { LockTimeoutError } from './ledger/errors';
import { adminNotifications, creditCards } from './schema';
import { createTestDatabase, resetTestDatabase, type TestDatabase } from './test-helpers';

describe('withLedgerLock', () => {
  let testDb: TestDatabase;
  let db: Database;

  beforeAll(async () => {
    testDb = await createTestDatabase();
    db = testDb.db;
  });

  afterAll(async () => {
    await testDb.close();
  });

  beforeEach(async () => {
    await resetTestDatabase(db);
  });

  const newCard = {
    cardholderName: 'Lock Test',
    finalDigits: '0001',
    issuerCountry: 'Portugal' as const,
    currency: 'EUR' as const,
  };

  it('should commit the work and return its result', async () => {
    const cardId = await withLedgerLock(db, { scope: 'card', id: 1 }, 'test', async (tx) => {
      const [card] = await tx.insert(creditCards).values(newCard).returning();
      return card.cardId;
    });

    expect(cardId).toBe(1);
    expect(await db.select().from(creditCards)).toHaveLength(1);
  });

  it('should roll back everything when the work throws', async () => {
    await expect(withLedgerLock(db, { scope: 'card', id: 1 }, 'test', async (tx) => {
      await tx.insert(creditCards).values(newCard);
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(await db.select().from(creditCards)).toHaveLength(0);
  });

  it('should turn a lock timeout into LockTimeoutError and record it', async () => {
    const lockNotAvailable = Object.assign(new Error('canceling statement due to lock timeout'), { code: '55P03' });

    await expect(withLedgerLock(db, { scope: 'card', id: 7 }, 'closeInvoice', async (tx) => {
      await tx.insert(creditCards).values(newCard);
      throw lockNotAvailable;
    })).rejects.toBeInstanceOf(LockTimeoutError);

    expect(await db.select().from(creditCards)).toHaveLength(0);

    const notifications = await db
      .select()
      .from(adminNotifications)
      .where(eq(adminNotifications.code, 'LOCK_TIMEOUT'));
    expect(notifications).toHaveLength(1);
    expect(notifications[0]).toMatchObject({
      severity: 'error',
      category: 'lock_contention',
      entityType: 'card',
      entityId: '7',
    });
  });

  it('should pass other database errors through unchanged', async () => {
    const uniqueViolation = Object.assign(new Error('duplicate key value'), { code: '23505' });

    await expect(withLedgerLock(db, { scope: 'card', id: 1 }, 'test', async () => {
      throw uniqueViolation;
    })).rejects.toBe(uniqueViolation);

    expect(await db.select().from(adminNotifications)).toHaveLength(0);
  });
});
