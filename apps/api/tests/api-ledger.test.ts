/**
 * Ledger API Tests
 *
 * Calls the tRPC router in-process against a PGlite database.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { MockDBClock } from '@finledger/shared/db-clock';
import {
  createTestDatabase,
  insertTestCard,
  insertTestFixedPayment,
  insertTestIncome,
  insertTestRate,
  resetTestDatabase,
  type TestDatabase,
} from '@finledger/database/test-helpers';
import { createCaller, createContext, loadConfig } from '../src';

describe('Ledger API', () => {
  const clock = new MockDBClock();
  let testDb: TestDatabase;
  let caller: ReturnType<typeof createCaller>;

  beforeAll(async () => {
    testDb = await createTestDatabase();
    caller = createCaller(createContext({
      db: testDb.db,
      clock,
      config: loadConfig({ NODE_ENV: 'test', BASE_CURRENCY: 'EUR' }),
    }));
  });

  afterAll(async () => {
    await testDb.close();
  });

  beforeEach(async () => {
    await resetTestDatabase(testDb.db);
    clock.setDate('2024-02-15');
  });

  describe('invoices', () => {
    it('should bootstrap, close and roll over through leap February', async () => {
      const card = await insertTestCard(testDb.db);

      const initial = await caller.invoices.createInitial({ cardId: card.cardId });
      expect([initial.startDate, initial.endDate]).toEqual(['2024-02-01', '2024-02-29']);

      const { closedInvoice, nextInvoice } = await caller.invoices.close({ invoiceId: initial.invoiceId });
      expect(closedInvoice.isClosed).toBe(true);
      expect([nextInvoice.startDate, nextInvoice.endDate]).toEqual(['2024-03-01', '2024-03-31']);

      const open = await caller.invoices.openForCard({ cardId: card.cardId });
      expect(open?.invoiceId).toBe(nextInvoice.invoiceId);

      const closed = await caller.invoices.closedForCard({ cardId: card.cardId });
      expect(closed.map(i => i.invoiceId)).toEqual([initial.invoiceId]);

      const totals = await caller.invoices.totals({ invoiceId: initial.invoiceId });
      expect(totals.billingPeriodDays).toBe(29);
    });

    it('should answer a second close with CONFLICT', async () => {
      const card = await insertTestCard(testDb.db);
      const initial = await caller.invoices.createInitial({ cardId: card.cardId });
      await caller.invoices.close({ invoiceId: initial.invoiceId });

      await expect(caller.invoices.close({ invoiceId: initial.invoiceId }))
        .rejects.toMatchObject({ code: 'CONFLICT', message: `Invoice ${initial.invoiceId} is already closed` });

      const chain = await caller.invoices.listForCard({ cardId: card.cardId });
      expect(chain).toHaveLength(2);
    });

    it('should answer an unknown invoice with NOT_FOUND', async () => {
      await expect(caller.invoices.close({ invoiceId: 4040 })).rejects.toMatchObject({ code: 'NOT_FOUND' });
    });

    it('should answer an inactive card with PRECONDITION_FAILED', async () => {
      const card = await insertTestCard(testDb.db, { isActive: false });

      await expect(caller.invoices.createInitial({ cardId: card.cardId }))
        .rejects.toMatchObject({ code: 'PRECONDITION_FAILED' });
    });
  });

  describe('obligations', () => {
    it('should schedule, reconcile and list entries', async () => {
      await insertTestFixedPayment(testDb.db, { amountCents: 90000, dueDay: 5 });

      const scheduled = await caller.obligations.scheduleFixedForPeriod({ monthYear: '2024-02' });
      expect(scheduled.created).toHaveLength(1);
      const statusId = scheduled.created[0].statusId;

      // Due 2024-02-05, today 2024-02-15
      expect((await caller.obligations.get({ statusId })).state).toBe('overdue');

      const paid = await caller.obligations.markPaid({ statusId, actualAmountCents: 91000 });
      expect(paid.paidDate).toBe('2024-02-15');
      expect(paid.actualAmountCents).toBe(91000);

      const listed = await caller.obligations.list({ monthYear: '2024-02', state: 'paid' });
      expect(listed.map(e => e.statusId)).toEqual([statusId]);

      const pending = await caller.obligations.markPending({ statusId });
      expect(pending.paidDate).toBeNull();

      const counts = await caller.obligations.counts({ monthYear: '2024-02' });
      expect([counts.total, counts.paid, counts.overdue]).toEqual([1, 0, 1]);
    });

    it('should answer a duplicate period with CONFLICT', async () => {
      const rent = await insertTestFixedPayment(testDb.db);
      const input = { fixedPaymentId: rent.fixedPaymentId, monthYear: '2024-02', dueDate: '2024-02-05' };
      await caller.obligations.schedule(input);

      await expect(caller.obligations.schedule(input)).rejects.toMatchObject({ code: 'CONFLICT' });
    });

    it('should answer a reference naming no obligation with BAD_REQUEST', async () => {
      await expect(caller.obligations.schedule({ monthYear: '2024-02', dueDate: '2024-02-05' }))
        .rejects.toMatchObject({ code: 'BAD_REQUEST' });
    });

    it('should answer a currency the obligation cannot take with BAD_REQUEST', async () => {
      const rent = await insertTestFixedPayment(testDb.db, { amountCents: 90000, currency: 'EUR' });

      await expect(caller.obligations.schedule({
        fixedPaymentId: rent.fixedPaymentId,
        monthYear: '2024-02',
        dueDate: '2024-02-05',
        currency: 'BRL',
      })).rejects.toMatchObject({ code: 'BAD_REQUEST' });
    });

    it('should reject malformed input before reaching the ledger', async () => {
      await expect(caller.obligations.list({ monthYear: '2024-13' }))
        .rejects.toMatchObject({ code: 'BAD_REQUEST' });
      await expect(caller.obligations.schedule({ fixedPaymentId: 1, monthYear: '2024-02', dueDate: '2023-02-29' }))
        .rejects.toMatchObject({ code: 'BAD_REQUEST' });
    });
  });

  describe('payments', () => {
    it('should record a card purchase with fees', async () => {
      const card = await insertTestCard(testDb.db, {
        issuerCountry: 'Brazil',
        currency: 'BRL',
        fxFeePercent: '2.99',
        taxPercent: '4.38',
      });

      const { payment, fees } = await caller.payments.recordVariable({
        date: '2024-02-10',
        description: 'Train ticket',
        amountCents: 15000,
        currency: 'EUR',
        country: 'Portugal',
        category: 'transport',
        creditCardId: card.cardId,
      });

      expect(fees).toEqual({ fxFeeCents: 449, taxFeeCents: 657, totalWithFeesCents: 16106 });
      expect(payment.fxFeeCents).toBe(449);
    });
  });

  describe('summary', () => {
    it('should default the base currency from configuration', async () => {
      await insertTestIncome(testDb.db, { amountCents: 200000 });
      const rent = await insertTestFixedPayment(testDb.db, { amountCents: 75000 });
      await caller.obligations.schedule({ fixedPaymentId: rent.fixedPaymentId, monthYear: '2024-02', dueDate: '2024-02-05' });

      const summary = await caller.summary.period({ monthYear: '2024-02' });

      expect(summary.baseCurrency).toBe('EUR');
      expect(summary.ratePolicy).toBe('most_recent_prior');
      expect(summary.balanceCents).toBe(125000);
    });

    it('should answer a missing rate with PRECONDITION_FAILED', async () => {
      await insertTestRate(testDb.db, { fromCurrency: 'EUR', toCurrency: 'USD', rate: '1.08', rateDate: '2024-02-01' });
      await insertTestIncome(testDb.db, { amountCents: 100000, currency: 'BRL', country: 'Brazil' });

      await expect(caller.summary.period({ monthYear: '2024-02', baseCurrency: 'EUR' }))
        .rejects.toMatchObject({ code: 'PRECONDITION_FAILED' });
    });
  });
});
