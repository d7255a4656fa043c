/**
 * Period Summary Tests
 *
 * Base-currency normalization, rate policies, breakdown totals.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { MockDBClock } from '@finledger/shared/db-clock';
import type { Database } from '../db';
import {
  createTestDatabase,
  insertTestCard,
  insertTestFixedPayment,
  insertTestIncome,
  insertTestRate,
  insertTestVariablePayment,
  resetTestDatabase,
  type TestDatabase,
} from '../test-helpers';
import { createInitialInvoice } from './invoices';
import { markObligationPaid, scheduleObligation } from './obligations';
import { summarizePeriod } from './summary';
import { MissingRateError } from './errors';

describe('summarizePeriod', () => {
  const clock = new MockDBClock();
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
    clock.setDate('2024-03-01');
  });

  describe('mixed currencies', () => {
    beforeEach(async () => {
      await insertTestRate(db, { fromCurrency: 'BRL', toCurrency: 'EUR', rate: '0.18', rateDate: '2024-03-01' });
      await insertTestRate(db, { fromCurrency: 'BRL', toCurrency: 'EUR', rate: '0.20', rateDate: '2024-03-20' });
      await insertTestRate(db, { fromCurrency: 'USD', toCurrency: 'EUR', rate: '0.9', rateDate: '2024-02-28' });

      await insertTestIncome(db, { amountCents: 300000, currency: 'EUR' });
      await insertTestIncome(db, { amountCents: 100000, currency: 'BRL', country: 'Brazil' });
      await insertTestIncome(db, { amountCents: 999999, isActive: false });

      // Paid 2024-03-04: 90000 EUR
      const rent = await insertTestFixedPayment(db, { amountCents: 90000, category: 'bills' });
      const rentEntry = await scheduleObligation(db, { fixedPaymentId: rent.fixedPaymentId, monthYear: '2024-03', dueDate: '2024-03-05' }, clock);
      await markObligationPaid(db, rentEntry.statusId, { paidDate: '2024-03-04' }, clock);
      await scheduleObligation(db, { fixedPaymentId: rent.fixedPaymentId, monthYear: '2024-04', dueDate: '2024-04-05' }, clock);

      // Unpaid, due 2024-03-25 at 0.20: 10000 EUR, fees 1500 BRL -> 300 EUR
      const groceries = await insertTestVariablePayment(db, {
        amountCents: 50000,
        currency: 'BRL',
        country: 'Brazil',
        category: 'food',
        fxFeeCents: 1000,
        taxFeeCents: 500,
      });
      await scheduleObligation(db, { variablePaymentId: groceries.variablePaymentId, monthYear: '2024-03', dueDate: '2024-03-25' }, clock);

      // Unpaid, due 2024-03-10 at 0.18: 3600 EUR
      const card = await insertTestCard(db, { issuerCountry: 'Brazil', currency: 'BRL' });
      const invoice = await createInitialInvoice(db, { cardId: card.cardId, anchorDate: '2024-02-01' }, clock);
      await scheduleObligation(db, { creditCardInvoiceId: invoice.invoiceId, monthYear: '2024-03', dueDate: '2024-03-10', expectedAmountCents: 20000 }, clock);

      // Unpaid, due 2024-03-15 at 0.9: 1439.1 -> 1439 EUR
      const streaming = await insertTestFixedPayment(db, { amountCents: 1599, currency: 'USD', category: 'entertainment' });
      await scheduleObligation(db, { fixedPaymentId: streaming.fixedPaymentId, monthYear: '2024-03', dueDate: '2024-03-15' }, clock);
    });

    it('should normalize income, expenses and fees into the base currency', async () => {
      const summary = await summarizePeriod(db, { monthYear: '2024-03', baseCurrency: 'EUR', ratePolicy: 'most_recent_prior' });

      expect(summary.startDate).toBe('2024-03-01');
      expect(summary.endDate).toBe('2024-03-31');
      expect(summary.incomeCents).toBe(320000);
      expect(summary.expensesCents).toBe(105039);
      expect(summary.feesCents).toBe(300);
      expect(summary.balanceCents).toBe(214661);
      expect(summary.counts).toEqual({ entries: 4, paidEntries: 1, unpaidEntries: 3, incomes: 2 });
    });

    it('should break expenses down by country, category and currency', async () => {
      const { breakdowns } = await summarizePeriod(db, { monthYear: '2024-03', baseCurrency: 'EUR', ratePolicy: 'most_recent_prior' });

      expect(breakdowns.byCountry).toEqual([
        { key: 'Portugal', totalCents: 91439, entries: 2 },
        { key: 'Brazil', totalCents: 13600, entries: 2 },
      ]);
      expect(breakdowns.byCategory).toEqual([
        { key: 'bills', totalCents: 90000, entries: 1 },
        { key: 'food', totalCents: 10000, entries: 1 },
        { key: 'credit_card', totalCents: 3600, entries: 1 },
        { key: 'entertainment', totalCents: 1439, entries: 1 },
      ]);
      expect(breakdowns.byCurrency).toEqual([
        { key: 'EUR', totalCents: 90000, entries: 1, originalAmountCents: 90000 },
        { key: 'BRL', totalCents: 13600, entries: 2, originalAmountCents: 70000 },
        { key: 'USD', totalCents: 1439, entries: 1, originalAmountCents: 1599 },
      ]);
    });

    it('should keep every breakdown summing to the expense total', async () => {
      const summary = await summarizePeriod(db, { monthYear: '2024-03', baseCurrency: 'EUR', ratePolicy: 'most_recent_prior' });
      const sum = (lines: { totalCents: number }[]) => lines.reduce((total, line) => total + line.totalCents, 0);

      expect(sum(summary.breakdowns.byCountry)).toBe(summary.expensesCents);
      expect(sum(summary.breakdowns.byCategory)).toBe(summary.expensesCents);
      expect(sum(summary.breakdowns.byCurrency)).toBe(summary.expensesCents);
    });

    it('should fail when a required pair has no rate', async () => {
      await expect(summarizePeriod(db, { monthYear: '2024-03', baseCurrency: 'BRL', ratePolicy: 'most_recent_prior' }))
        .rejects.toBeInstanceOf(MissingRateError);
    });
  });

  it('should not use the inverse pair in place of a missing rate', async () => {
    await insertTestRate(db, { fromCurrency: 'EUR', toCurrency: 'BRL', rate: '5.5', rateDate: '2024-03-01' });
    const dinner = await insertTestVariablePayment(db, { amountCents: 12000, currency: 'BRL', country: 'Brazil' });
    await scheduleObligation(db, { variablePaymentId: dinner.variablePaymentId, monthYear: '2024-03', dueDate: '2024-03-10' }, clock);

    const error = await summarizePeriod(db, { monthYear: '2024-03', baseCurrency: 'EUR', ratePolicy: 'most_recent_prior' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MissingRateError);
    expect(error).toMatchObject({
      code: 'MISSING_RATE',
      details: { fromCurrency: 'BRL', toCurrency: 'EUR', date: '2024-03-10', policy: 'most_recent_prior' },
    });
  });

  it('should summarize a single-currency period without any rates', async () => {
    await insertTestIncome(db, { amountCents: 250000 });
    const rent = await insertTestFixedPayment(db, { amountCents: 80000 });
    await scheduleObligation(db, { fixedPaymentId: rent.fixedPaymentId, monthYear: '2024-03', dueDate: '2024-03-05' }, clock);

    const summary = await summarizePeriod(db, { monthYear: '2024-03', baseCurrency: 'EUR', ratePolicy: 'same_day' });

    expect(summary.incomeCents).toBe(250000);
    expect(summary.expensesCents).toBe(80000);
    expect(summary.feesCents).toBe(0);
    expect(summary.balanceCents).toBe(170000);
  });

  describe('rate policies', () => {
    beforeEach(async () => {
      await insertTestRate(db, { fromCurrency: 'BRL', toCurrency: 'EUR', rate: '0.18', rateDate: '2024-03-01' });
      await insertTestRate(db, { fromCurrency: 'BRL', toCurrency: 'EUR', rate: '0.20', rateDate: '2024-03-12' });
      const pharmacy = await insertTestVariablePayment(db, { amountCents: 10000, currency: 'BRL', country: 'Brazil', category: 'health' });
      await scheduleObligation(db, { variablePaymentId: pharmacy.variablePaymentId, monthYear: '2024-03', dueDate: '2024-03-10' }, clock);
    });

    it('should use the most recent rate on or before the date', async () => {
      const summary = await summarizePeriod(db, { monthYear: '2024-03', baseCurrency: 'EUR', ratePolicy: 'most_recent_prior' });
      expect(summary.expensesCents).toBe(1800);
    });

    it('should use the nearest rate on either side', async () => {
      const summary = await summarizePeriod(db, { monthYear: '2024-03', baseCurrency: 'EUR', ratePolicy: 'nearest' });
      expect(summary.expensesCents).toBe(2000);
    });

    it('should require a same-day rate under same_day', async () => {
      await expect(summarizePeriod(db, { monthYear: '2024-03', baseCurrency: 'EUR', ratePolicy: 'same_day' }))
        .rejects.toBeInstanceOf(MissingRateError);
    });
  });
});
