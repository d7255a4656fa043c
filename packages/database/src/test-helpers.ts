/**
 * Test Helpers for the Database Package
 *
 * These exports are ONLY for use in test files.
 * DO NOT import from this module in production code.
 *
 * Tests run against an in-process PGlite instance loaded with
 * sql/schema.sql, through the same Drizzle code paths as production.
 */

import { PGlite } from '@electric-sql/pglite';
import { sql } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/pglite';
import type { Database } from './db';
import { readSchemaSql } from './migrate';
import * as schema from './schema';
import {
  creditCards,
  exchangeRates,
  fixedPayments,
  incomes,
  variablePayments,
  type CreditCard,
  type ExchangeRate,
  type FixedPayment,
  type Income,
  type VariablePayment,
} from './schema';

export interface TestDatabase {
  db: Database;
  close(): Promise<void>;
}

export async function createTestDatabase(): Promise<TestDatabase> {
  const client = new PGlite();
  await client.exec(readSchemaSql());

  return {
    db: drizzle(client, { schema }),
    close: () => client.close(),
  };
}

/**
 * Empty every table and restart id sequences
 */
export async function resetTestDatabase(db: Database): Promise<void> {
  await db.execute(sql`
    TRUNCATE obligation_statuses, variable_payments, fixed_payments, incomes,
      credit_card_invoices, credit_cards, exchange_rates, admin_notifications
    RESTART IDENTITY CASCADE
  `);
}

// ============================================================================
// Seed helpers
// ============================================================================

export async function insertTestCard(
  db: Database,
  overrides: Partial<typeof creditCards.$inferInsert> = {}
): Promise<CreditCard> {
  const [card] = await db
    .insert(creditCards)
    .values({
      cardholderName: 'Test Holder',
      finalDigits: '4242',
      issuerCountry: 'Portugal',
      currency: 'EUR',
      fxFeePercent: '0',
      taxPercent: '0',
      ...overrides,
    })
    .returning();
  return card;
}

export async function insertTestFixedPayment(
  db: Database,
  overrides: Partial<typeof fixedPayments.$inferInsert> = {}
): Promise<FixedPayment> {
  const [payment] = await db
    .insert(fixedPayments)
    .values({
      description: 'Rent',
      amountCents: 90000,
      currency: 'EUR',
      country: 'Portugal',
      category: 'bills',
      frequency: 'monthly',
      dueDay: 5,
      startDate: '2024-01-01',
      ...overrides,
    })
    .returning();
  return payment;
}

export async function insertTestVariablePayment(
  db: Database,
  overrides: Partial<typeof variablePayments.$inferInsert> = {}
): Promise<VariablePayment> {
  const [payment] = await db
    .insert(variablePayments)
    .values({
      date: '2024-03-10',
      description: 'Groceries',
      amountCents: 5000,
      currency: 'EUR',
      country: 'Portugal',
      category: 'food',
      ...overrides,
    })
    .returning();
  return payment;
}

export async function insertTestIncome(
  db: Database,
  overrides: Partial<typeof incomes.$inferInsert> = {}
): Promise<Income> {
  const [income] = await db
    .insert(incomes)
    .values({
      description: 'Salary',
      amountCents: 300000,
      currency: 'EUR',
      country: 'Portugal',
      startDate: '2024-01-01',
      ...overrides,
    })
    .returning();
  return income;
}

export async function insertTestRate(
  db: Database,
  values: Pick<typeof exchangeRates.$inferInsert, 'fromCurrency' | 'toCurrency' | 'rate' | 'rateDate'>
): Promise<ExchangeRate> {
  const [rate] = await db.insert(exchangeRates).values(values).returning();
  return rate;
}
