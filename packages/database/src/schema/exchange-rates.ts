import { pgTable, serial, decimal, date, timestamp, uniqueIndex, check } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { currencyEnum } from './enums';

/**
 * Exchange Rates Table
 *
 * Externally maintained. 1 unit of from_currency = rate units of to_currency
 * on rate_date. Read-only to the ledger (summaries only).
 */
export const exchangeRates = pgTable('exchange_rates', {
  rateId: serial('rate_id').primaryKey(),
  fromCurrency: currencyEnum('from_currency').notNull(),
  toCurrency: currencyEnum('to_currency').notNull(),
  rate: decimal('rate', { precision: 18, scale: 8 }).notNull(),
  rateDate: date('rate_date', { mode: 'string' }).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  uniqPairDate: uniqueIndex('uniq_rate_pair_date').on(table.fromCurrency, table.toCurrency, table.rateDate),
  checkRatePositive: check('check_rate_positive', sql`${table.rate} > 0`),
}));

export type ExchangeRate = typeof exchangeRates.$inferSelect;
