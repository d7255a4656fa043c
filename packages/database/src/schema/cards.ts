import { pgTable, serial, integer, varchar, boolean, decimal, date, timestamp, index, uniqueIndex, check } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { FIELD_LIMITS } from '@finledger/shared/constants';
import { countryEnum, currencyEnum } from './enums';

/**
 * Credit Cards Table
 *
 * Owned by the card-management layer; the ledger only reads currency,
 * issuer country, fee percentages and the active flag.
 */
export const creditCards = pgTable('credit_cards', {
  cardId: serial('card_id').primaryKey(),
  cardholderName: varchar('cardholder_name', { length: FIELD_LIMITS.CARDHOLDER_NAME }).notNull(),
  finalDigits: varchar('final_digits', { length: FIELD_LIMITS.FINAL_DIGITS }).notNull(),
  issuerCountry: countryEnum('issuer_country').notNull(),
  currency: currencyEnum('currency').notNull(),

  // Percent values as entered (2.99 = 2.99%)
  fxFeePercent: decimal('fx_fee_percent', { precision: 5, scale: 2 }).notNull().default('0'),
  taxPercent: decimal('tax_percent', { precision: 5, scale: 2 }).notNull().default('0'),

  isActive: boolean('is_active').notNull().default(true),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  checkFeesNotNegative: check('check_card_fees_not_negative', sql`${table.fxFeePercent} >= 0 AND ${table.taxPercent} >= 0`),
}));

/**
 * Credit Card Invoices Table
 *
 * One row per calendar billing period of a card. Per card the periods are
 * contiguous and at most one row has is_closed = false.
 *
 * The single-open-invoice rule is temporal and enforced by the close
 * transaction (card advisory lock + compare-and-swap), not by a constraint.
 * UNIQUE(card_id, start_date) still rejects a duplicate successor.
 */
export const creditCardInvoices = pgTable('credit_card_invoices', {
  invoiceId: serial('invoice_id').primaryKey(),
  cardId: integer('card_id').notNull().references(() => creditCards.cardId),
  startDate: date('start_date', { mode: 'string' }).notNull(),
  endDate: date('end_date', { mode: 'string' }).notNull(),
  isClosed: boolean('is_closed').notNull().default(false),
  closedAt: timestamp('closed_at', { withTimezone: true }),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  uniqCardStart: uniqueIndex('uniq_invoice_card_start').on(table.cardId, table.startDate),
  idxOpenInvoice: index('idx_invoice_open').on(table.cardId).where(sql`${table.isClosed} = false`),
  checkPeriodOrder: check('check_invoice_period_order', sql`${table.endDate} >= ${table.startDate}`),
}));

export type CreditCard = typeof creditCards.$inferSelect;
export type CreditCardInvoice = typeof creditCardInvoices.$inferSelect;
