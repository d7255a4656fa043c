import { pgTable, serial, integer, varchar, boolean, bigint, smallint, date, timestamp, index, check } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { FIELD_LIMITS } from '@finledger/shared/constants';
import { countryEnum, currencyEnum, paymentCategoryEnum, paymentFrequencyEnum } from './enums';
import { creditCards } from './cards';

/**
 * Fixed Payments Table
 *
 * Recurring obligations (rent, subscriptions). Monthly ones are due every
 * month of their window, yearly ones in the anniversary month of start_date.
 */
export const fixedPayments = pgTable('fixed_payments', {
  fixedPaymentId: serial('fixed_payment_id').primaryKey(),
  description: varchar('description', { length: FIELD_LIMITS.DESCRIPTION }).notNull(),
  amountCents: bigint('amount_cents', { mode: 'number' }).notNull(),
  currency: currencyEnum('currency').notNull(),
  country: countryEnum('country').notNull(),
  category: paymentCategoryEnum('category').notNull().default('bills'),
  frequency: paymentFrequencyEnum('frequency').notNull().default('monthly'),

  // Day of month the payment falls due (clamped to month length)
  dueDay: smallint('due_day').notNull().default(1),

  startDate: date('start_date', { mode: 'string' }).notNull(),
  endDate: date('end_date', { mode: 'string' }),
  isActive: boolean('is_active').notNull().default(true),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  idxFixedActive: index('idx_fixed_active').on(table.isActive, table.startDate),
  checkAmountNotNegative: check('check_fixed_amount_not_negative', sql`${table.amountCents} >= 0`),
  checkDueDay: check('check_fixed_due_day', sql`${table.dueDay} BETWEEN 1 AND 31`),
}));

/**
 * Variable Payments Table
 *
 * One-off expenses. When paid with a card, the FX and tax fees are computed
 * at recording time (FeeCalculator) and stored for audit.
 */
export const variablePayments = pgTable('variable_payments', {
  variablePaymentId: serial('variable_payment_id').primaryKey(),
  date: date('date', { mode: 'string' }).notNull(),
  description: varchar('description', { length: FIELD_LIMITS.DESCRIPTION }).notNull(),
  amountCents: bigint('amount_cents', { mode: 'number' }).notNull(),
  currency: currencyEnum('currency').notNull(),
  country: countryEnum('country').notNull(),
  category: paymentCategoryEnum('category').notNull(),

  creditCardId: integer('credit_card_id').references(() => creditCards.cardId, { onDelete: 'set null' }),

  // Fees in the payment currency, never compounded
  fxFeeCents: bigint('fx_fee_cents', { mode: 'number' }).notNull().default(0),
  taxFeeCents: bigint('tax_fee_cents', { mode: 'number' }).notNull().default(0),

  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  idxVariableDate: index('idx_variable_date').on(table.date),
  idxVariableCard: index('idx_variable_card').on(table.creditCardId).where(sql`${table.creditCardId} IS NOT NULL`),
  checkAmountNotNegative: check('check_variable_amount_not_negative', sql`${table.amountCents} >= 0`),
}));

/**
 * Incomes Table
 *
 * Recurring monthly income counted by period summaries while active.
 */
export const incomes = pgTable('incomes', {
  incomeId: serial('income_id').primaryKey(),
  description: varchar('description', { length: FIELD_LIMITS.DESCRIPTION }).notNull(),
  amountCents: bigint('amount_cents', { mode: 'number' }).notNull(),
  currency: currencyEnum('currency').notNull(),
  country: countryEnum('country').notNull(),
  startDate: date('start_date', { mode: 'string' }).notNull(),
  endDate: date('end_date', { mode: 'string' }),
  isActive: boolean('is_active').notNull().default(true),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  checkAmountNotNegative: check('check_income_amount_not_negative', sql`${table.amountCents} >= 0`),
}));

export type FixedPayment = typeof fixedPayments.$inferSelect;
export type VariablePayment = typeof variablePayments.$inferSelect;
export type Income = typeof incomes.$inferSelect;
