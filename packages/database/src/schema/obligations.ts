import { pgTable, serial, integer, varchar, boolean, bigint, date, text, timestamp, index, uniqueIndex, check } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { FIELD_LIMITS } from '@finledger/shared/constants';
import { currencyEnum, obligationKindEnum } from './enums';
import { fixedPayments, variablePayments } from './payments';
import { creditCardInvoices } from './cards';

/**
 * Obligation Statuses Table (the reconciliation ledger)
 *
 * One row per obligation per period. The obligation is a tagged reference:
 * obligation_kind names which of the three FK columns is set, and exactly
 * that one is non-null (check_obligation_ref).
 *
 * Paid/pending/overdue is NOT stored: overdue depends on today's date and is
 * derived at read time from is_paid and due_date.
 */
export const obligationStatuses = pgTable('obligation_statuses', {
  statusId: serial('status_id').primaryKey(),
  obligationKind: obligationKindEnum('obligation_kind').notNull(),

  // Exactly one of these is set, matching obligation_kind
  fixedPaymentId: integer('fixed_payment_id').references(() => fixedPayments.fixedPaymentId, { onDelete: 'cascade' }),
  variablePaymentId: integer('variable_payment_id').references(() => variablePayments.variablePaymentId, { onDelete: 'cascade' }),
  creditCardInvoiceId: integer('credit_card_invoice_id').references(() => creditCardInvoices.invoiceId, { onDelete: 'restrict' }),

  // Period key (YYYY-MM)
  monthYear: varchar('month_year', { length: FIELD_LIMITS.MONTH_YEAR }).notNull(),
  dueDate: date('due_date', { mode: 'string' }).notNull(),

  expectedAmountCents: bigint('expected_amount_cents', { mode: 'number' }).notNull(),
  actualAmountCents: bigint('actual_amount_cents', { mode: 'number' }),
  currency: currencyEnum('currency').notNull(),

  isPaid: boolean('is_paid').notNull().default(false),
  paidDate: date('paid_date', { mode: 'string' }),
  notes: text('notes'),

  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  // One status per obligation per period
  uniqFixedPeriod: uniqueIndex('uniq_status_fixed_period').on(table.fixedPaymentId, table.monthYear).where(sql`${table.fixedPaymentId} IS NOT NULL`),
  uniqVariablePeriod: uniqueIndex('uniq_status_variable_period').on(table.variablePaymentId, table.monthYear).where(sql`${table.variablePaymentId} IS NOT NULL`),
  uniqInvoicePeriod: uniqueIndex('uniq_status_invoice_period').on(table.creditCardInvoiceId, table.monthYear).where(sql`${table.creditCardInvoiceId} IS NOT NULL`),

  idxStatusPeriod: index('idx_status_period').on(table.monthYear, table.dueDate),
  idxStatusUnpaidDue: index('idx_status_unpaid_due').on(table.dueDate).where(sql`${table.isPaid} = false`),

  checkObligationRef: check('check_obligation_ref', sql`
    (${table.obligationKind} = 'fixed' AND ${table.fixedPaymentId} IS NOT NULL AND ${table.variablePaymentId} IS NULL AND ${table.creditCardInvoiceId} IS NULL) OR
    (${table.obligationKind} = 'variable' AND ${table.variablePaymentId} IS NOT NULL AND ${table.fixedPaymentId} IS NULL AND ${table.creditCardInvoiceId} IS NULL) OR
    (${table.obligationKind} = 'credit_card_invoice' AND ${table.creditCardInvoiceId} IS NOT NULL AND ${table.fixedPaymentId} IS NULL AND ${table.variablePaymentId} IS NULL)
  `),
  checkPaidDate: check('check_paid_date', sql`${table.isPaid} OR ${table.paidDate} IS NULL`),
  checkAmountsNotNegative: check('check_status_amounts_not_negative', sql`${table.expectedAmountCents} >= 0 AND (${table.actualAmountCents} IS NULL OR ${table.actualAmountCents} >= 0)`),
}));

export type ObligationStatusRow = typeof obligationStatuses.$inferSelect;
