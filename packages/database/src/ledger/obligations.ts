/**
 * Obligation ledger
 *
 * Single store of reconciliation entries (obligation_statuses), one per
 * obligation per period, over three obligation kinds: fixed payments,
 * variable payments and credit card invoices.
 *
 * Entry state is derived on read, never stored:
 *   paid     is_paid
 *   overdue  !is_paid AND due_date < today
 *   pending  otherwise
 */

import { and, asc, eq, gte, isNull, lt, lte, or, type SQL } from 'drizzle-orm';
import { clampDayToMonth, getMonthYearRange } from '@finledger/shared/billing';
import { OBLIGATION_STATE, type Currency, type ObligationState } from '@finledger/shared/constants';
import type { DBClock } from '@finledger/shared/db-clock';
import {
  obligationFilterSchema,
  type MarkPaidInput,
  type ObligationCountsInput,
  type ObligationFilterInput,
  type ScheduleObligationInput,
} from '@finledger/shared/schemas';
import type { Database, DatabaseOrTransaction } from '../db';
import { withLedgerLock, type LockedTransaction } from '../locking';
import {
  creditCardInvoices,
  creditCards,
  fixedPayments,
  obligationStatuses,
  variablePayments,
  type ObligationStatusRow,
} from '../schema';
import { logInternalError } from './admin-notifications';
import {
  CurrencyMismatchError,
  DuplicateObligationPeriodError,
  InvalidObligationReferenceError,
  isUniqueViolation,
  NotFoundError,
} from './errors';
import {
  describeObligationRef,
  lockKeyForRef,
  obligationRefToColumns,
  obligationRefFromRow,
  toObligationRef,
  type ObligationRef,
} from './obligation-ref';

/**
 * Ledger entry as returned to callers: stored row, tagged reference and
 * read-time state
 */
export type ObligationStatusEntry = ObligationStatusRow & {
  ref: ObligationRef;
  state: ObligationState;
};

type AmountFields = Pick<ObligationStatusRow, 'isPaid' | 'expectedAmountCents' | 'actualAmountCents'>;
type StateFields = Pick<ObligationStatusRow, 'isPaid' | 'dueDate'>;

// ============================================================================
// Derived state
// ============================================================================

export function isOverdue(entry: StateFields, today: string): boolean {
  return !entry.isPaid && entry.dueDate < today;
}

export function getObligationState(entry: StateFields, today: string): ObligationState {
  if (entry.isPaid) {
    return OBLIGATION_STATE.PAID;
  }
  return isOverdue(entry, today) ? OBLIGATION_STATE.OVERDUE : OBLIGATION_STATE.PENDING;
}

/**
 * Amount an entry counts for in totals and summaries:
 * the actual amount once paid and recorded, the expected amount otherwise
 */
export function effectiveAmountCents(entry: AmountFields): number {
  if (entry.isPaid && entry.actualAmountCents != null) {
    return entry.actualAmountCents;
  }
  return entry.expectedAmountCents;
}

/**
 * Validate a stored row's reference, recording corrupt rows for the admin
 */
export async function readObligationRef(
  tx: DatabaseOrTransaction,
  row: Pick<ObligationStatusRow, 'statusId' | 'obligationKind' | 'fixedPaymentId' | 'variablePaymentId' | 'creditCardInvoiceId'>
): Promise<ObligationRef> {
  try {
    return obligationRefFromRow(row);
  } catch (error) {
    if (error instanceof InvalidObligationReferenceError) {
      await logInternalError(tx, {
        severity: 'error',
        category: 'ledger',
        code: 'CORRUPT_OBLIGATION_REFERENCE',
        message: error.message,
        details: error.details,
        entityType: 'obligation_status',
        entityId: row.statusId,
      });
    }
    throw error;
  }
}

async function toEntry(
  tx: DatabaseOrTransaction,
  row: ObligationStatusRow,
  today: string
): Promise<ObligationStatusEntry> {
  const ref = await readObligationRef(tx, row);
  return { ...row, ref, state: getObligationState(row, today) };
}

// ============================================================================
// Scheduling
// ============================================================================

interface ObligationDefaults {
  amountCents: number;
  currency: Currency;
}

/**
 * Amount and currency of the referenced obligation (lock-internal)
 *
 * Invoices have no amount until paid, so they default to zero in the
 * card's currency.
 *
 * @throws NotFoundError if the obligation doesn't exist
 */
async function loadObligationDefaults(
  tx: LockedTransaction,
  ref: ObligationRef
): Promise<ObligationDefaults> {
  switch (ref.kind) {
    case 'fixed': {
      const [payment] = await tx
        .select({ amountCents: fixedPayments.amountCents, currency: fixedPayments.currency })
        .from(fixedPayments)
        .where(eq(fixedPayments.fixedPaymentId, ref.fixedPaymentId))
        .limit(1);
      if (!payment) {
        throw new NotFoundError('Fixed payment', ref.fixedPaymentId);
      }
      return payment;
    }
    case 'variable': {
      const [payment] = await tx
        .select({ amountCents: variablePayments.amountCents, currency: variablePayments.currency })
        .from(variablePayments)
        .where(eq(variablePayments.variablePaymentId, ref.variablePaymentId))
        .limit(1);
      if (!payment) {
        throw new NotFoundError('Variable payment', ref.variablePaymentId);
      }
      return payment;
    }
    case 'credit_card_invoice': {
      const [invoice] = await tx
        .select({ currency: creditCards.currency })
        .from(creditCardInvoices)
        .innerJoin(creditCards, eq(creditCards.cardId, creditCardInvoices.cardId))
        .where(eq(creditCardInvoices.invoiceId, ref.invoiceId))
        .limit(1);
      if (!invoice) {
        throw new NotFoundError('Invoice', ref.invoiceId);
      }
      return { amountCents: 0, currency: invoice.currency };
    }
  }
}

/**
 * Amount and currency to store for a new entry
 *
 * Both default together from the obligation. Invoice entries always carry
 * the card currency so invoice totals stay in one currency.
 *
 * @throws CurrencyMismatchError
 */
function resolveEntryAmount(
  ref: ObligationRef,
  input: Pick<ScheduleObligationInput, 'expectedAmountCents' | 'currency'>,
  defaults: ObligationDefaults
): ObligationDefaults {
  const currency = input.currency ?? defaults.currency;
  const reference = describeObligationRef(ref);

  if (currency !== defaults.currency) {
    if (ref.kind === 'credit_card_invoice') {
      throw new CurrencyMismatchError(
        `Entries for ${reference} must be in the card currency ${defaults.currency}, not ${currency}`,
        { reference, currency, expectedCurrency: defaults.currency }
      );
    }
    if (input.expectedAmountCents === undefined) {
      throw new CurrencyMismatchError(
        `An expected amount is required to schedule ${reference} in ${currency}; the obligation is in ${defaults.currency}`,
        { reference, currency, obligationCurrency: defaults.currency }
      );
    }
  }

  return { amountCents: input.expectedAmountCents ?? defaults.amountCents, currency };
}

function refColumnMatches(ref: ObligationRef): SQL {
  switch (ref.kind) {
    case 'fixed':
      return eq(obligationStatuses.fixedPaymentId, ref.fixedPaymentId);
    case 'variable':
      return eq(obligationStatuses.variablePaymentId, ref.variablePaymentId);
    case 'credit_card_invoice':
      return eq(obligationStatuses.creditCardInvoiceId, ref.invoiceId);
  }
}

/**
 * Create the ledger entry of an obligation for one period
 *
 * Expected amount and currency default to the obligation's own.
 *
 * @throws InvalidObligationReferenceError unless exactly one reference is set
 * @throws CurrencyMismatchError if the currency can't be reconciled with the
 *   obligation's
 * @throws NotFoundError if the referenced obligation doesn't exist
 * @throws DuplicateObligationPeriodError if the obligation already has an
 *   entry for the period
 */
export async function scheduleObligation(
  database: Database,
  input: ScheduleObligationInput,
  clock: DBClock
): Promise<ObligationStatusEntry> {
  const ref = toObligationRef(input);
  const reference = describeObligationRef(ref);

  return await withLedgerLock(database, lockKeyForRef(ref), 'scheduleObligation', async (tx) => {
    const amount = resolveEntryAmount(ref, input, await loadObligationDefaults(tx, ref));

    const [existing] = await tx
      .select({ statusId: obligationStatuses.statusId })
      .from(obligationStatuses)
      .where(and(refColumnMatches(ref), eq(obligationStatuses.monthYear, input.monthYear)))
      .limit(1);

    if (existing) {
      throw new DuplicateObligationPeriodError(reference, input.monthYear);
    }

    const now = clock.now();
    let row: ObligationStatusRow;
    try {
      [row] = await tx
        .insert(obligationStatuses)
        .values({
          ...obligationRefToColumns(ref),
          monthYear: input.monthYear,
          dueDate: input.dueDate,
          expectedAmountCents: amount.amountCents,
          currency: amount.currency,
          isPaid: false,
          notes: input.notes ?? null,
          createdAt: now,
          updatedAt: now,
        })
        .returning();
    } catch (error) {
      // Storage-level backstop for the pre-check above
      if (isUniqueViolation(error)) {
        throw new DuplicateObligationPeriodError(reference, input.monthYear);
      }
      throw error;
    }

    console.log(`[LEDGER] Scheduled ${reference} for ${input.monthYear} (status ${row.statusId}, due ${row.dueDate})`);
    return { ...row, ref, state: getObligationState(row, clock.todayIsoDate()) };
  });
}

export interface ScheduleFixedPaymentsResult {
  monthYear: string;
  created: ObligationStatusEntry[];
  skippedFixedPaymentIds: number[];
}

/**
 * Create the period's entries for every active fixed payment due in it
 *
 * Monthly payments are due every month of their window, yearly ones in the
 * month of their start date. Due date is the payment's due day, clamped to
 * the month. Payments that already have an entry are skipped, so running
 * this twice creates nothing the second time.
 */
export async function scheduleFixedPaymentsForPeriod(
  database: Database,
  monthYear: string,
  clock: DBClock
): Promise<ScheduleFixedPaymentsResult> {
  const range = getMonthYearRange(monthYear);

  const payments = await database
    .select()
    .from(fixedPayments)
    .where(and(
      eq(fixedPayments.isActive, true),
      lte(fixedPayments.startDate, range.endDate),
      or(isNull(fixedPayments.endDate), gte(fixedPayments.endDate, range.startDate))
    ))
    .orderBy(asc(fixedPayments.fixedPaymentId));

  const result: ScheduleFixedPaymentsResult = { monthYear, created: [], skippedFixedPaymentIds: [] };

  for (const payment of payments) {
    if (payment.frequency === 'yearly' && payment.startDate.slice(5, 7) !== monthYear.slice(5, 7)) {
      continue;
    }

    try {
      const entry = await scheduleObligation(database, {
        fixedPaymentId: payment.fixedPaymentId,
        monthYear,
        dueDate: clampDayToMonth(monthYear, payment.dueDay),
      }, clock);
      result.created.push(entry);
    } catch (error) {
      if (!(error instanceof DuplicateObligationPeriodError)) {
        throw error;
      }
      result.skippedFixedPaymentIds.push(payment.fixedPaymentId);
    }
  }

  console.log(
    `[LEDGER] Fixed payments for ${monthYear}: ${result.created.length} scheduled, ` +
    `${result.skippedFixedPaymentIds.length} already present`
  );
  return result;
}

// ============================================================================
// Reconciliation
// ============================================================================

async function loadStatusRow(tx: LockedTransaction, statusId: number): Promise<ObligationStatusRow> {
  const [row] = await tx
    .select()
    .from(obligationStatuses)
    .where(eq(obligationStatuses.statusId, statusId))
    .limit(1);

  if (!row) {
    throw new NotFoundError('Obligation status', statusId);
  }
  return row;
}

/**
 * Mark an entry paid
 *
 * `actualAmountCents` defaults to the expected amount, `paidDate` to today.
 *
 * @throws NotFoundError if the entry doesn't exist
 */
export async function markObligationPaid(
  database: Database,
  statusId: number,
  input: Omit<MarkPaidInput, 'statusId'>,
  clock: DBClock
): Promise<ObligationStatusEntry> {
  return await withLedgerLock(database, { scope: 'obligation_status', id: statusId }, 'markObligationPaid', async (tx) => {
    const current = await loadStatusRow(tx, statusId);

    const [row] = await tx
      .update(obligationStatuses)
      .set({
        isPaid: true,
        actualAmountCents: input.actualAmountCents ?? current.expectedAmountCents,
        paidDate: input.paidDate ?? clock.todayIsoDate(),
        updatedAt: clock.now(),
      })
      .where(eq(obligationStatuses.statusId, statusId))
      .returning();

    console.log(`[LEDGER] Status ${statusId} marked paid on ${row.paidDate} (${row.actualAmountCents} ${row.currency})`);
    return await toEntry(tx, row, clock.todayIsoDate());
  });
}

/**
 * Return an entry to unpaid, clearing the paid date
 *
 * The recorded actual amount is kept; it only counts again once the entry
 * is paid.
 *
 * @throws NotFoundError if the entry doesn't exist
 */
export async function markObligationPending(
  database: Database,
  statusId: number,
  clock: DBClock
): Promise<ObligationStatusEntry> {
  return await withLedgerLock(database, { scope: 'obligation_status', id: statusId }, 'markObligationPending', async (tx) => {
    await loadStatusRow(tx, statusId);

    const [row] = await tx
      .update(obligationStatuses)
      .set({
        isPaid: false,
        paidDate: null,
        updatedAt: clock.now(),
      })
      .where(eq(obligationStatuses.statusId, statusId))
      .returning();

    console.log(`[LEDGER] Status ${statusId} marked pending`);
    return await toEntry(tx, row, clock.todayIsoDate());
  });
}

// ============================================================================
// Queries (lock-free)
// ============================================================================

/**
 * @throws NotFoundError if the entry doesn't exist
 */
export async function getObligationStatus(
  tx: DatabaseOrTransaction,
  statusId: number,
  clock: DBClock
): Promise<ObligationStatusEntry> {
  const [row] = await tx
    .select()
    .from(obligationStatuses)
    .where(eq(obligationStatuses.statusId, statusId))
    .limit(1);

  if (!row) {
    throw new NotFoundError('Obligation status', statusId);
  }
  return await toEntry(tx, row, clock.todayIsoDate());
}

function stateCondition(state: ObligationState, today: string): SQL | undefined {
  switch (state) {
    case 'paid':
      return eq(obligationStatuses.isPaid, true);
    case 'overdue':
      return and(eq(obligationStatuses.isPaid, false), lt(obligationStatuses.dueDate, today));
    case 'pending':
      return and(eq(obligationStatuses.isPaid, false), gte(obligationStatuses.dueDate, today));
  }
}

/**
 * Entries matching a filter, ordered by due date, kind, then id
 */
export async function listObligationStatuses(
  tx: DatabaseOrTransaction,
  filter: ObligationFilterInput,
  clock: DBClock
): Promise<ObligationStatusEntry[]> {
  const { kind, monthYear, state, creditCardInvoiceId, limit, offset } = obligationFilterSchema.parse(filter);
  const today = clock.todayIsoDate();

  const conditions: (SQL | undefined)[] = [];
  if (kind) conditions.push(eq(obligationStatuses.obligationKind, kind));
  if (monthYear) conditions.push(eq(obligationStatuses.monthYear, monthYear));
  if (creditCardInvoiceId) conditions.push(eq(obligationStatuses.creditCardInvoiceId, creditCardInvoiceId));
  if (state) conditions.push(stateCondition(state, today));

  const rows = await tx
    .select()
    .from(obligationStatuses)
    .where(and(...conditions))
    .orderBy(
      asc(obligationStatuses.dueDate),
      asc(obligationStatuses.obligationKind),
      asc(obligationStatuses.statusId)
    )
    .limit(limit)
    .offset(offset);

  const entries: ObligationStatusEntry[] = [];
  for (const row of rows) {
    entries.push(await toEntry(tx, row, today));
  }
  return entries;
}

export interface CurrencyTotals {
  currency: Currency;
  expectedAmountCents: number;
  actualAmountCents: number;
}

export interface ObligationCounts {
  total: number;
  paid: number;
  pending: number;
  overdue: number;
  // Amounts never mix currencies
  totalsByCurrency: CurrencyTotals[];
}

/**
 * Entry counts per state and amount totals per currency
 */
export async function countObligationStatuses(
  tx: DatabaseOrTransaction,
  filter: ObligationCountsInput,
  clock: DBClock
): Promise<ObligationCounts> {
  const today = clock.todayIsoDate();

  const rows = await tx
    .select({
      isPaid: obligationStatuses.isPaid,
      dueDate: obligationStatuses.dueDate,
      expectedAmountCents: obligationStatuses.expectedAmountCents,
      actualAmountCents: obligationStatuses.actualAmountCents,
      currency: obligationStatuses.currency,
    })
    .from(obligationStatuses)
    .where(filter.monthYear ? eq(obligationStatuses.monthYear, filter.monthYear) : undefined);

  const counts: ObligationCounts = { total: rows.length, paid: 0, pending: 0, overdue: 0, totalsByCurrency: [] };
  const totals = new Map<Currency, CurrencyTotals>();

  for (const row of rows) {
    counts[getObligationState(row, today)] += 1;

    const line = totals.get(row.currency) ?? { currency: row.currency, expectedAmountCents: 0, actualAmountCents: 0 };
    line.expectedAmountCents += row.expectedAmountCents;
    // Pending entries may keep an earlier actual amount; only paid ones count
    if (row.isPaid) {
      line.actualAmountCents += row.actualAmountCents ?? 0;
    }
    totals.set(row.currency, line);
  }

  counts.totalsByCurrency = [...totals.values()].sort((a, b) => a.currency.localeCompare(b.currency));
  return counts;
}
