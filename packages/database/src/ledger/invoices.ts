/**
 * Credit card invoice lifecycle
 *
 * Each card has a contiguous chain of monthly invoices, at most one of them
 * open. Closing an invoice and opening its successor is one transaction under
 * the card lock:
 *
 *   open ──close──▶ closed (terminal)
 *                    └─▶ successor (open) for end_date + 1 day
 *
 * Totals are never stored; they are read from the ledger entries that
 * reference the invoice.
 */

import { and, asc, desc, eq } from 'drizzle-orm';
import { getBillingPeriod, getBillingPeriodDays, getNextBillingPeriod } from '@finledger/shared/billing';
import type { Currency } from '@finledger/shared/constants';
import type { DBClock } from '@finledger/shared/db-clock';
import type { CreateInitialInvoiceInput } from '@finledger/shared/schemas';
import type { Database, DatabaseOrTransaction } from '../db';
import { withLedgerLock, type LockedTransaction } from '../locking';
import { creditCardInvoices, creditCards, obligationStatuses, type CreditCardInvoice } from '../schema';
import { AlreadyClosedError, InactiveCardError, InvoiceSequenceExistsError, NotFoundError } from './errors';
import { effectiveAmountCents } from './obligations';

export interface CloseInvoiceResult {
  closedInvoice: CreditCardInvoice;
  nextInvoice: CreditCardInvoice;
}

export interface InvoiceTotals {
  invoiceId: number;
  totalAmountCents: number;
  purchasesCount: number;
  billingPeriodDays: number;
  currency: Currency;
}

/**
 * Open the first invoice of a card
 *
 * The period is the calendar month of `anchorDate` (default: today).
 *
 * @throws NotFoundError if the card doesn't exist
 * @throws InactiveCardError if the card is deactivated
 * @throws InvoiceSequenceExistsError if the card already has invoices
 */
export async function createInitialInvoice(
  database: Database,
  input: CreateInitialInvoiceInput,
  clock: DBClock
): Promise<CreditCardInvoice> {
  const { cardId } = input;

  return await withLedgerLock(database, { scope: 'card', id: cardId }, 'createInitialInvoice', async (tx) => {
    const [card] = await tx
      .select({ cardId: creditCards.cardId, isActive: creditCards.isActive })
      .from(creditCards)
      .where(eq(creditCards.cardId, cardId))
      .limit(1);

    if (!card) {
      throw new NotFoundError('Credit card', cardId);
    }
    if (!card.isActive) {
      throw new InactiveCardError(cardId);
    }

    const [existing] = await tx
      .select({ invoiceId: creditCardInvoices.invoiceId })
      .from(creditCardInvoices)
      .where(eq(creditCardInvoices.cardId, cardId))
      .limit(1);

    if (existing) {
      throw new InvoiceSequenceExistsError(cardId);
    }

    const period = getBillingPeriod(input.anchorDate ?? clock.todayIsoDate());
    const [invoice] = await tx
      .insert(creditCardInvoices)
      .values({
        cardId,
        startDate: period.startDate,
        endDate: period.endDate,
        isClosed: false,
        createdAt: clock.now(),
      })
      .returning();

    console.log(`[INVOICE] Opened initial invoice ${invoice.invoiceId} for card ${cardId} (${period.startDate}..${period.endDate})`);
    return invoice;
  });
}

/**
 * Close an invoice and open its successor atomically
 *
 * The close is a compare-and-swap on is_closed, so of two concurrent calls
 * exactly one succeeds and the other gets AlreadyClosedError with nothing
 * written.
 *
 * @throws NotFoundError if the invoice doesn't exist
 * @throws AlreadyClosedError if the invoice is already closed
 */
export async function closeInvoice(
  database: Database,
  invoiceId: number,
  clock: DBClock
): Promise<CloseInvoiceResult> {
  // card_id never changes, so reading it before locking is safe
  const [target] = await database
    .select({ cardId: creditCardInvoices.cardId })
    .from(creditCardInvoices)
    .where(eq(creditCardInvoices.invoiceId, invoiceId))
    .limit(1);

  if (!target) {
    throw new NotFoundError('Invoice', invoiceId);
  }

  return await withLedgerLock(database, { scope: 'card', id: target.cardId }, 'closeInvoice', async (tx) => {
    const [closedInvoice] = await tx
      .update(creditCardInvoices)
      .set({ isClosed: true, closedAt: clock.now() })
      .where(and(
        eq(creditCardInvoices.invoiceId, invoiceId),
        eq(creditCardInvoices.isClosed, false)
      ))
      .returning();

    if (!closedInvoice) {
      throw new AlreadyClosedError(invoiceId);
    }

    const nextInvoice = await openSuccessorInvoice(tx, closedInvoice, clock);

    console.log(
      `[INVOICE] Closed invoice ${invoiceId} for card ${closedInvoice.cardId}, ` +
      `opened ${nextInvoice.invoiceId} (${nextInvoice.startDate}..${nextInvoice.endDate})`
    );

    return { closedInvoice, nextInvoice };
  });
}

/**
 * Insert the invoice following `closed` (lock-internal)
 */
async function openSuccessorInvoice(
  tx: LockedTransaction,
  closed: CreditCardInvoice,
  clock: DBClock
): Promise<CreditCardInvoice> {
  const period = getNextBillingPeriod(closed);

  const [nextInvoice] = await tx
    .insert(creditCardInvoices)
    .values({
      cardId: closed.cardId,
      startDate: period.startDate,
      endDate: period.endDate,
      isClosed: false,
      createdAt: clock.now(),
    })
    .returning();

  return nextInvoice;
}

// ============================================================================
// Queries (lock-free)
// ============================================================================

export async function getOpenInvoiceForCard(
  tx: DatabaseOrTransaction,
  cardId: number
): Promise<CreditCardInvoice | null> {
  const [invoice] = await tx
    .select()
    .from(creditCardInvoices)
    .where(and(
      eq(creditCardInvoices.cardId, cardId),
      eq(creditCardInvoices.isClosed, false)
    ))
    .orderBy(desc(creditCardInvoices.startDate))
    .limit(1);

  return invoice ?? null;
}

/**
 * Closed invoices of a card, most recent period first
 */
export async function getClosedInvoicesForCard(
  tx: DatabaseOrTransaction,
  cardId: number
): Promise<CreditCardInvoice[]> {
  return await tx
    .select()
    .from(creditCardInvoices)
    .where(and(
      eq(creditCardInvoices.cardId, cardId),
      eq(creditCardInvoices.isClosed, true)
    ))
    .orderBy(desc(creditCardInvoices.startDate));
}

/**
 * Full invoice chain of a card in period order
 */
export async function listInvoicesForCard(
  tx: DatabaseOrTransaction,
  cardId: number
): Promise<CreditCardInvoice[]> {
  return await tx
    .select()
    .from(creditCardInvoices)
    .where(eq(creditCardInvoices.cardId, cardId))
    .orderBy(asc(creditCardInvoices.startDate));
}

/**
 * Total, entry count and period length of an invoice
 *
 * The total sums the effective amount (actual when paid and recorded,
 * expected otherwise) of every ledger entry referencing the invoice.
 *
 * @throws NotFoundError if the invoice doesn't exist
 */
export async function getInvoiceTotals(
  tx: DatabaseOrTransaction,
  invoiceId: number
): Promise<InvoiceTotals> {
  const [invoice] = await tx
    .select({
      invoiceId: creditCardInvoices.invoiceId,
      startDate: creditCardInvoices.startDate,
      endDate: creditCardInvoices.endDate,
      currency: creditCards.currency,
    })
    .from(creditCardInvoices)
    .innerJoin(creditCards, eq(creditCards.cardId, creditCardInvoices.cardId))
    .where(eq(creditCardInvoices.invoiceId, invoiceId))
    .limit(1);

  if (!invoice) {
    throw new NotFoundError('Invoice', invoiceId);
  }

  const entries = await tx
    .select({
      isPaid: obligationStatuses.isPaid,
      expectedAmountCents: obligationStatuses.expectedAmountCents,
      actualAmountCents: obligationStatuses.actualAmountCents,
    })
    .from(obligationStatuses)
    .where(eq(obligationStatuses.creditCardInvoiceId, invoiceId));

  return {
    invoiceId,
    totalAmountCents: entries.reduce((sum, entry) => sum + effectiveAmountCents(entry), 0),
    purchasesCount: entries.length,
    billingPeriodDays: getBillingPeriodDays(invoice),
    currency: invoice.currency,
  };
}
