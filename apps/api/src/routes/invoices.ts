/**
 * Invoices Router
 *
 * Credit card invoice lifecycle: bootstrap, close with rollover, totals.
 */

import {
  closeInvoice,
  createInitialInvoice,
  getClosedInvoicesForCard,
  getInvoiceTotals,
  getOpenInvoiceForCard,
  listInvoicesForCard,
} from '@finledger/database/ledger';
import { cardIdSchema, createInitialInvoiceSchema, invoiceIdSchema } from '@finledger/shared/schemas';
import { router, publicProcedure } from '../lib/trpc';

export const invoicesRouter = router({
  /**
   * Open the first invoice of a card (calendar month of anchorDate or today)
   */
  createInitial: publicProcedure
    .input(createInitialInvoiceSchema)
    .mutation(async ({ ctx, input }) => {
      return await createInitialInvoice(ctx.db, input, ctx.clock);
    }),

  /**
   * Close an invoice; returns it with the newly opened successor
   */
  close: publicProcedure
    .input(invoiceIdSchema)
    .mutation(async ({ ctx, input }) => {
      return await closeInvoice(ctx.db, input.invoiceId, ctx.clock);
    }),

  totals: publicProcedure
    .input(invoiceIdSchema)
    .query(async ({ ctx, input }) => {
      return await getInvoiceTotals(ctx.db, input.invoiceId);
    }),

  openForCard: publicProcedure
    .input(cardIdSchema)
    .query(async ({ ctx, input }) => {
      return await getOpenInvoiceForCard(ctx.db, input.cardId);
    }),

  closedForCard: publicProcedure
    .input(cardIdSchema)
    .query(async ({ ctx, input }) => {
      return await getClosedInvoicesForCard(ctx.db, input.cardId);
    }),

  listForCard: publicProcedure
    .input(cardIdSchema)
    .query(async ({ ctx, input }) => {
      return await listInvoicesForCard(ctx.db, input.cardId);
    }),
});
