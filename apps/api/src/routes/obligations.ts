/**
 * Obligations Router
 *
 * Monthly reconciliation checklist over fixed payments, variable payments
 * and card invoices.
 */

import {
  countObligationStatuses,
  getObligationStatus,
  listObligationStatuses,
  markObligationPaid,
  markObligationPending,
  scheduleFixedPaymentsForPeriod,
  scheduleObligation,
} from '@finledger/database/ledger';
import {
  markPaidSchema,
  markPendingSchema,
  obligationCountsSchema,
  obligationFilterSchema,
  scheduleFixedForPeriodSchema,
  scheduleObligationSchema,
} from '@finledger/shared/schemas';
import { router, publicProcedure } from '../lib/trpc';

export const obligationsRouter = router({
  /**
   * Create the entry of one obligation for one period
   *
   * Exactly one of fixedPaymentId / variablePaymentId / creditCardInvoiceId.
   */
  schedule: publicProcedure
    .input(scheduleObligationSchema)
    .mutation(async ({ ctx, input }) => {
      return await scheduleObligation(ctx.db, input, ctx.clock);
    }),

  /**
   * Bulk-create the period's entries for active fixed payments
   */
  scheduleFixedForPeriod: publicProcedure
    .input(scheduleFixedForPeriodSchema)
    .mutation(async ({ ctx, input }) => {
      return await scheduleFixedPaymentsForPeriod(ctx.db, input.monthYear, ctx.clock);
    }),

  markPaid: publicProcedure
    .input(markPaidSchema)
    .mutation(async ({ ctx, input }) => {
      const { statusId, ...paid } = input;
      return await markObligationPaid(ctx.db, statusId, paid, ctx.clock);
    }),

  markPending: publicProcedure
    .input(markPendingSchema)
    .mutation(async ({ ctx, input }) => {
      return await markObligationPending(ctx.db, input.statusId, ctx.clock);
    }),

  get: publicProcedure
    .input(markPendingSchema)
    .query(async ({ ctx, input }) => {
      return await getObligationStatus(ctx.db, input.statusId, ctx.clock);
    }),

  list: publicProcedure
    .input(obligationFilterSchema)
    .query(async ({ ctx, input }) => {
      return await listObligationStatuses(ctx.db, input, ctx.clock);
    }),

  counts: publicProcedure
    .input(obligationCountsSchema)
    .query(async ({ ctx, input }) => {
      return await countObligationStatuses(ctx.db, input, ctx.clock);
    }),
});
