/**
 * Summary Router
 */

import { summarizePeriod } from '@finledger/database/ledger';
import { summarizePeriodSchema } from '@finledger/shared/schemas';
import { router, publicProcedure } from '../lib/trpc';

export const summaryRouter = router({
  /**
   * Income, expenses, fees and balance of a period in one currency
   *
   * baseCurrency and ratePolicy default to BASE_CURRENCY / RATE_POLICY.
   */
  period: publicProcedure
    .input(summarizePeriodSchema)
    .query(async ({ ctx, input }) => {
      return await summarizePeriod(ctx.db, {
        monthYear: input.monthYear,
        baseCurrency: input.baseCurrency ?? ctx.config.BASE_CURRENCY,
        ratePolicy: input.ratePolicy ?? ctx.config.RATE_POLICY,
      });
    }),
});
