/**
 * Payments Router
 */

import { recordVariablePayment } from '@finledger/database/ledger';
import { recordVariablePaymentSchema } from '@finledger/shared/schemas';
import { router, publicProcedure } from '../lib/trpc';

export const paymentsRouter = router({
  /**
   * Record a one-off payment; card fees are computed and stored with it
   */
  recordVariable: publicProcedure
    .input(recordVariablePaymentSchema)
    .mutation(async ({ ctx, input }) => {
      return await recordVariablePayment(ctx.db, input, ctx.clock);
    }),
});
