/**
 * Root tRPC router
 * Combines all route modules
 */

import { router } from '../lib/trpc';
import { invoicesRouter } from './invoices';
import { obligationsRouter } from './obligations';
import { paymentsRouter } from './payments';
import { summaryRouter } from './summary';

export const appRouter = router({
  invoices: invoicesRouter,
  obligations: obligationsRouter,
  payments: paymentsRouter,
  summary: summaryRouter,
});

export type AppRouter = typeof appRouter;
