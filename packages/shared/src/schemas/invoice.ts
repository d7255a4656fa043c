import { z } from 'zod';
import { idSchema, isoDateSchema } from './common';

/**
 * Credit card invoice schemas
 */

export const createInitialInvoiceSchema = z.object({
  cardId: idSchema,
  // Any day in the first billing month (defaults to today)
  anchorDate: isoDateSchema.optional(),
});

export const invoiceIdSchema = z.object({
  invoiceId: idSchema,
});

export const cardIdSchema = z.object({
  cardId: idSchema,
});

export type CreateInitialInvoiceInput = z.infer<typeof createInitialInvoiceSchema>;
