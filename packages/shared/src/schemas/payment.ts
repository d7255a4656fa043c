import { z } from 'zod';
import { FIELD_LIMITS } from '../constants';
import {
  amountCentsSchema,
  countrySchema,
  currencySchema,
  idSchema,
  isoDateSchema,
  paymentCategorySchema,
} from './common';

/**
 * One-off (variable) payment schemas
 */

export const recordVariablePaymentSchema = z.object({
  date: isoDateSchema,
  description: z.string().min(1).max(FIELD_LIMITS.DESCRIPTION),
  amountCents: amountCentsSchema,
  currency: currencySchema,
  country: countrySchema,
  category: paymentCategorySchema,
  // When set, card fees are computed and stored with the payment
  creditCardId: idSchema.optional(),
});

export type RecordVariablePaymentInput = z.infer<typeof recordVariablePaymentSchema>;
