import { z } from 'zod';
import { obligationKindEnum } from '@finledger/database/schema';
import {
  amountCentsSchema,
  currencySchema,
  idSchema,
  isoDateSchema,
  monthYearSchema,
} from './common';

/**
 * Obligation ledger schemas
 *
 * Inputs accept the loose reference form (three optional ids) that callers
 * send; the ledger converts it to a tagged reference and rejects zero or
 * multiple ids with InvalidObligationReferenceError.
 */

export const obligationKindSchema = z.enum(obligationKindEnum.enumValues);

export const obligationStateSchema = z.enum(['paid', 'pending', 'overdue']);

export const looseObligationRefSchema = z.object({
  fixedPaymentId: idSchema.optional(),
  variablePaymentId: idSchema.optional(),
  creditCardInvoiceId: idSchema.optional(),
});

export const scheduleObligationSchema = looseObligationRefSchema.extend({
  monthYear: monthYearSchema,
  dueDate: isoDateSchema,
  // Default to the referenced obligation's amount/currency when omitted
  expectedAmountCents: amountCentsSchema.optional(),
  currency: currencySchema.optional(),
  notes: z.string().max(2000).optional(),
});

export const markPaidSchema = z.object({
  statusId: idSchema,
  actualAmountCents: amountCentsSchema.optional(),
  paidDate: isoDateSchema.optional(),
});

export const markPendingSchema = z.object({
  statusId: idSchema,
});

export const obligationFilterSchema = z.object({
  kind: obligationKindSchema.optional(),
  monthYear: monthYearSchema.optional(),
  state: obligationStateSchema.optional(),
  creditCardInvoiceId: idSchema.optional(),
  limit: z.number().int().min(1).max(500).default(100),
  offset: z.number().int().min(0).default(0),
});

export const scheduleFixedForPeriodSchema = z.object({
  monthYear: monthYearSchema,
});

export const obligationCountsSchema = z.object({
  monthYear: monthYearSchema.optional(),
});

export type LooseObligationRef = z.infer<typeof looseObligationRefSchema>;
export type ScheduleObligationInput = z.infer<typeof scheduleObligationSchema>;
export type MarkPaidInput = z.infer<typeof markPaidSchema>;
export type ObligationFilterInput = z.input<typeof obligationFilterSchema>;
export type ObligationCountsInput = z.infer<typeof obligationCountsSchema>;
