import { z } from 'zod';
import { currencySchema, monthYearSchema, ratePolicySchema } from './common';

/**
 * Period summary schemas
 * baseCurrency and ratePolicy fall back to server configuration
 */
export const summarizePeriodSchema = z.object({
  monthYear: monthYearSchema,
  baseCurrency: currencySchema.optional(),
  ratePolicy: ratePolicySchema.optional(),
});

export type SummarizePeriodInput = z.infer<typeof summarizePeriodSchema>;
