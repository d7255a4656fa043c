import { z } from 'zod';
import { currencyEnum, countryEnum, paymentCategoryEnum } from '@finledger/database/schema';
import { isValidMonthYear, parseIsoDate } from '../billing/periods';
import { RATE_POLICY } from '../constants';

/**
 * Shared field schemas
 *
 * IMPORTANT: Enum schemas derive from database enum definitions.
 */

export const currencySchema = z.enum(currencyEnum.enumValues);
export const countrySchema = z.enum(countryEnum.enumValues);
export const paymentCategorySchema = z.enum(paymentCategoryEnum.enumValues);

export const ratePolicySchema = z.enum([
  RATE_POLICY.MOST_RECENT_PRIOR,
  RATE_POLICY.SAME_DAY,
  RATE_POLICY.NEAREST,
]);

// YYYY-MM-DD naming a real calendar day
export const isoDateSchema = z.string().refine((value) => {
  try {
    parseIsoDate(value);
    return true;
  } catch {
    return false;
  }
}, 'Expected a calendar date in YYYY-MM-DD format');

export const monthYearSchema = z.string()
  .refine(isValidMonthYear, 'Expected a period in YYYY-MM format');

// Money in minor units (cents)
export const amountCentsSchema = z.number().int().nonnegative();

export const idSchema = z.number().int().positive();
