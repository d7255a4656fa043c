import { pgEnum } from 'drizzle-orm/pg-core';

/**
 * Database Enumerations - Single Source of Truth
 *
 * All enum types defined here and used across the schema.
 * These map to PostgreSQL ENUM types and provide TypeScript type safety.
 *
 * IMPORTANT: When adding new values to existing enums in production:
 * - Use: ALTER TYPE enum_name ADD VALUE 'new_value';
 * - Can only add values (cannot remove or reorder without recreating type)
 */

export const currencyEnum = pgEnum('currency', [
  'BRL',
  'EUR',
  'USD'
]);

export const countryEnum = pgEnum('country', [
  'Brazil',
  'Portugal'
]);

export const paymentCategoryEnum = pgEnum('payment_category', [
  'food',
  'transport',
  'entertainment',
  'health',
  'education',
  'shopping',
  'bills',
  'other'
]);

export const paymentFrequencyEnum = pgEnum('payment_frequency', [
  'monthly',
  'yearly'
]);

// Which obligation column of obligation_statuses is set
export const obligationKindEnum = pgEnum('obligation_kind', [
  'fixed',
  'variable',
  'credit_card_invoice'
]);

/**
 * TypeScript types derived from enums
 *
 * Example:
 *   import type { Currency } from '@finledger/database/schema';
 *   const currency: Currency = 'EUR';
 */
export type Currency = typeof currencyEnum.enumValues[number];
export type Country = typeof countryEnum.enumValues[number];
export type PaymentCategory = typeof paymentCategoryEnum.enumValues[number];
export type PaymentFrequency = typeof paymentFrequencyEnum.enumValues[number];
export type ObligationKind = typeof obligationKindEnum.enumValues[number];
