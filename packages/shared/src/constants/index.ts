/**
 * System Constants - Single Source of Truth
 *
 * IMPORTANT: Enum types are derived from database schema (PostgreSQL ENUM types).
 * The constants below add facts the enums don't carry (home currencies,
 * taxing countries, lock tuning, field sizes).
 */

// Re-export enum types from database package (single source of truth)
export type {
  Currency,
  Country,
  PaymentCategory,
  PaymentFrequency,
  ObligationKind,
} from '@finledger/database/schema';

import type { Currency, Country } from '@finledger/database/schema';

// Currency a card issued in the country is "at home" in.
// Tax on foreign transactions compares against this, not the card currency.
export const COUNTRY_HOME_CURRENCY = {
  Brazil: 'BRL',
  Portugal: 'EUR',
} as const satisfies Record<Country, Currency>;

// Issuer countries that levy a tax on foreign-currency card transactions (IOF in Brazil)
export const FOREIGN_TRANSACTION_TAX_COUNTRIES: readonly Country[] = ['Brazil'];

// Read-time state of a ledger entry. Never stored: overdue depends on "today".
export const OBLIGATION_STATE = {
  PAID: 'paid',
  PENDING: 'pending',
  OVERDUE: 'overdue',
} as const;

export type ObligationState = typeof OBLIGATION_STATE[keyof typeof OBLIGATION_STATE];

// Which stored rate converts an amount dated D
export const RATE_POLICY = {
  MOST_RECENT_PRIOR: 'most_recent_prior', // latest rate on or before D
  SAME_DAY: 'same_day',                   // rate dated exactly D
  NEAREST: 'nearest',                     // closest date either side, earlier wins ties
} as const;

export type RatePolicy = typeof RATE_POLICY[keyof typeof RATE_POLICY];

// Breakdown category for card-invoice entries (cards have no spending category)
export const INVOICE_BREAKDOWN_CATEGORY = 'credit_card';

// Column sizes shared by schema and validation
export const FIELD_LIMITS = {
  DESCRIPTION: 200,
  CARDHOLDER_NAME: 100,
  FINAL_DIGITS: 4,
  MONTH_YEAR: 7,
  NOTIFICATION_CODE: 100,
  NOTIFICATION_CATEGORY: 50,
  ENTITY_ID: 50,
} as const;

// Advisory lock tuning
export const LEDGER_LOCK = {
  TIMEOUT_MS: 10_000,
  WARNING_THRESHOLD_MS: 5_000,
} as const;
