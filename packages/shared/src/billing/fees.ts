/**
 * Card transaction fee calculation
 *
 * FX fee: charged by the card when the transaction currency differs from the
 * card currency.
 * Tax fee: levied by some issuer countries (Brazil's IOF) on transactions
 * outside the issuer country's home currency.
 *
 * Both are computed from the transaction amount, never from each other.
 */

import {
  COUNTRY_HOME_CURRENCY,
  FOREIGN_TRANSACTION_TAX_COUNTRIES,
  type Country,
  type Currency,
} from '../constants';

/**
 * Card attributes the fee rules read
 *
 * Percentages accept the DECIMAL string a database row carries.
 */
export interface FeeCard {
  currency: Currency;
  issuerCountry: Country;
  fxFeePercent: number | string;
  taxPercent: number | string;
}

export interface TransactionFees {
  fxFeeCents: number;
  taxFeeCents: number;
  totalWithFeesCents: number;
}

/**
 * 2.99 (%) → 299 basis points
 */
export function percentToBasisPoints(percent: number | string): number {
  const value = typeof percent === 'string' ? Number(percent) : percent;
  return Math.round(value * 100);
}

/**
 * Apply a basis-point rate to an amount, rounding half up to whole cents
 */
export function applyBasisPoints(amountCents: number, basisPoints: number): number {
  return Math.round((amountCents * basisPoints) / 10_000);
}

export function calculateFxFee(amountCents: number, txnCurrency: Currency, card: FeeCard): number {
  if (txnCurrency === card.currency) {
    return 0;
  }
  return applyBasisPoints(amountCents, percentToBasisPoints(card.fxFeePercent));
}

export function calculateTaxFee(amountCents: number, txnCurrency: Currency, card: FeeCard): number {
  if (!FOREIGN_TRANSACTION_TAX_COUNTRIES.includes(card.issuerCountry)) {
    return 0;
  }
  if (txnCurrency === COUNTRY_HOME_CURRENCY[card.issuerCountry]) {
    return 0;
  }
  return applyBasisPoints(amountCents, percentToBasisPoints(card.taxPercent));
}

/**
 * Fees for one transaction on a card
 *
 * @example
 * ```typescript
 * calculateTransactionFees(15000, 'EUR', { currency: 'BRL', issuerCountry: 'Brazil', fxFeePercent: '2.99', taxPercent: '0' });
 * // { fxFeeCents: 449, taxFeeCents: 0, totalWithFeesCents: 15449 }
 * ```
 */
export function calculateTransactionFees(
  amountCents: number,
  txnCurrency: Currency,
  card: FeeCard
): TransactionFees {
  const fxFeeCents = calculateFxFee(amountCents, txnCurrency, card);
  const taxFeeCents = calculateTaxFee(amountCents, txnCurrency, card);

  return {
    fxFeeCents,
    taxFeeCents,
    totalWithFeesCents: amountCents + fxFeeCents + taxFeeCents,
  };
}
