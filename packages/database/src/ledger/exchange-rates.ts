/**
 * Exchange rate lookup for summaries
 *
 * Rates are read once per summary into a RateTable; selection follows the
 * configured RatePolicy. Only the stored direction is used: a EUR->BRL rate
 * never stands in for a missing BRL->EUR one.
 */

import { eq } from 'drizzle-orm';
import { convertCents, RateTable } from '@finledger/shared/billing';
import type { Currency, RatePolicy } from '@finledger/shared/constants';
import type { DatabaseOrTransaction } from '../db';
import { exchangeRates } from '../schema';
import { MissingRateError } from './errors';

/**
 * All stored rates converting into `toCurrency`
 */
export async function loadRateTable(
  tx: DatabaseOrTransaction,
  toCurrency: Currency
): Promise<RateTable> {
  const rows = await tx
    .select({
      fromCurrency: exchangeRates.fromCurrency,
      toCurrency: exchangeRates.toCurrency,
      rateDate: exchangeRates.rateDate,
      rate: exchangeRates.rate,
    })
    .from(exchangeRates)
    .where(eq(exchangeRates.toCurrency, toCurrency));

  return new RateTable(rows.map(row => ({ ...row, rate: Number(row.rate) })));
}

/**
 * Convert an amount dated `date` into the base currency
 *
 * @throws MissingRateError when the policy finds no rate
 */
export function convertToBase(
  rates: RateTable,
  amountCents: number,
  fromCurrency: Currency,
  baseCurrency: Currency,
  date: string,
  policy: RatePolicy
): number {
  const quote = rates.resolve(fromCurrency, baseCurrency, date, policy);
  if (!quote) {
    throw new MissingRateError(fromCurrency, baseCurrency, date, policy);
  }
  return convertCents(amountCents, quote.rate);
}
