/**
 * Exchange rate selection
 *
 * Rates are stored per (from, to, date). Which stored rate applies to an
 * amount dated D is a configurable policy (see RATE_POLICY).
 */

import type { Currency, RatePolicy } from '../constants';
import { daysBetween } from './periods';

export interface ExchangeRateQuote {
  fromCurrency: Currency;
  toCurrency: Currency;
  rateDate: string;
  rate: number;
}

function pairKey(from: Currency, to: Currency): string {
  return `${from}->${to}`;
}

/**
 * In-memory index of stored rates, sorted by date per currency pair
 */
export class RateTable {
  private readonly quotesByPair = new Map<string, ExchangeRateQuote[]>();

  constructor(quotes: Iterable<ExchangeRateQuote> = []) {
    for (const quote of quotes) {
      this.add(quote);
    }
  }

  add(quote: ExchangeRateQuote): void {
    const key = pairKey(quote.fromCurrency, quote.toCurrency);
    const list = this.quotesByPair.get(key) ?? [];
    list.push(quote);
    list.sort((a, b) => a.rateDate.localeCompare(b.rateDate));
    this.quotesByPair.set(key, list);
  }

  /**
   * Pick the rate converting `from` into `to` for an amount dated `date`
   *
   * Same currency always resolves to 1. Returns null when the policy finds
   * no stored rate; the caller decides how to fail.
   */
  resolve(from: Currency, to: Currency, date: string, policy: RatePolicy): ExchangeRateQuote | null {
    if (from === to) {
      return { fromCurrency: from, toCurrency: to, rateDate: date, rate: 1 };
    }

    const quotes = this.quotesByPair.get(pairKey(from, to));
    if (!quotes || quotes.length === 0) {
      return null;
    }

    switch (policy) {
      case 'same_day':
        return quotes.find(q => q.rateDate === date) ?? null;

      case 'most_recent_prior': {
        let best: ExchangeRateQuote | null = null;
        for (const quote of quotes) {
          if (quote.rateDate > date) break;
          best = quote;
        }
        return best;
      }

      case 'nearest': {
        let best: ExchangeRateQuote | null = null;
        let bestDistance = Number.POSITIVE_INFINITY;
        for (const quote of quotes) {
          const distance = Math.abs(daysBetween(date, quote.rateDate));
          // Strict comparison keeps the earlier quote on ties (list is date-ascending)
          if (distance < bestDistance) {
            best = quote;
            bestDistance = distance;
          }
        }
        return best;
      }
    }
  }
}

/**
 * Convert minor units with a rate, rounding to whole cents
 */
export function convertCents(amountCents: number, rate: number): number {
  return Math.round(amountCents * rate);
}
