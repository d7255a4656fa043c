/**
 * Period summaries
 *
 * Read-only aggregation of one period (YYYY-MM) in a base currency:
 *
 *   income    active incomes overlapping the period, at the period's last day
 *   expenses  effective amount of every ledger entry of the period, at its
 *             paid date (or due date while unpaid)
 *   fees      stored FX + tax fees of the period's variable payments
 *   balance   income - expenses - fees
 *
 * Every amount is converted exactly once; breakdowns regroup the converted
 * expense amounts, so each breakdown sums to `expensesCents`.
 */

import { and, asc, eq, gte, isNull, lte, or } from 'drizzle-orm';
import { getMonthYearRange } from '@finledger/shared/billing';
import {
  INVOICE_BREAKDOWN_CATEGORY,
  type Country,
  type Currency,
  type PaymentCategory,
  type RatePolicy,
} from '@finledger/shared/constants';
import type { DatabaseOrTransaction } from '../db';
import {
  creditCardInvoices,
  creditCards,
  fixedPayments,
  incomes,
  obligationStatuses,
  variablePayments,
} from '../schema';
import { InvalidObligationReferenceError } from './errors';
import { convertToBase, loadRateTable } from './exchange-rates';
import { effectiveAmountCents, readObligationRef } from './obligations';

export type BreakdownCategory = PaymentCategory | typeof INVOICE_BREAKDOWN_CATEGORY;

export interface SummarizePeriodParams {
  monthYear: string;
  baseCurrency: Currency;
  ratePolicy: RatePolicy;
}

export interface BreakdownLine<K extends string> {
  key: K;
  totalCents: number; // base currency
  entries: number;
}

export interface CurrencyBreakdownLine extends BreakdownLine<Currency> {
  originalAmountCents: number; // in `key`
}

export interface PeriodSummary {
  monthYear: string;
  startDate: string;
  endDate: string;
  baseCurrency: Currency;
  ratePolicy: RatePolicy;
  incomeCents: number;
  expensesCents: number;
  feesCents: number;
  balanceCents: number;
  breakdowns: {
    byCountry: BreakdownLine<Country>[];
    byCategory: BreakdownLine<BreakdownCategory>[];
    byCurrency: CurrencyBreakdownLine[];
  };
  counts: {
    entries: number;
    paidEntries: number;
    unpaidEntries: number;
    incomes: number;
  };
}

class Breakdown<K extends string> {
  private readonly lines = new Map<K, BreakdownLine<K>>();
  private readonly original = new Map<K, number>();

  add(key: K, baseCents: number, originalCents = 0): void {
    const line = this.lines.get(key) ?? { key, totalCents: 0, entries: 0 };
    line.totalCents += baseCents;
    line.entries += 1;
    this.lines.set(key, line);
    this.original.set(key, (this.original.get(key) ?? 0) + originalCents);
  }

  // Largest first, ties by key
  toLines(): BreakdownLine<K>[] {
    return [...this.lines.values()]
      .map(line => ({ ...line }))
      .sort((a, b) => b.totalCents - a.totalCents || a.key.localeCompare(b.key));
  }

  originalCents(key: K): number {
    return this.original.get(key) ?? 0;
  }
}

function joined<T>(value: T | null, what: string, statusId: number): T {
  if (value === null) {
    throw new InvalidObligationReferenceError(
      `Obligation status ${statusId} references a missing ${what}`,
      { statusId }
    );
  }
  return value;
}

/**
 * Summarize a period in `baseCurrency`
 *
 * @throws MissingRateError if any amount has no applicable rate
 */
export async function summarizePeriod(
  tx: DatabaseOrTransaction,
  params: SummarizePeriodParams
): Promise<PeriodSummary> {
  const { monthYear, baseCurrency, ratePolicy } = params;
  const range = getMonthYearRange(monthYear);
  const rates = await loadRateTable(tx, baseCurrency);

  const convert = (amountCents: number, currency: Currency, date: string): number =>
    convertToBase(rates, amountCents, currency, baseCurrency, date, ratePolicy);

  // Income
  const activeIncomes = await tx
    .select({ amountCents: incomes.amountCents, currency: incomes.currency })
    .from(incomes)
    .where(and(
      eq(incomes.isActive, true),
      lte(incomes.startDate, range.endDate),
      or(isNull(incomes.endDate), gte(incomes.endDate, range.startDate))
    ))
    .orderBy(asc(incomes.incomeId));

  let incomeCents = 0;
  for (const income of activeIncomes) {
    incomeCents += convert(income.amountCents, income.currency, range.endDate);
  }

  // Expenses and fees
  const rows = await tx
    .select({
      statusId: obligationStatuses.statusId,
      obligationKind: obligationStatuses.obligationKind,
      fixedPaymentId: obligationStatuses.fixedPaymentId,
      variablePaymentId: obligationStatuses.variablePaymentId,
      creditCardInvoiceId: obligationStatuses.creditCardInvoiceId,
      isPaid: obligationStatuses.isPaid,
      paidDate: obligationStatuses.paidDate,
      dueDate: obligationStatuses.dueDate,
      expectedAmountCents: obligationStatuses.expectedAmountCents,
      actualAmountCents: obligationStatuses.actualAmountCents,
      currency: obligationStatuses.currency,
      fixedCountry: fixedPayments.country,
      fixedCategory: fixedPayments.category,
      variableCountry: variablePayments.country,
      variableCategory: variablePayments.category,
      variableCurrency: variablePayments.currency,
      fxFeeCents: variablePayments.fxFeeCents,
      taxFeeCents: variablePayments.taxFeeCents,
      cardCountry: creditCards.issuerCountry,
    })
    .from(obligationStatuses)
    .leftJoin(fixedPayments, eq(fixedPayments.fixedPaymentId, obligationStatuses.fixedPaymentId))
    .leftJoin(variablePayments, eq(variablePayments.variablePaymentId, obligationStatuses.variablePaymentId))
    .leftJoin(creditCardInvoices, eq(creditCardInvoices.invoiceId, obligationStatuses.creditCardInvoiceId))
    .leftJoin(creditCards, eq(creditCards.cardId, creditCardInvoices.cardId))
    .where(eq(obligationStatuses.monthYear, monthYear))
    .orderBy(asc(obligationStatuses.statusId));

  const byCountry = new Breakdown<Country>();
  const byCategory = new Breakdown<BreakdownCategory>();
  const byCurrency = new Breakdown<Currency>();

  let expensesCents = 0;
  let feesCents = 0;
  let paidEntries = 0;

  for (const row of rows) {
    const ref = await readObligationRef(tx, row);
    const rateDate = row.isPaid && row.paidDate ? row.paidDate : row.dueDate;
    const amountCents = effectiveAmountCents(row);
    const baseCents = convert(amountCents, row.currency, rateDate);

    let country: Country;
    let category: BreakdownCategory;
    switch (ref.kind) {
      case 'fixed':
        country = joined(row.fixedCountry, 'fixed payment', row.statusId);
        category = joined(row.fixedCategory, 'fixed payment', row.statusId);
        break;
      case 'variable': {
        country = joined(row.variableCountry, 'variable payment', row.statusId);
        category = joined(row.variableCategory, 'variable payment', row.statusId);
        const feeCents = (row.fxFeeCents ?? 0) + (row.taxFeeCents ?? 0);
        if (feeCents > 0) {
          feesCents += convert(feeCents, joined(row.variableCurrency, 'variable payment', row.statusId), rateDate);
        }
        break;
      }
      case 'credit_card_invoice':
        country = joined(row.cardCountry, 'credit card invoice', row.statusId);
        category = INVOICE_BREAKDOWN_CATEGORY;
        break;
    }

    expensesCents += baseCents;
    byCountry.add(country, baseCents);
    byCategory.add(category, baseCents);
    byCurrency.add(row.currency, baseCents, amountCents);
    if (row.isPaid) paidEntries += 1;
  }

  return {
    monthYear,
    startDate: range.startDate,
    endDate: range.endDate,
    baseCurrency,
    ratePolicy,
    incomeCents,
    expensesCents,
    feesCents,
    balanceCents: incomeCents - expensesCents - feesCents,
    breakdowns: {
      byCountry: byCountry.toLines(),
      byCategory: byCategory.toLines(),
      byCurrency: byCurrency.toLines().map(line => ({
        ...line,
        originalAmountCents: byCurrency.originalCents(line.key),
      })),
    },
    counts: {
      entries: rows.length,
      paidEntries,
      unpaidEntries: rows.length - paidEntries,
      incomes: activeIncomes.length,
    },
  };
}
