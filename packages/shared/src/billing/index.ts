/**
 * Billing module exports
 *
 * Pure calculations: calendar billing periods, card fees, rate selection
 */

export {
  type BillingPeriod,
  parseIsoDate,
  toIsoDate,
  addDays,
  daysBetween,
  getBillingPeriod,
  getNextBillingPeriod,
  getBillingPeriodDays,
  arePeriodsContiguous,
  getMonthYear,
  isValidMonthYear,
  getMonthYearRange,
  clampDayToMonth,
} from './periods';

export {
  type FeeCard,
  type TransactionFees,
  percentToBasisPoints,
  applyBasisPoints,
  calculateFxFee,
  calculateTaxFee,
  calculateTransactionFees,
} from './fees';

export {
  type ExchangeRateQuote,
  RateTable,
  convertCents,
} from './rates';
