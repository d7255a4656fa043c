/**
 * Billing period calculations
 *
 * Credit-card invoices cover one calendar month each. Dates are ISO calendar
 * dates (YYYY-MM-DD) matching PostgreSQL DATE columns, and all arithmetic is
 * done in UTC so the host timezone never shifts a day.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MONTH_YEAR_PATTERN = /^(\d{4})-(\d{2})$/;

/**
 * Date range an invoice covers (both ends inclusive)
 */
export interface BillingPeriod {
  startDate: string;
  endDate: string;
}

/**
 * Parse an ISO calendar date to UTC midnight
 *
 * @throws Error if the string isn't YYYY-MM-DD or names a day that doesn't exist
 */
export function parseIsoDate(isoDate: string): Date {
  const match = ISO_DATE_PATTERN.exec(isoDate);
  if (!match) {
    throw new Error(`Invalid ISO date: ${isoDate}`);
  }

  const year = Number(match[1]);
  const month = Number(match[2]) - 1;
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month, day));

  // Date.UTC silently normalizes 2023-02-30 to 2023-03-02
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month || date.getUTCDate() !== day) {
    throw new Error(`Invalid ISO date: ${isoDate}`);
  }

  return date;
}

/**
 * Format the UTC calendar day of a Date
 */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function normalize(date: string | Date): Date {
  if (typeof date === 'string') {
    return parseIsoDate(date);
  }
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function addDays(isoDate: string, days: number): string {
  const date = parseIsoDate(isoDate);
  date.setUTCDate(date.getUTCDate() + days);
  return toIsoDate(date);
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier)
 */
export function daysBetween(from: string, to: string): number {
  return Math.round((parseIsoDate(to).getTime() - parseIsoDate(from).getTime()) / MS_PER_DAY);
}

/**
 * Billing period containing the anchor date
 *
 * Start is the 1st of the anchor's month. End is the 1st of the following
 * month minus one day; December rolls over into January of the next year.
 */
export function getBillingPeriod(anchorDate: string | Date): BillingPeriod {
  const anchor = normalize(anchorDate);
  const year = anchor.getUTCFullYear();
  const month = anchor.getUTCMonth();

  const start = new Date(Date.UTC(year, month, 1));

  const nextMonthYear = month === 11 ? year + 1 : year;
  const nextMonth = month === 11 ? 0 : month + 1;
  const end = new Date(Date.UTC(nextMonthYear, nextMonth, 1) - MS_PER_DAY);

  return {
    startDate: toIsoDate(start),
    endDate: toIsoDate(end),
  };
}

/**
 * Period that follows `previous`, anchored the day after it ends
 */
export function getNextBillingPeriod(previous: Pick<BillingPeriod, 'endDate'>): BillingPeriod {
  return getBillingPeriod(addDays(previous.endDate, 1));
}

export function getBillingPeriodDays(period: BillingPeriod): number {
  return daysBetween(period.startDate, period.endDate) + 1;
}

/**
 * True when `next` starts the day after `previous` ends
 */
export function arePeriodsContiguous(previous: BillingPeriod, next: BillingPeriod): boolean {
  return addDays(previous.endDate, 1) === next.startDate;
}

/**
 * Period key (YYYY-MM) of a date
 */
export function getMonthYear(date: string | Date): string {
  return toIsoDate(normalize(date)).slice(0, 7);
}

export function isValidMonthYear(monthYear: string): boolean {
  const match = MONTH_YEAR_PATTERN.exec(monthYear);
  if (!match) {
    return false;
  }
  const month = Number(match[2]);
  return month >= 1 && month <= 12;
}

/**
 * First and last day of a YYYY-MM period
 */
export function getMonthYearRange(monthYear: string): BillingPeriod {
  if (!isValidMonthYear(monthYear)) {
    throw new Error(`Invalid month/year: ${monthYear}`);
  }
  return getBillingPeriod(`${monthYear}-01`);
}

/**
 * Day `day` of the period, clamped to the month's last day (31 → 30, 29 …)
 */
export function clampDayToMonth(monthYear: string, day: number): string {
  const { startDate, endDate } = getMonthYearRange(monthYear);
  const lastDay = Number(endDate.slice(8, 10));
  const clamped = Math.min(Math.max(1, Math.trunc(day)), lastDay);
  return addDays(startDate, clamped - 1);
}
