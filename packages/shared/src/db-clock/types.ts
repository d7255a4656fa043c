/**
 * Database clock types for timestamp abstraction
 *
 * DBClock is the single source of "now" and "today" for everything the ledger
 * stores or compares against stored dates: invoice bootstrap periods, paid
 * dates, overdue detection, createdAt/updatedAt.
 *
 * SCOPE: Ledger dates and timestamps ONLY.
 * NOT for lock timeouts or other short-lived operational delays.
 */

/**
 * DBClock interface
 *
 * Production uses RealDBClock (system time).
 * Tests use MockDBClock (controllable time).
 */
export interface DBClock {
  /**
   * Current timestamp for TIMESTAMP columns
   */
  now(): Date;

  /**
   * Today at 00:00:00.000 UTC
   */
  today(): Date;

  /**
   * Today as an ISO calendar date (YYYY-MM-DD, UTC)
   * Used for DATE columns (due_date, paid_date, invoice periods)
   */
  todayIsoDate(): string;
}
