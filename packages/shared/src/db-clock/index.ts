/**
 * Database clock module exports
 *
 * Timestamp abstraction enabling deterministic testing of
 * date-based ledger logic (overdue, paid dates, billing periods).
 */

export type { DBClock } from './types';

export { RealDBClock, startOfUtcDay } from './real-clock';
export { MockDBClock } from './mock-clock';

export {
  DBClockProvider,
  dbClockProvider,
  getDBClock,
} from './provider';
