/**
 * Database clock provider
 *
 * Holds the process-wide clock used when a caller doesn't pass one
 * explicitly. Ledger functions take a DBClock parameter; the API context
 * resolves it from here.
 */

import type { DBClock } from './types';
import { RealDBClock } from './real-clock';

export class DBClockProvider {
  private static instance: DBClockProvider | undefined;
  private clock: DBClock;

  private constructor() {
    this.clock = new RealDBClock();
  }

  static getInstance(): DBClockProvider {
    if (!DBClockProvider.instance) {
      DBClockProvider.instance = new DBClockProvider();
    }
    return DBClockProvider.instance;
  }

  getClock(): DBClock {
    return this.clock;
  }

  /**
   * Swap the process-wide clock (e.g. a MockDBClock in tests)
   */
  setClock(clock: DBClock): void {
    this.clock = clock;
  }

  reset(): void {
    this.clock = new RealDBClock();
  }
}

// Singleton provider instance
export const dbClockProvider = DBClockProvider.getInstance();

/**
 * Get current database clock (fresh reference)
 * Use when clock might have been swapped
 */
export function getDBClock(): DBClock {
  return dbClockProvider.getClock();
}
