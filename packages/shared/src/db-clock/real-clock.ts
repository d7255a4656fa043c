/**
 * Real database clock using system time
 */

import type { DBClock } from './types';

/**
 * Truncate a timestamp to 00:00 UTC of the same day
 */
export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(
    date.getUTCFullYear(),
    date.getUTCMonth(),
    date.getUTCDate(),
    0, 0, 0, 0
  ));
}

export class RealDBClock implements DBClock {
  now(): Date {
    return new Date();
  }

  today(): Date {
    return startOfUtcDay(this.now());
  }

  todayIsoDate(): string {
    return this.today().toISOString().slice(0, 10);
  }
}
