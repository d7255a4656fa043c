/**
 * Mock database clock for testing
 *
 * Allows precise control over "today" for deterministic tests of
 * overdue detection, default paid dates and invoice bootstrap periods.
 * Time is frozen until set or advanced.
 */

import type { DBClock } from './types';
import { startOfUtcDay } from './real-clock';

export class MockDBClock implements DBClock {
  private mockedTime: Date;

  constructor(currentTime: Date = new Date()) {
    this.mockedTime = new Date(currentTime);
  }

  now(): Date {
    return new Date(this.mockedTime);
  }

  today(): Date {
    return startOfUtcDay(this.now());
  }

  todayIsoDate(): string {
    return this.today().toISOString().slice(0, 10);
  }

  /**
   * Set the mocked time
   */
  setTime(time: Date): void {
    this.mockedTime = new Date(time);
  }

  /**
   * Set the mocked time to 12:00 UTC of an ISO calendar date
   */
  setDate(isoDate: string): void {
    this.setTime(new Date(`${isoDate}T12:00:00Z`));
  }

  advance(ms: number): void {
    this.setTime(new Date(this.mockedTime.getTime() + ms));
  }
}
