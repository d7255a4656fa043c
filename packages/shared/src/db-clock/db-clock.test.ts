/**
 * Tests for database clock implementations
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RealDBClock, startOfUtcDay } from './real-clock';
import { MockDBClock } from './mock-clock';
import { DBClockProvider, getDBClock } from './provider';

describe('RealDBClock', () => {
  let clock: RealDBClock;

  beforeEach(() => {
    clock = new RealDBClock();
  });

  it('should return current timestamp', () => {
    const before = Date.now();
    const now = clock.now();
    const after = Date.now();

    expect(now.getTime()).toBeGreaterThanOrEqual(before);
    expect(now.getTime()).toBeLessThanOrEqual(after);
  });

  it('should return today at UTC midnight', () => {
    const today = clock.today();
    expect(today.getUTCHours()).toBe(0);
    expect(today.getUTCMinutes()).toBe(0);
    expect(today.getUTCSeconds()).toBe(0);
    expect(today.getUTCMilliseconds()).toBe(0);
  });

  it('should format today as an ISO calendar date', () => {
    expect(clock.todayIsoDate()).toMatch(/^\d{4}-\d{2}-\d{2}$/);
  });
});

describe('startOfUtcDay', () => {
  it('should drop the time of day', () => {
    expect(startOfUtcDay(new Date('2024-06-15T23:59:59.999Z')).toISOString())
      .toBe('2024-06-15T00:00:00.000Z');
  });
});

describe('MockDBClock', () => {
  let clock: MockDBClock;

  beforeEach(() => {
    clock = new MockDBClock(new Date('2024-06-15T12:00:00Z'));
  });

  it('should stay frozen at the mocked time', () => {
    const time1 = clock.now();
    const time2 = clock.now();
    expect(time1.toISOString()).toBe('2024-06-15T12:00:00.000Z');
    expect(time2.toISOString()).toBe(time1.toISOString());
  });

  it('should report today in UTC regardless of time of day', () => {
    clock.setTime(new Date('2024-12-31T23:30:00Z'));
    expect(clock.todayIsoDate()).toBe('2024-12-31');
    expect(clock.today().toISOString()).toBe('2024-12-31T00:00:00.000Z');
  });

  it('should set a calendar date at noon UTC', () => {
    clock.setDate('2024-02-29');
    expect(clock.now().toISOString()).toBe('2024-02-29T12:00:00.000Z');
  });

  it('should advance across a day boundary', () => {
    clock.advance(13 * 60 * 60 * 1000);
    expect(clock.now().toISOString()).toBe('2024-06-16T01:00:00.000Z');
    expect(clock.todayIsoDate()).toBe('2024-06-16');
  });

  it('should not be affected by mutating a returned date', () => {
    clock.now().setUTCFullYear(2000);
    expect(clock.todayIsoDate()).toBe('2024-06-15');
  });
});

describe('DBClockProvider', () => {
  const provider = DBClockProvider.getInstance();

  afterEach(() => {
    provider.reset();
  });

  it('should be a singleton', () => {
    expect(DBClockProvider.getInstance()).toBe(provider);
  });

  it('should default to the real clock', () => {
    expect(getDBClock()).toBeInstanceOf(RealDBClock);
  });

  it('should hand out a swapped-in clock until reset', () => {
    const mockClock = new MockDBClock(new Date('2024-06-15T00:00:00Z'));
    provider.setClock(mockClock);
    expect(getDBClock().todayIsoDate()).toBe('2024-06-15');

    provider.reset();
    expect(getDBClock()).toBeInstanceOf(RealDBClock);
  });
});
