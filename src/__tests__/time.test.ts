import { describe, expect, it } from 'vitest';
import {
  assertTimeZone,
  formatFullDate,
  formatJournalTitle,
  formatLocalIso,
  formatLongDate,
  localDateKey,
  parseUtcTimestamp,
  sameLocalDay,
  toLocal,
} from '../core/time.js';

const UTC_MINUS_5 = 'Etc/GMT+5';

describe('toLocal', () => {
  it('should convert a UTC instant to local calendar fields', () => {
    const local = toLocal(new Date('2025-01-01T23:30:00Z'), UTC_MINUS_5);
    expect(local).toEqual({
      year: 2025,
      month: 1,
      day: 1,
      hour: 18,
      minute: 30,
      second: 0,
      weekday: 3,
      offsetMinutes: -300,
    });
  });

  it('should bucket an instant past UTC midnight under the previous local day', () => {
    const local = toLocal(new Date('2025-01-02T03:00:00Z'), UTC_MINUS_5);
    expect(localDateKey(local)).toBe('2025-01-01');
    expect(local.hour).toBe(22);
  });

  it('should handle zones with half-hour offsets', () => {
    const local = toLocal(new Date('2025-01-01T23:30:00Z'), 'Asia/Kolkata');
    expect(formatLocalIso(local)).toBe('2025-01-02T05:00:00+05:30');
  });
});

describe('formatting', () => {
  const local = toLocal(new Date('2025-01-01T23:30:00Z'), UTC_MINUS_5);

  it('should format the Zim Creation-Date form', () => {
    expect(formatLocalIso(local)).toBe('2025-01-01T18:30:00-05:00');
    expect(formatLocalIso(toLocal(new Date('2025-06-15T08:05:09Z'), 'UTC'))).toBe('2025-06-15T08:05:09+00:00');
  });

  it('should format journal titles and long dates', () => {
    expect(formatJournalTitle(local)).toBe('Wednesday 01 Jan 2025');
    expect(formatFullDate(local)).toBe('Wednesday 01 January 2025');
    expect(formatLongDate(local)).toBe('January 01 2025');
  });

  it('should compare local days', () => {
    const later = toLocal(new Date('2025-01-02T04:59:59Z'), UTC_MINUS_5);
    const nextDay = toLocal(new Date('2025-01-02T05:00:00Z'), UTC_MINUS_5);
    expect(sameLocalDay(local, later)).toBe(true);
    expect(sameLocalDay(local, nextDay)).toBe(false);
  });
});

describe('parseUtcTimestamp', () => {
  it('should read strings without an offset as UTC', () => {
    expect(parseUtcTimestamp('2025-01-01 23:30')?.toISOString()).toBe('2025-01-01T23:30:00.000Z');
    expect(parseUtcTimestamp('2025-01-01T23:30:15')?.toISOString()).toBe('2025-01-01T23:30:15.000Z');
    expect(parseUtcTimestamp('2025-01-01')?.toISOString()).toBe('2025-01-01T00:00:00.000Z');
  });

  it('should honour an explicit offset', () => {
    expect(parseUtcTimestamp('2025-01-01T23:30:00+02:00')?.toISOString()).toBe('2025-01-01T21:30:00.000Z');
    expect(parseUtcTimestamp('2025-01-01T23:30:00Z')?.toISOString()).toBe('2025-01-01T23:30:00.000Z');
  });

  it('should accept dates and epoch milliseconds', () => {
    const date = new Date('2025-01-01T00:00:00Z');
    expect(parseUtcTimestamp(date)?.getTime()).toBe(date.getTime());
    expect(parseUtcTimestamp(date.getTime())?.toISOString()).toBe('2025-01-01T00:00:00.000Z');
  });

  it('should return undefined for unparsable values', () => {
    expect(parseUtcTimestamp('not a date')).toBeUndefined();
    expect(parseUtcTimestamp('')).toBeUndefined();
    expect(parseUtcTimestamp({})).toBeUndefined();
    expect(parseUtcTimestamp(null)).toBeUndefined();
    expect(parseUtcTimestamp(Number.NaN)).toBeUndefined();
  });
});

describe('assertTimeZone', () => {
  it('should reject unknown zones', () => {
    expect(() => assertTimeZone('Mars/Olympus_Mons')).toThrow(RangeError);
    expect(() => assertTimeZone('Europe/Berlin')).not.toThrow();
  });
});
