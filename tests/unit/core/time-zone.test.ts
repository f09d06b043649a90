import { describe, it, expect, beforeEach } from 'vitest';
import {
  TimeZoneResolver,
  convert,
  dayOfWeekOf,
  formatCalendarDate,
  formatTimeOfDay,
  localize,
  parseCalendarDate,
  parseTimeOfDay,
  utcCalendarDate,
} from '../../../src/core/time-zone.js';
import { createMockLogger, type MockLogger } from '../../helpers/factories.js';

describe('TimeZoneResolver', () => {
  let logger: MockLogger;
  let zones: TimeZoneResolver;

  beforeEach(() => {
    logger = createMockLogger();
    zones = new TimeZoneResolver(logger);
  });

  it('resolves a known IANA zone', () => {
    const zone = zones.resolve('Europe/Moscow');

    expect(zone.name).toBe('Europe/Moscow');
    expect(zone.isFallback).toBe(false);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('falls back to UTC for an unknown zone and warns once per name', () => {
    const first = zones.resolve('Mars/Olympus_Mons');
    const second = zones.resolve('Mars/Olympus_Mons');

    expect(first.name).toBe('UTC');
    expect(first.requested).toBe('Mars/Olympus_Mons');
    expect(first.isFallback).toBe(true);
    expect(second.isFallback).toBe(true);
    expect(logger.messages('warn')).toEqual(['Unknown time zone, falling back to UTC']);
  });

  it('treats a missing zone as UTC', () => {
    const zone = zones.resolve(null);

    expect(zone.name).toBe('UTC');
    expect(zone.requested).toBe('');
    expect(zone.isFallback).toBe(true);
  });

  it('localizes through a resolved zone', () => {
    const moscow = zones.resolve('Europe/Moscow');
    const instant = localize({ year: 2024, month: 6, day: 10 }, { hour: 18, minute: 0 }, moscow.zone);

    expect(instant.toISOString()).toBe('2024-06-10T15:00:00.000Z');
  });
});

describe('localize', () => {
  it('applies daylight saving offsets of the zone', () => {
    const zones = new TimeZoneResolver(createMockLogger());
    const newYork = zones.resolve('America/New_York').zone;

    const winter = localize({ year: 2024, month: 1, day: 15 }, { hour: 9, minute: 0 }, newYork);
    const summer = localize({ year: 2024, month: 7, day: 15 }, { hour: 9, minute: 0 }, newYork);

    expect(winter.toISOString()).toBe('2024-01-15T14:00:00.000Z');
    expect(summer.toISOString()).toBe('2024-07-15T13:00:00.000Z');
  });
});

describe('convert', () => {
  it('projects an instant into a zone', () => {
    const zones = new TimeZoneResolver(createMockLogger());
    const local = convert(new Date('2024-06-10T14:00:00Z'), zones.resolve('America/New_York').zone);

    expect(local).toEqual({
      date: { year: 2024, month: 6, day: 10 },
      time: { hour: 10, minute: 0 },
    });
  });

  it('can cross the date line', () => {
    const zones = new TimeZoneResolver(createMockLogger());
    const local = convert(new Date('2024-06-10T22:30:00Z'), zones.resolve('Asia/Tokyo').zone);

    expect(local.date).toEqual({ year: 2024, month: 6, day: 11 });
    expect(local.time).toEqual({ hour: 7, minute: 30 });
  });
});

describe('calendar helpers', () => {
  it('takes the UTC calendar date of an instant', () => {
    const instant = new Date('2024-06-10T23:30:00Z');

    expect(utcCalendarDate(instant)).toEqual({ year: 2024, month: 6, day: 10 });
    expect(utcCalendarDate(instant, 1)).toEqual({ year: 2024, month: 6, day: 11 });
  });

  it('rolls over month ends', () => {
    expect(utcCalendarDate(new Date('2024-06-30T12:00:00Z'), 1)).toEqual({
      year: 2024,
      month: 7,
      day: 1,
    });
  });

  it('names the weekday of a date', () => {
    expect(dayOfWeekOf({ year: 2024, month: 6, day: 10 })).toBe('monday');
    expect(dayOfWeekOf({ year: 2024, month: 6, day: 16 })).toBe('sunday');
  });

  it('formats and parses calendar dates', () => {
    expect(formatCalendarDate({ year: 2024, month: 6, day: 1 })).toBe('2024-06-01');
    expect(parseCalendarDate('2024-06-01')).toEqual({ year: 2024, month: 6, day: 1 });
    expect(parseCalendarDate('2024-02-30')).toBeNull();
    expect(parseCalendarDate('2024-6-1')).toBeNull();
  });
});

describe('time of day', () => {
  it('parses HH:mm and HH:mm:ss', () => {
    expect(parseTimeOfDay('18:00')).toEqual({ hour: 18, minute: 0 });
    expect(parseTimeOfDay('07:05:30')).toEqual({ hour: 7, minute: 5 });
    expect(parseTimeOfDay('7:05')).toEqual({ hour: 7, minute: 5 });
  });

  it('rejects out-of-range and malformed values', () => {
    expect(parseTimeOfDay('24:00')).toBeNull();
    expect(parseTimeOfDay('12:60')).toBeNull();
    expect(parseTimeOfDay('noon')).toBeNull();
  });

  it('formats with zero padding', () => {
    expect(formatTimeOfDay({ hour: 7, minute: 5 })).toBe('07:05');
  });
});
