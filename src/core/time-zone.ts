/**
 * Time-zone Resolver
 *
 * Isolates all IANA time zone lookups behind Luxon. Unknown zone names never
 * throw: they resolve to UTC and log a warning once per name.
 */

import { DateTime, IANAZone, FixedOffsetZone, type Zone } from 'luxon';
import type { Logger } from '../types/logger.js';
import type { CalendarDate, DayOfWeek, TimeOfDay } from '../types/classroom.js';
import { DAYS_OF_WEEK } from '../types/classroom.js';

/**
 * A zone after resolution.
 */
export interface ResolvedZone {
  /** Effective IANA name ("UTC" for fallbacks) */
  name: string;
  /** Name as stored on the person */
  requested: string;
  zone: Zone;
  /** True when the requested name was unknown and UTC was substituted */
  isFallback: boolean;
}

/**
 * Wall-clock projection of an instant into a zone.
 */
export interface LocalDateTime {
  date: CalendarDate;
  time: TimeOfDay;
}

export const UTC_ZONE_NAME = 'UTC';

export class TimeZoneResolver {
  private readonly logger: Logger;
  private readonly warnedNames = new Set<string>();

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'time-zone' });
  }

  /**
   * Resolve an IANA name. Falls back to UTC for unknown or empty names.
   */
  resolve(name: string | null | undefined): ResolvedZone {
    const requested = name?.trim() ?? '';

    if (requested && IANAZone.isValidZone(requested)) {
      return {
        name: requested,
        requested,
        zone: IANAZone.create(requested),
        isFallback: false,
      };
    }

    if (!this.warnedNames.has(requested)) {
      this.warnedNames.add(requested);
      this.logger.warn({ timeZone: requested }, 'Unknown time zone, falling back to UTC');
    }

    return {
      name: UTC_ZONE_NAME,
      requested,
      zone: FixedOffsetZone.utcInstance,
      isFallback: true,
    };
  }
}

export function localize(date: CalendarDate, time: TimeOfDay, zone: Zone): Date {
  return DateTime.fromObject(
    {
      year: date.year,
      month: date.month,
      day: date.day,
      hour: time.hour,
      minute: time.minute,
      second: 0,
      millisecond: 0,
    },
    { zone }
  ).toJSDate();
}

export function convert(instant: Date, zone: Zone): LocalDateTime {
  const dt = DateTime.fromJSDate(instant, { zone });
  return {
    date: { year: dt.year, month: dt.month, day: dt.day },
    time: { hour: dt.hour, minute: dt.minute },
  };
}

/**
 * UTC calendar date of an instant, optionally shifted by whole days.
 */
export function utcCalendarDate(instant: Date, plusDays = 0): CalendarDate {
  const dt = DateTime.fromJSDate(instant, { zone: 'utc' }).plus({ days: plusDays });
  return { year: dt.year, month: dt.month, day: dt.day };
}

export function dayOfWeekOf(date: CalendarDate): DayOfWeek {
  const dt = DateTime.fromObject(date, { zone: 'utc' });
  const day = DAYS_OF_WEEK[dt.weekday - 1];
  if (!day) {
    throw new Error(`Invalid calendar date: ${formatCalendarDate(date)}`);
  }
  return day;
}

/**
 * Format as YYYY-MM-DD.
 */
export function formatCalendarDate(date: CalendarDate): string {
  return `${String(date.year).padStart(4, '0')}-${pad2(date.month)}-${pad2(date.day)}`;
}

/**
 * Parse YYYY-MM-DD. Returns null for malformed or impossible dates.
 */
export function parseCalendarDate(value: string): CalendarDate | null {
  const dt = DateTime.fromISO(value, { zone: 'utc' });
  if (!dt.isValid || !/^\d{4}-\d{2}-\d{2}$/.test(value)) return null;
  return { year: dt.year, month: dt.month, day: dt.day };
}

/**
 * Format as HH:mm.
 */
export function formatTimeOfDay(time: TimeOfDay): string {
  return `${pad2(time.hour)}:${pad2(time.minute)}`;
}

/**
 * Parse "HH:mm" or "HH:mm:ss" (seconds ignored).
 * Returns null for anything else.
 */
export function parseTimeOfDay(value: string): TimeOfDay | null {
  const match = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/.exec(value.trim());
  if (!match) return null;

  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;

  return { hour, minute };
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}
