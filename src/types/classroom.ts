/**
 * Classroom entity types.
 *
 * These rows live in the durable classroom store. The scheduler only reads them,
 * with one exception: HomeworkItem.reminderSent is set by the dispatcher.
 */

/**
 * Days in ISO order (index 0 = Monday), aligned with Luxon's weekday - 1.
 * Values match the stored enum.
 */
export const DAYS_OF_WEEK = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
] as const;

export type DayOfWeek = (typeof DAYS_OF_WEEK)[number];

export type PersonRole = 'teacher' | 'student';

/**
 * A teacher or a student.
 */
export interface Person {
  id: number;
  /** Telegram chat ID used for delivery */
  chatId: string;
  role: PersonRole;
  /** IANA time zone name, e.g. "Europe/Moscow" */
  timeZone: string;
  isActive: boolean;
  firstName: string | null;
  lastName: string | null;
}

export interface Group {
  id: number;
  teacherId: number;
  name: string;
  /** False when the teacher has paused the group */
  isActive: boolean;
}

export interface Membership {
  groupId: number;
  studentId: number;
}

export interface HomeworkItem {
  id: number;
  groupId: number;
  description: string;
  /** Absolute deadline (UTC instant) */
  deadline: Date;
  reminderSent: boolean;
}

/**
 * Wall-clock time of day without date or zone.
 */
export interface TimeOfDay {
  hour: number;
  minute: number;
}

/**
 * Plain calendar date without zone.
 */
export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

/**
 * Recurring weekly class slot.
 *
 * timeOfDay is interpreted in the owning group's teacher's time zone.
 */
export interface ScheduleSlot {
  id: number;
  groupId: number;
  dayOfWeek: DayOfWeek;
  timeOfDay: TimeOfDay;
  /** Duration in minutes */
  durationMinutes: number | null;
  /** Zoom/Meet link; slots without one produce no class reminders */
  meetingLink: string | null;
}
