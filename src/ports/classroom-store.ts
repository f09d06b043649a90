/**
 * Classroom Store Port - Hexagonal Architecture
 *
 * Read access to the durable classroom entities, plus the single write the
 * scheduler performs (marking a homework reminder as sent).
 *
 * Adapters: JSON file storage in this repository; a relational store in the
 * request layer's deployment. Every call is an async suspension point.
 */

import type {
  DayOfWeek,
  Group,
  HomeworkItem,
  Membership,
  Person,
  ScheduleSlot,
} from '../types/classroom.js';

export interface ClassroomStore {
  /** Returns null if the homework item doesn't exist */
  getHomework(homeworkId: number): Promise<HomeworkItem | null>;

  /** All homework items whose reminder has not been sent yet */
  listUnsentHomework(): Promise<HomeworkItem[]>;

  getGroup(groupId: number): Promise<Group | null>;

  getSlot(slotId: number): Promise<ScheduleSlot | null>;

  /** Slots on any of the given days, regardless of group state or meeting link */
  listSlotsByDays(days: readonly DayOfWeek[]): Promise<ScheduleSlot[]>;

  getPerson(personId: number): Promise<Person | null>;

  listMemberships(groupId: number): Promise<Membership[]>;

  /**
   * Set reminderSent = true.
   * Throws StoreCommitError if the write could not be committed.
   */
  markHomeworkReminderSent(homeworkId: number): Promise<void>;
}

/**
 * Thrown when a write to the classroom store fails and was rolled back.
 */
export class StoreCommitError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Store commit failed (${operation}): ${message}`, { cause });
    this.name = 'StoreCommitError';
    this.operation = operation;
  }
}
