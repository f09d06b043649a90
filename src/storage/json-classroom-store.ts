/**
 * JSON Classroom Store
 *
 * ClassroomStore adapter over a single JSON document (key "classroom" in the
 * storage backend). Every read loads the document again so job bodies always
 * see current data. The document is validated with zod on load.
 */

import { z } from 'zod';
import type { Logger } from '../types/logger.js';
import type {
  DayOfWeek,
  Group,
  HomeworkItem,
  Membership,
  Person,
  ScheduleSlot,
} from '../types/classroom.js';
import { DAYS_OF_WEEK } from '../types/classroom.js';
import type { ClassroomStore } from '../ports/classroom-store.js';
import { StoreCommitError } from '../ports/classroom-store.js';
import { formatTimeOfDay, parseTimeOfDay } from '../core/time-zone.js';
import type { Storage } from './storage.js';

export const CLASSROOM_DOCUMENT_KEY = 'classroom';
export const CLASSROOM_DOCUMENT_VERSION = 1;

const dayOfWeekSchema = z.enum(DAYS_OF_WEEK);

const personSchema = z.object({
  id: z.number().int(),
  chatId: z.union([z.string(), z.number()]).transform(String),
  role: z.enum(['teacher', 'student']),
  timeZone: z.string().default('UTC'),
  isActive: z.boolean().default(true),
  firstName: z.string().nullable().default(null),
  lastName: z.string().nullable().default(null),
});

const groupSchema = z.object({
  id: z.number().int(),
  teacherId: z.number().int(),
  name: z.string(),
  isActive: z.boolean().default(true),
});

const membershipSchema = z.object({
  groupId: z.number().int(),
  studentId: z.number().int(),
});

const homeworkSchema = z.object({
  id: z.number().int(),
  groupId: z.number().int(),
  description: z.string(),
  deadline: z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value)),
  reminderSent: z.boolean().default(false),
});

const slotSchema = z.object({
  id: z.number().int(),
  groupId: z.number().int(),
  dayOfWeek: dayOfWeekSchema,
  time: z.string().transform((value, ctx) => {
    const parsed = parseTimeOfDay(value);
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid time of day: ${value}` });
      return z.NEVER;
    }
    return parsed;
  }),
  durationMinutes: z.number().int().positive().nullable().default(null),
  meetingLink: z.string().nullable().default(null),
});

export const classroomDocumentSchema = z.object({
  version: z.number().int().default(CLASSROOM_DOCUMENT_VERSION),
  people: z.array(personSchema).default([]),
  groups: z.array(groupSchema).default([]),
  memberships: z.array(membershipSchema).default([]),
  homework: z.array(homeworkSchema).default([]),
  schedule: z.array(slotSchema).default([]),
});

/**
 * Document as stored on disk.
 */
export type ClassroomDocumentInput = z.input<typeof classroomDocumentSchema>;

/**
 * Validated document with domain types.
 */
export interface ClassroomSnapshot {
  version: number;
  people: Person[];
  groups: Group[];
  memberships: Membership[];
  homework: HomeworkItem[];
  schedule: ScheduleSlot[];
}

/**
 * Validate a raw document.
 * Throws with the offending path when the document is malformed.
 */
export function parseClassroomDocument(raw: unknown): ClassroomSnapshot {
  const result = classroomDocumentSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : result.error.message;
    throw new Error(`Invalid classroom document at ${where}`);
  }

  const doc = result.data;
  return {
    version: doc.version,
    people: doc.people,
    groups: doc.groups,
    memberships: doc.memberships,
    homework: doc.homework,
    schedule: doc.schedule.map(({ time, ...slot }) => ({ ...slot, timeOfDay: time })),
  };
}

/**
 * Convert a snapshot back to its on-disk shape.
 */
export function serializeClassroomSnapshot(snapshot: ClassroomSnapshot): ClassroomDocumentInput {
  return {
    version: snapshot.version,
    people: snapshot.people,
    groups: snapshot.groups,
    memberships: snapshot.memberships,
    homework: snapshot.homework.map((item) => ({
      ...item,
      deadline: item.deadline.toISOString(),
    })),
    schedule: snapshot.schedule.map(({ timeOfDay, ...slot }) => ({
      ...slot,
      time: formatTimeOfDay(timeOfDay),
    })),
  };
}

export class JsonClassroomStore implements ClassroomStore {
  private readonly storage: Storage;
  private readonly logger: Logger;
  /** Serializes writes so concurrent commits don't overwrite each other */
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(storage: Storage, logger: Logger) {
    this.storage = storage;
    this.logger = logger.child({ component: 'classroom-store' });
  }

  async getHomework(homeworkId: number): Promise<HomeworkItem | null> {
    const snapshot = await this.load();
    return snapshot.homework.find((h) => h.id === homeworkId) ?? null;
  }

  async listUnsentHomework(): Promise<HomeworkItem[]> {
    const snapshot = await this.load();
    return snapshot.homework.filter((h) => !h.reminderSent);
  }

  async getGroup(groupId: number): Promise<Group | null> {
    const snapshot = await this.load();
    return snapshot.groups.find((g) => g.id === groupId) ?? null;
  }

  async getSlot(slotId: number): Promise<ScheduleSlot | null> {
    const snapshot = await this.load();
    return snapshot.schedule.find((s) => s.id === slotId) ?? null;
  }

  async listSlotsByDays(days: readonly DayOfWeek[]): Promise<ScheduleSlot[]> {
    const snapshot = await this.load();
    return snapshot.schedule.filter((s) => days.includes(s.dayOfWeek));
  }

  async getPerson(personId: number): Promise<Person | null> {
    const snapshot = await this.load();
    return snapshot.people.find((p) => p.id === personId) ?? null;
  }

  async listMemberships(groupId: number): Promise<Membership[]> {
    const snapshot = await this.load();
    return snapshot.memberships.filter((m) => m.groupId === groupId);
  }

  markHomeworkReminderSent(homeworkId: number): Promise<void> {
    const commit = this.writeQueue.then(async () => {
      const snapshot = await this.load();
      const homework = snapshot.homework.find((h) => h.id === homeworkId);
      if (!homework) {
        this.logger.debug({ homeworkId }, 'Homework gone before commit, nothing to mark');
        return;
      }
      if (homework.reminderSent) return;

      homework.reminderSent = true;
      try {
        await this.storage.save(CLASSROOM_DOCUMENT_KEY, serializeClassroomSnapshot(snapshot));
      } catch (error) {
        throw new StoreCommitError('markHomeworkReminderSent', error);
      }
      this.logger.debug({ homeworkId }, 'Homework reminder marked as sent');
    });

    // Keep the queue alive after a failed commit
    this.writeQueue = commit.catch(() => undefined);
    return commit;
  }

  private async load(): Promise<ClassroomSnapshot> {
    const raw = await this.storage.load(CLASSROOM_DOCUMENT_KEY);
    return parseClassroomDocument(raw);
  }
}

export function createJsonClassroomStore(storage: Storage, logger: Logger): JsonClassroomStore {
  return new JsonClassroomStore(storage, logger);
}
