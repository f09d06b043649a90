/**
 * Scheduled job types.
 *
 * Jobs are addressed by structured keys. A canonical string id is derived from a
 * key for map indexing and diagnostics; it is never parsed back into a key.
 */

/**
 * Key of a homework reminder job (one per homework item).
 */
export interface HomeworkJobKey {
  kind: 'homework';
  homeworkId: number;
}

/**
 * Key of a class reminder job: one per slot occurrence per student.
 */
export interface ClassJobKey {
  kind: 'class';
  slotId: number;
  /** Occurrence date, YYYY-MM-DD */
  date: string;
  studentId: number;
}

export type JobKey = HomeworkJobKey | ClassJobKey;

export interface HomeworkJobPayload {
  kind: 'homework';
  homeworkId: number;
  groupId: number;
}

export interface ClassJobPayload {
  kind: 'class';
  slotId: number;
  studentId: number;
  /** Occurrence date, YYYY-MM-DD */
  date: string;
  /** Class start as planned (absolute instant) */
  startsAt: Date;
}

export type JobPayload = HomeworkJobPayload | ClassJobPayload;

/**
 * A pending job in the job store.
 */
export interface ScheduledJob<P extends JobPayload = JobPayload> {
  /** Canonical id derived from key */
  id: string;
  key: JobKey;
  fireAt: Date;
  payload: P;
  createdAt: Date;
}

/**
 * Result of an upsert.
 * - scheduled: new job stored
 * - replaced: job with the same key was overwritten
 * - dropped: fire time was not in the future, nothing stored
 */
export type UpsertResult = 'scheduled' | 'replaced' | 'dropped';

export type CancelResult = { status: 'cancelled'; job: ScheduledJob } | { status: 'not_found' };

/**
 * Read-only job description for diagnostics.
 */
export interface ScheduledJobInfo {
  id: string;
  key: JobKey;
  nextRunTime: string;
  handler: string;
  args: Record<string, unknown>;
}

export interface ScheduledJobsReport {
  count: number;
  jobs: ScheduledJobInfo[];
}

/**
 * Build the canonical id for a job key.
 */
export function jobKeyId(key: JobKey): string {
  switch (key.kind) {
    case 'homework':
      return `homework_reminder:${String(key.homeworkId)}`;
    case 'class':
      return `class_reminder:${String(key.slotId)}:${key.date}:${String(key.studentId)}`;
  }
}

/**
 * Handler name reported in diagnostics.
 */
export function jobHandlerName(payload: JobPayload): string {
  return payload.kind === 'homework' ? 'sendHomeworkReminder' : 'sendClassReminder';
}
