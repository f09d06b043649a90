/**
 * Reminder Dispatcher
 *
 * Job bodies for fired reminders. Nothing captured at planning time is trusted:
 * the homework, slot, group and recipients are fetched again, and delivery is
 * suppressed when any of them is gone or inactive. This is where a paused group
 * stops producing notifications.
 */

import type { Logger } from '../types/logger.js';
import type { Group, Person } from '../types/classroom.js';
import type { ClassJobPayload, HomeworkJobPayload, ScheduledJob } from '../types/jobs.js';
import type { ClassroomStore } from '../ports/classroom-store.js';
import type { ReminderNotifier } from '../ports/notifier.js';
import type { TimeZoneResolver } from '../core/time-zone.js';
import { dayOfWeekOf, localize, parseCalendarDate } from '../core/time-zone.js';

export interface ReminderDispatcherConfig {
  /** Allowed drift between the planned class start and the current slot definition */
  toleranceMs: number;
}

const DEFAULT_CONFIG: ReminderDispatcherConfig = {
  toleranceMs: 60 * 1000,
};

/**
 * Outcome of one dispatch, mostly for logs and tests.
 */
export interface DispatchResult {
  delivered: number;
  failed: number;
  /** Set when the whole job was suppressed */
  suppressed?: string;
}

export class ReminderDispatcher {
  private readonly logger: Logger;
  private readonly store: ClassroomStore;
  private readonly notifier: ReminderNotifier;
  private readonly zones: TimeZoneResolver;
  private readonly config: ReminderDispatcherConfig;

  constructor(
    store: ClassroomStore,
    notifier: ReminderNotifier,
    zones: TimeZoneResolver,
    logger: Logger,
    config: Partial<ReminderDispatcherConfig> = {}
  ) {
    this.store = store;
    this.notifier = notifier;
    this.zones = zones;
    this.logger = logger.child({ component: 'reminder-dispatcher' });
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Job store fire handler.
   */
  async dispatch(job: ScheduledJob): Promise<DispatchResult> {
    switch (job.payload.kind) {
      case 'homework':
        return this.sendHomeworkReminder(job.payload);
      case 'class':
        return this.sendClassReminder(job.payload);
    }
  }

  /**
   * Deliver a homework reminder to every active student of the group, then
   * mark the homework as reminded.
   */
  async sendHomeworkReminder(payload: HomeworkJobPayload): Promise<DispatchResult> {
    const homework = await this.store.getHomework(payload.homeworkId);
    if (!homework) {
      return this.suppress('homework_missing', payload);
    }
    if (homework.reminderSent) {
      return this.suppress('already_sent', payload);
    }

    const group = await this.store.getGroup(homework.groupId);
    if (!group) {
      return this.suppress('group_missing', payload);
    }
    if (!group.isActive) {
      return this.suppress('group_inactive', payload);
    }

    const result: DispatchResult = { delivered: 0, failed: 0 };
    const students = await this.activeStudents(group);

    for (const student of students) {
      const zone = this.zones.resolve(student.timeZone);
      try {
        await this.notifier.notifyHomeworkDeadline(student, homework, group, zone);
        result.delivered++;
      } catch (error) {
        result.failed++;
        this.logger.error(
          {
            homeworkId: homework.id,
            studentId: student.id,
            error: error instanceof Error ? error.message : String(error),
          },
          'Failed to deliver homework reminder'
        );
      }
    }

    try {
      await this.store.markHomeworkReminderSent(homework.id);
    } catch (error) {
      this.logger.error(
        { homeworkId: homework.id, error: error instanceof Error ? error.message : String(error) },
        'Failed to mark homework reminder as sent'
      );
    }

    this.logger.info(
      { homeworkId: homework.id, groupId: group.id, ...result },
      'Homework reminder dispatched'
    );
    return result;
  }

  /**
   * Deliver a class reminder to one student.
   */
  async sendClassReminder(payload: ClassJobPayload): Promise<DispatchResult> {
    const slot = await this.store.getSlot(payload.slotId);
    if (!slot) {
      return this.suppress('slot_missing', payload);
    }
    if (!slot.meetingLink) {
      return this.suppress('no_meeting_link', payload);
    }

    const group = await this.store.getGroup(slot.groupId);
    if (!group) {
      return this.suppress('group_missing', payload);
    }
    if (!group.isActive) {
      return this.suppress('group_inactive', payload);
    }

    const student = await this.store.getPerson(payload.studentId);
    if (!student?.isActive) {
      return this.suppress('student_inactive', payload);
    }

    const memberships = await this.store.listMemberships(group.id);
    if (!memberships.some((m) => m.studentId === student.id)) {
      return this.suppress('not_a_member', payload);
    }

    const teacher = await this.store.getPerson(group.teacherId);
    if (!teacher) {
      return this.suppress('teacher_missing', payload);
    }

    // The slot may have been moved after planning
    const date = parseCalendarDate(payload.date);
    if (!date) {
      return this.suppress('invalid_date', payload);
    }
    if (dayOfWeekOf(date) !== slot.dayOfWeek) {
      return this.suppress('slot_moved', payload);
    }
    const startsAt = localize(date, slot.timeOfDay, this.zones.resolve(teacher.timeZone).zone);
    if (Math.abs(startsAt.getTime() - payload.startsAt.getTime()) > this.config.toleranceMs) {
      return this.suppress('slot_moved', payload);
    }

    const zone = this.zones.resolve(student.timeZone);
    try {
      await this.notifier.notifyClassStarting(student, group, slot, zone, startsAt);
    } catch (error) {
      this.logger.error(
        {
          slotId: slot.id,
          studentId: student.id,
          error: error instanceof Error ? error.message : String(error),
        },
        'Failed to deliver class reminder'
      );
      return { delivered: 0, failed: 1 };
    }

    this.logger.info(
      { slotId: slot.id, studentId: student.id, date: payload.date },
      'Class reminder dispatched'
    );
    return { delivered: 1, failed: 0 };
  }

  private async activeStudents(group: Group): Promise<Person[]> {
    const memberships = await this.store.listMemberships(group.id);
    const students: Person[] = [];
    for (const membership of memberships) {
      const student = await this.store.getPerson(membership.studentId);
      if (student?.isActive) {
        students.push(student);
      }
    }
    return students;
  }

  private suppress(
    reason: string,
    payload: HomeworkJobPayload | ClassJobPayload
  ): DispatchResult {
    this.logger.debug({ reason, payload }, 'Reminder suppressed');
    return { delivered: 0, failed: 0, suppressed: reason };
  }
}
