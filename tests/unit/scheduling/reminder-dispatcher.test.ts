/**
 * Tests for ReminderDispatcher: fire-time checks and delivery fan-out.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ReminderDispatcher } from '../../../src/scheduling/reminder-dispatcher.js';
import { TimeZoneResolver } from '../../../src/core/time-zone.js';
import type { ClassJobPayload, HomeworkJobPayload, ScheduledJob } from '../../../src/types/jobs.js';
import {
  InMemoryClassroomStore,
  createGroup,
  createHomework,
  createMockLogger,
  createMockNotifier,
  createPerson,
  createSlot,
  type MockLogger,
  type MockNotifier,
} from '../../helpers/factories.js';

const homeworkPayload: HomeworkJobPayload = { kind: 'homework', homeworkId: 4, groupId: 1 };

const classPayload: ClassJobPayload = {
  kind: 'class',
  slotId: 5,
  studentId: 11,
  date: '2024-06-10',
  startsAt: new Date('2024-06-10T15:00:00.000Z'),
};

describe('ReminderDispatcher', () => {
  let logger: MockLogger;
  let store: InMemoryClassroomStore;
  let notifier: MockNotifier;
  let dispatcher: ReminderDispatcher;

  beforeEach(() => {
    logger = createMockLogger();
    store = new InMemoryClassroomStore({
      people: [
        createPerson({ id: 1, role: 'teacher', timeZone: 'Europe/Moscow' }),
        createPerson({ id: 11, timeZone: 'America/New_York' }),
        createPerson({ id: 12 }),
        createPerson({ id: 13, isActive: false }),
      ],
      groups: [createGroup({ id: 1, teacherId: 1 })],
      memberships: [
        { groupId: 1, studentId: 11 },
        { groupId: 1, studentId: 12 },
        { groupId: 1, studentId: 13 },
      ],
      homework: [createHomework({ id: 4, groupId: 1 })],
      schedule: [createSlot({ id: 5, groupId: 1, dayOfWeek: 'monday', timeOfDay: { hour: 18, minute: 0 } })],
    });
    notifier = createMockNotifier();
    dispatcher = new ReminderDispatcher(store, notifier, new TimeZoneResolver(logger), logger, {
      toleranceMs: 60 * 1000,
    });
  });

  describe('sendHomeworkReminder', () => {
    it('notifies every active student and marks the homework as reminded', async () => {
      const result = await dispatcher.sendHomeworkReminder(homeworkPayload);

      expect(result).toEqual({ delivered: 2, failed: 0 });
      expect(notifier.notifyHomeworkDeadline.mock.calls.map(([person]) => person.id)).toEqual([11, 12]);
      expect(store.markHomeworkReminderSent).toHaveBeenCalledWith(4);
      expect(store.homework[0]?.reminderSent).toBe(true);
    });

    it("passes each student's own zone for display", async () => {
      await dispatcher.sendHomeworkReminder(homeworkPayload);

      const zoneNames = notifier.notifyHomeworkDeadline.mock.calls.map(([, , , zone]) => zone.name);
      expect(zoneNames).toEqual(['America/New_York', 'UTC']);
    });

    it('sends nothing once the reminder was sent', async () => {
      await dispatcher.sendHomeworkReminder(homeworkPayload);
      notifier.notifyHomeworkDeadline.mockClear();

      const result = await dispatcher.sendHomeworkReminder(homeworkPayload);

      expect(result).toEqual({ delivered: 0, failed: 0, suppressed: 'already_sent' });
      expect(notifier.notifyHomeworkDeadline).not.toHaveBeenCalled();
    });

    it('sends nothing for deleted homework', async () => {
      store.homework.length = 0;

      const result = await dispatcher.sendHomeworkReminder(homeworkPayload);

      expect(result.suppressed).toBe('homework_missing');
      expect(notifier.notifyHomeworkDeadline).not.toHaveBeenCalled();
    });

    it('sends nothing for an inactive group and leaves the homework unsent', async () => {
      store.groups[0] = createGroup({ id: 1, teacherId: 1, isActive: false });

      const result = await dispatcher.sendHomeworkReminder(homeworkPayload);

      expect(result.suppressed).toBe('group_inactive');
      expect(notifier.notifyHomeworkDeadline).not.toHaveBeenCalled();
      expect(store.homework[0]?.reminderSent).toBe(false);
    });

    it('keeps delivering when one recipient fails', async () => {
      notifier.failFor.add('100011');

      const result = await dispatcher.sendHomeworkReminder(homeworkPayload);

      expect(result).toEqual({ delivered: 1, failed: 1 });
      expect(notifier.notifyHomeworkDeadline).toHaveBeenCalledTimes(2);
      expect(store.homework[0]?.reminderSent).toBe(true);
      expect(logger.messages('error')).toEqual(['Failed to deliver homework reminder']);
    });

    it('logs a failed commit without throwing', async () => {
      store.commitError = new Error('disk full');

      const result = await dispatcher.sendHomeworkReminder(homeworkPayload);

      expect(result).toEqual({ delivered: 2, failed: 0 });
      expect(logger.messages('error')).toEqual(['Failed to mark homework reminder as sent']);
    });
  });

  describe('sendClassReminder', () => {
    it('notifies the student with the start time in absolute terms', async () => {
      const result = await dispatcher.sendClassReminder(classPayload);

      expect(result).toEqual({ delivered: 1, failed: 0 });
      expect(notifier.notifyClassStarting).toHaveBeenCalledTimes(1);
      const [student, group, slot, zone, startsAt] = notifier.notifyClassStarting.mock.calls[0] ?? [];
      expect(student?.id).toBe(11);
      expect(group?.id).toBe(1);
      expect(slot?.id).toBe(5);
      expect(zone?.name).toBe('America/New_York');
      expect(startsAt?.toISOString()).toBe('2024-06-10T15:00:00.000Z');
    });

    it('tolerates a small drift in the planned start', async () => {
      const result = await dispatcher.sendClassReminder({
        ...classPayload,
        startsAt: new Date('2024-06-10T15:00:30.000Z'),
      });

      expect(result.delivered).toBe(1);
    });

    it('sends nothing when the slot was moved after planning', async () => {
      store.schedule[0] = createSlot({ id: 5, groupId: 1, timeOfDay: { hour: 19, minute: 0 } });

      const result = await dispatcher.sendClassReminder(classPayload);

      expect(result.suppressed).toBe('slot_moved');
      expect(notifier.notifyClassStarting).not.toHaveBeenCalled();
    });

    it('sends nothing when the slot was moved to another weekday', async () => {
      store.schedule[0] = createSlot({
        id: 5,
        groupId: 1,
        dayOfWeek: 'wednesday',
        timeOfDay: { hour: 18, minute: 0 },
      });

      const result = await dispatcher.sendClassReminder(classPayload);

      expect(result).toEqual({ delivered: 0, failed: 0, suppressed: 'slot_moved' });
      expect(notifier.notifyClassStarting).not.toHaveBeenCalled();
    });

    it('sends nothing when the slot was deleted', async () => {
      store.schedule.length = 0;

      expect((await dispatcher.sendClassReminder(classPayload)).suppressed).toBe('slot_missing');
    });

    it('sends nothing when the meeting link was removed', async () => {
      store.schedule[0] = createSlot({ id: 5, groupId: 1, meetingLink: null });

      expect((await dispatcher.sendClassReminder(classPayload)).suppressed).toBe('no_meeting_link');
    });

    it('sends nothing when the group was paused', async () => {
      store.groups[0] = createGroup({ id: 1, teacherId: 1, isActive: false });

      expect((await dispatcher.sendClassReminder(classPayload)).suppressed).toBe('group_inactive');
    });

    it('sends nothing to a student who left the group', async () => {
      store.memberships.splice(0, 1);

      const result = await dispatcher.sendClassReminder(classPayload);

      expect(result.suppressed).toBe('not_a_member');
      expect(notifier.notifyClassStarting).not.toHaveBeenCalled();
    });

    it('sends nothing to an inactive student', async () => {
      const result = await dispatcher.sendClassReminder({ ...classPayload, studentId: 13 });

      expect(result.suppressed).toBe('student_inactive');
    });

    it('sends nothing when the teacher is gone', async () => {
      store.people.splice(0, 1);

      expect((await dispatcher.sendClassReminder(classPayload)).suppressed).toBe('teacher_missing');
    });

    it('reports a failed delivery', async () => {
      notifier.failFor.add('100011');

      const result = await dispatcher.sendClassReminder(classPayload);

      expect(result).toEqual({ delivered: 0, failed: 1 });
      expect(logger.messages('error')).toEqual(['Failed to deliver class reminder']);
    });
  });

  describe('dispatch', () => {
    it('routes a fired job by its payload', async () => {
      const job: ScheduledJob = {
        id: 'class_reminder:5:2024-06-10:11',
        key: { kind: 'class', slotId: 5, date: '2024-06-10', studentId: 11 },
        fireAt: new Date('2024-06-10T14:00:00.000Z'),
        payload: classPayload,
        createdAt: new Date('2024-06-10T00:01:00.000Z'),
      };

      const result = await dispatcher.dispatch(job);

      expect(result.delivered).toBe(1);
      expect(notifier.notifyClassStarting).toHaveBeenCalledTimes(1);
      expect(notifier.notifyHomeworkDeadline).not.toHaveBeenCalled();
    });
  });
});
