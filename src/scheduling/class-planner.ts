/**
 * Class Occurrence Planner
 *
 * For every weekly slot that occurs today or tomorrow (UTC dates), schedules one
 * reminder job per active student of the slot's group.
 *
 * Two zones take part in every computation:
 * - the teacher's zone fixes what the slot's wall-clock time means in absolute terms
 * - the student's zone only changes how the occurrence is presented to that student
 *
 * A pass is safe to repeat: jobs already pending within the tolerance are left
 * alone, and jobs whose time moved are replaced under the same key.
 */

import type { Logger } from '../types/logger.js';
import type {
  CalendarDate,
  Group,
  Membership,
  Person,
  ScheduleSlot,
  TimeOfDay,
} from '../types/classroom.js';
import type { ClassJobKey } from '../types/jobs.js';
import type { ClassroomStore } from '../ports/classroom-store.js';
import type { JobStore } from '../core/job-store.js';
import type { Clock } from '../core/clock.js';
import { systemClock } from '../core/clock.js';
import type { LocalDateTime, ResolvedZone, TimeZoneResolver } from '../core/time-zone.js';
import {
  convert,
  dayOfWeekOf,
  formatCalendarDate,
  formatTimeOfDay,
  localize,
  utcCalendarDate,
} from '../core/time-zone.js';

export interface ClassPlannerConfig {
  /** Lead before class start, in ms */
  leadMs: number;
  /** A pending job within this distance of the computed time counts as already scheduled */
  toleranceMs: number;
}

const DEFAULT_CONFIG: ClassPlannerConfig = {
  leadMs: 60 * 60 * 1000,
  toleranceMs: 60 * 1000,
};

/**
 * Timing of one occurrence for one recipient.
 */
export interface OccurrenceTiming {
  /** Absolute class start */
  startsAt: Date;
  /** Absolute reminder fire time */
  remindAt: Date;
  /** Class start as seen by the recipient */
  startsAtForRecipient: LocalDateTime;
}

/**
 * Compute when a recipient should be reminded of a slot occurrence.
 */
export function computeReminderInstant(params: {
  date: CalendarDate;
  timeOfDay: TimeOfDay;
  zoneForWallClock: ResolvedZone;
  zoneForRecipient: ResolvedZone;
  leadMs: number;
}): OccurrenceTiming {
  const startsAt = localize(params.date, params.timeOfDay, params.zoneForWallClock.zone);
  return {
    startsAt,
    remindAt: new Date(startsAt.getTime() - params.leadMs),
    startsAtForRecipient: convert(startsAt, params.zoneForRecipient.zone),
  };
}

export function classJobKey(slotId: number, date: string, studentId: number): ClassJobKey {
  return { kind: 'class', slotId, date, studentId };
}

/**
 * Counters for one planning pass.
 */
export interface ReplanSummary {
  slotsConsidered: number;
  slotsSkipped: number;
  scheduled: number;
  replaced: number;
  unchanged: number;
  skippedPast: number;
}

export interface ClassPlannerOptions {
  clock?: Clock;
  config?: Partial<ClassPlannerConfig>;
}

/**
 * Entity lookups memoized for the duration of one pass.
 */
class PassCache {
  private readonly groups = new Map<number, Promise<Group | null>>();
  private readonly people = new Map<number, Promise<Person | null>>();
  private readonly memberships = new Map<number, Promise<Membership[]>>();

  constructor(private readonly store: ClassroomStore) {}

  group(id: number): Promise<Group | null> {
    return memo(this.groups, id, () => this.store.getGroup(id));
  }

  person(id: number): Promise<Person | null> {
    return memo(this.people, id, () => this.store.getPerson(id));
  }

  members(groupId: number): Promise<Membership[]> {
    return memo(this.memberships, groupId, () => this.store.listMemberships(groupId));
  }
}

function memo<T>(cache: Map<number, Promise<T>>, id: number, load: () => Promise<T>): Promise<T> {
  let pending = cache.get(id);
  if (!pending) {
    pending = load();
    cache.set(id, pending);
  }
  return pending;
}

export class ClassPlanner {
  private readonly logger: Logger;
  private readonly store: ClassroomStore;
  private readonly jobStore: JobStore;
  private readonly zones: TimeZoneResolver;
  private readonly clock: Clock;
  private readonly config: ClassPlannerConfig;

  constructor(
    store: ClassroomStore,
    jobStore: JobStore,
    zones: TimeZoneResolver,
    logger: Logger,
    options: ClassPlannerOptions = {}
  ) {
    this.store = store;
    this.jobStore = jobStore;
    this.zones = zones;
    this.logger = logger.child({ component: 'class-planner' });
    this.clock = options.clock ?? systemClock;
    this.config = { ...DEFAULT_CONFIG, ...options.config };
  }

  /**
   * Run one planning pass. Reads entities, writes only the job store.
   */
  async replan(): Promise<ReplanSummary> {
    const now = this.clock.now();
    const today = utcCalendarDate(now);
    const tomorrow = utcCalendarDate(now, 1);
    const todayDay = dayOfWeekOf(today);
    const tomorrowDay = dayOfWeekOf(tomorrow);

    const summary: ReplanSummary = {
      slotsConsidered: 0,
      slotsSkipped: 0,
      scheduled: 0,
      replaced: 0,
      unchanged: 0,
      skippedPast: 0,
    };

    const slots = await this.store.listSlotsByDays([todayDay, tomorrowDay]);
    const cache = new PassCache(this.store);

    for (const slot of slots) {
      summary.slotsConsidered++;

      let target: CalendarDate;
      if (slot.dayOfWeek === todayDay) {
        target = today;
      } else if (slot.dayOfWeek === tomorrowDay) {
        target = tomorrow;
      } else {
        summary.slotsSkipped++;
        continue;
      }

      const planned = await this.planSlot(slot, target, now, cache, summary);
      if (!planned) {
        summary.slotsSkipped++;
      }
    }

    this.logger.info(
      { today: formatCalendarDate(today), tomorrow: formatCalendarDate(tomorrow), ...summary },
      'Class reminders planned'
    );
    return summary;
  }

  /**
   * @returns false if the slot was skipped as a whole
   */
  private async planSlot(
    slot: ScheduleSlot,
    target: CalendarDate,
    now: Date,
    cache: PassCache,
    summary: ReplanSummary
  ): Promise<boolean> {
    const group = await cache.group(slot.groupId);
    if (!group?.isActive) {
      this.logger.debug(
        { slotId: slot.id, groupId: slot.groupId, groupFound: group !== null },
        'Slot skipped: group missing or inactive'
      );
      return false;
    }

    if (!slot.meetingLink) {
      this.logger.info(
        { slotId: slot.id, groupId: group.id, day: slot.dayOfWeek },
        'Slot skipped: no meeting link'
      );
      return false;
    }

    const teacher = await cache.person(group.teacherId);
    if (!teacher) {
      this.logger.warn(
        { slotId: slot.id, groupId: group.id, teacherId: group.teacherId },
        'Slot skipped: teacher not found'
      );
      return false;
    }

    const teacherZone = this.zones.resolve(teacher.timeZone);
    const date = formatCalendarDate(target);
    const members = await cache.members(group.id);

    for (const membership of members) {
      const student = await cache.person(membership.studentId);
      if (!student?.isActive) {
        continue;
      }

      const studentZone = this.zones.resolve(student.timeZone);
      const timing = computeReminderInstant({
        date: target,
        timeOfDay: slot.timeOfDay,
        zoneForWallClock: teacherZone,
        zoneForRecipient: studentZone,
        leadMs: this.config.leadMs,
      });

      if (timing.remindAt <= now || timing.startsAt <= now) {
        summary.skippedPast++;
        continue;
      }

      const key = classJobKey(slot.id, date, student.id);
      const existing = this.jobStore.get(key);
      if (
        existing &&
        Math.abs(existing.fireAt.getTime() - timing.remindAt.getTime()) <= this.config.toleranceMs
      ) {
        summary.unchanged++;
        continue;
      }

      const result = this.jobStore.upsert(key, timing.remindAt, {
        kind: 'class',
        slotId: slot.id,
        studentId: student.id,
        date,
        startsAt: timing.startsAt,
      });

      if (result === 'dropped') {
        summary.skippedPast++;
        continue;
      }
      summary[result]++;

      this.logger.debug(
        {
          slotId: slot.id,
          studentId: student.id,
          date,
          teacherZone: teacherZone.name,
          studentZone: studentZone.name,
          startsAt: timing.startsAt.toISOString(),
          startsAtLocal: `${formatCalendarDate(timing.startsAtForRecipient.date)} ${formatTimeOfDay(timing.startsAtForRecipient.time)}`,
          remindAt: timing.remindAt.toISOString(),
          result,
        },
        'Class reminder planned'
      );
    }

    return true;
  }
}
